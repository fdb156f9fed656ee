import { vi, type Mock } from "vitest";

import { InMemoryCreationStore } from "../../src/adapters/in-memory/InMemoryCreationStore.js";
import { InMemoryRoomLock } from "../../src/adapters/in-memory/InMemoryRoomLock.js";
import { InMemoryRoomRegistry } from "../../src/adapters/in-memory/InMemoryRoomRegistry.js";
import { InMemoryScheduler } from "../../src/adapters/in-memory/InMemoryScheduler.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import { dispatchCommand } from "../../src/domain/commands/dispatchCommand.js";
import { submitInput, type InputOutcome } from "../../src/domain/commands/submitInput.js";
import {
  createEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from "../../src/domain/EngineConfig.js";
import type { FileParser } from "../../src/domain/ports/FileParser.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type { TextGenerator } from "../../src/domain/ports/TextGenerator.js";
import type { Address, FileAttachment, Sender } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export interface MessageBusMock extends MessageBus {
  readonly publish: Fn<MessageBus["publish"]>;
}

export interface TextGeneratorMock extends TextGenerator {
  readonly generate: Fn<TextGenerator["generate"]>;
}

export interface FileParserMock extends FileParser {
  readonly parse: Fn<FileParser["parse"]>;
}

export interface LoggerMock extends Logger {
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
  readonly debug: Fn<Logger["debug"]>;
}

export function createMessageBusMock(): MessageBusMock {
  const publish = createMock<MessageBus["publish"]>();
  publish.mockResolvedValue(undefined);
  return { publish };
}

export function createTextGeneratorMock(text = "The story moves on."): TextGeneratorMock {
  const generate = createMock<TextGenerator["generate"]>();
  generate.mockResolvedValue(text);
  return { generate };
}

export function createFileParserMock(): FileParserMock {
  return { parse: createMock<FileParser["parse"]>() };
}

export function createLoggerMock(): LoggerMock {
  return {
    info: createMock<Logger["info"]>(),
    warn: createMock<Logger["warn"]>(),
    error: createMock<Logger["error"]>(),
    debug: createMock<Logger["debug"]>(),
  };
}

export function player(name: string): Sender {
  return { id: name, name, address: `chat:${name}` };
}

export interface CommandContextMock extends CommandContext {
  readonly registry: InMemoryRoomRegistry;
  readonly creations: InMemoryCreationStore;
  readonly locks: InMemoryRoomLock;
  readonly bus: MessageBusMock;
  readonly textGenerator: TextGeneratorMock;
  readonly fileParser: FileParserMock;
  readonly scheduler: InMemoryScheduler;
  readonly config: EngineConfig;
  readonly logger: LoggerMock;
}

/**
 * Real in-memory registry, lock, wizard store and virtual-clock scheduler,
 * with mocked collaborators. Room ids are `room-1`, `room-2`, ...
 */
export function createCommandContext(
  configOverrides: EngineConfigOverrides = {},
  startAt = 1_000_000,
): CommandContextMock {
  const config = createEngineConfig(configOverrides);
  let nextRoom = 1;

  const context: CommandContextMock = {
    registry: new InMemoryRoomRegistry({
      maxRooms: config.maxRooms,
      generateId: () => `room-${nextRoom++}`,
    }),
    creations: new InMemoryCreationStore(),
    locks: new InMemoryRoomLock(),
    bus: createMessageBusMock(),
    textGenerator: createTextGeneratorMock(),
    fileParser: createFileParserMock(),
    scheduler: new InMemoryScheduler((command) => dispatchCommand(command, context), startAt),
    config,
    logger: createLoggerMock(),
  };

  return context;
}

/** Sends one inbound message at the scheduler's current virtual time. */
export function send(
  context: CommandContextMock,
  sender: Sender,
  text: string,
  attachment?: FileAttachment,
): Promise<InputOutcome> {
  return submitInput(
    { sender, text, ...(attachment ? { attachment } : {}) },
    context,
    context.scheduler.now,
  );
}

/** Every text published to `address`, in order. */
export function messagesTo(context: CommandContextMock, address: Address): string[] {
  return context.bus.publish.mock.calls
    .filter(([recipients]) => recipients.includes(address))
    .map(([, text]) => text);
}

export function lastMessageTo(context: CommandContextMock, address: Address): string | undefined {
  return messagesTo(context, address).at(-1);
}

/** Creates a room hosted by `host` through quick-create and lets `guests` join it. */
export async function setUpRoom(
  context: CommandContextMock,
  host: Sender,
  guests: readonly Sender[] = [],
): Promise<string> {
  await send(context, host, "/tw quick Test Room");
  const room = context.registry.getRoomByPlayer(host.id);
  if (!room) {
    throw new Error("room was not created");
  }
  for (const guest of guests) {
    await send(context, guest, `/tw join ${room.id}`);
  }
  return room.id;
}

/** Runs a room through character creation so that round 1 is open. */
export async function startPlaying(
  context: CommandContextMock,
  host: Sender,
  guests: readonly Sender[] = [],
): Promise<string> {
  const roomId = await setUpRoom(context, host, guests);
  await send(context, host, "/tw begin");
  for (const member of [host, ...guests]) {
    await send(context, member, `${member.name}-hero: a wandering sellsword`);
  }
  return roomId;
}
