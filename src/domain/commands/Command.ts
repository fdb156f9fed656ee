import type { EngineConfig } from "../EngineConfig.js";
import type { CreationStore } from "../ports/CreationStore.js";
import type { FileParser } from "../ports/FileParser.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RoomLock } from "../ports/RoomLock.js";
import type { RoomRegistry } from "../ports/RoomRegistry.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { TextGenerator } from "../ports/TextGenerator.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly registry: RoomRegistry;
  readonly creations: CreationStore;
  readonly locks: RoomLock;
  readonly bus: MessageBus;
  readonly textGenerator: TextGenerator;
  readonly fileParser: FileParser;
  readonly scheduler: Scheduler;
  readonly config: EngineConfig;
  readonly logger?: Logger;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
