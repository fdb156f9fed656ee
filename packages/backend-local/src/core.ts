export type {
  Command,
  CommandContext,
} from "@taleroom/core/domain/commands/Command.js";
export { PhaseTimeout } from "@taleroom/core/domain/commands/PhaseTimeout.js";
export { Shutdown } from "@taleroom/core/domain/commands/Shutdown.js";
export { dispatchCommand } from "@taleroom/core/domain/commands/dispatchCommand.js";
export {
  submitInput,
  type InputOutcome,
} from "@taleroom/core/domain/commands/submitInput.js";
export type { EngineConfig } from "@taleroom/core/domain/EngineConfig.js";
export { createEngineConfig } from "@taleroom/core/domain/EngineConfig.js";
export { phaseLabel, hostName } from "@taleroom/core/domain/entities/RoomSummary.js";
export { CollaboratorFailure } from "@taleroom/core/domain/errors/CollaboratorFailure.js";
export type {
  FileParser,
  FileParseResult,
} from "@taleroom/core/domain/ports/FileParser.js";
export type { Logger } from "@taleroom/core/domain/ports/Logger.js";
export type { MessageBus } from "@taleroom/core/domain/ports/MessageBus.js";
export type { Room, RoomRegistry } from "@taleroom/core/domain/ports/RoomRegistry.js";
export type { Scheduler } from "@taleroom/core/domain/ports/Scheduler.js";
export type { TextGenerator } from "@taleroom/core/domain/ports/TextGenerator.js";
export type {
  Address,
  InboundMessage,
  RoomId,
  TimePoint,
  TimerPhase,
} from "@taleroom/core/domain/typedefs.js";
export { InMemoryCreationStore } from "@taleroom/core/adapters/in-memory/InMemoryCreationStore.js";
export { InMemoryRoomLock } from "@taleroom/core/adapters/in-memory/InMemoryRoomLock.js";
export { InMemoryRoomRegistry } from "@taleroom/core/adapters/in-memory/InMemoryRoomRegistry.js";
