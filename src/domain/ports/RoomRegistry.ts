/* eslint-disable functional/prefer-readonly-type */
import type { RejectionCode } from "../errors/StateConflictError.js";
import type {
  Address,
  PlayerId,
  PlayerStatus,
  RoomId,
  RoomPhase,
  Sender,
  TimePoint,
} from "../typedefs.js";

export interface Character {
  readonly name: string;
  readonly setting: string;
}

export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  readonly address: Address;
  character?: Character;
  status: PlayerStatus;
  /** Action submitted for the current round, cleared when a round starts */
  lastAction?: string;
  lastActionAt?: TimePoint;
  readonly joinedAt: TimePoint;
}

/** Immutable record of one resolved round */
export interface GameRound {
  readonly round: number;
  /** Display name (character name, else player name) → action text */
  readonly actions: Readonly<Record<string, string>>;
  readonly narration: string;
  readonly at: TimePoint;
}

/** Changes the host stages while paused; applied once on resume */
export interface PendingConfig {
  roundTimeoutSec?: number;
  note?: string;
}

export type NarrationKind = "opening" | "round";

/**
 * The authoritative in-memory state of one room.
 * Only the registry and commands holding the room's lock may mutate it.
 */
export interface Room {
  readonly id: RoomId;
  readonly name: string;
  readonly host: PlayerId;
  readonly hostAddress: Address;

  worldSetting: string;
  /** Full text the host supplied before it was summarized or truncated */
  originalWorldSetting?: string;

  phase: RoomPhase;
  paused: boolean;

  readonly activePlayers: Map<PlayerId, Player>;
  /** Joined while paused; admitted on resume */
  readonly pendingPlayers: Map<PlayerId, Player>;

  roundTimeoutSec: number;
  readonly characterCreationTimeoutSec: number;

  currentRound: number;
  roundStartedAt?: TimePoint;
  characterCreationStartedAt?: TimePoint;

  /** Append-only; read through a bounded window when building prompts */
  readonly history: GameRound[];

  pendingConfig: PendingConfig;
  /** Host note in effect until the next round is resolved */
  hostNote?: string;

  /** Set while a backend call for this room is in flight */
  narration?: NarrationKind;

  /** Moves on every timer schedule and cancel; deliveries carrying an older value are stale */
  timerSeq: number;

  readonly createdAt: TimePoint;
}

export interface RoomParams {
  readonly name: string;
  readonly worldSetting: string;
  readonly originalWorldSetting?: string;
  readonly roundTimeoutSec: number;
  readonly characterCreationTimeoutSec: number;
}

export type RegistryResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: RejectionCode };

export interface JoinOutcome {
  readonly room: Room;
  /** True when the player was staged into the pending map of a paused room */
  readonly staged: boolean;
}

export interface LeaveOutcome {
  readonly room: Room;
  readonly player: Player;
  /** True when the host left and the room was closed */
  readonly closed: boolean;
}

export interface ResumeOutcome {
  readonly room: Room;
  readonly admitted: readonly Player[];
  readonly appliedTimeoutSec?: number;
}

export type StagedChange =
  | { readonly kind: "timeout"; readonly seconds: number }
  | { readonly kind: "note"; readonly text: string };

/**
 * Owner of every room and of the player → room index.
 *
 * Implementations must keep each operation atomic: a player identity maps to at
 * most one room, and the index always agrees with the rooms' membership maps.
 */
export interface RoomRegistry {
  canCreateRoom(): boolean;
  createRoom(creator: Sender, params: RoomParams, at: TimePoint): RegistryResult<Room>;
  getRoom(roomId: RoomId): Room | undefined;
  getRoomByPlayer(playerId: PlayerId): Room | undefined;
  listRooms(): readonly Room[];
  joinRoom(
    roomId: RoomId,
    player: Sender,
    maxPerRoom: number,
    at: TimePoint,
  ): RegistryResult<JoinOutcome>;
  leaveRoom(playerId: PlayerId): RegistryResult<LeaveOutcome>;
  closeRoom(roomId: RoomId): boolean;
  pauseRoom(roomId: RoomId, requester: PlayerId): RegistryResult<Room>;
  resumeRoom(roomId: RoomId, requester: PlayerId): RegistryResult<ResumeOutcome>;
  stageConfig(
    roomId: RoomId,
    requester: PlayerId,
    change: StagedChange,
  ): RegistryResult<Room>;
  /** Snapshot of the reverse index */
  membership(): ReadonlyMap<PlayerId, RoomId>;
  clear(): void;
}
