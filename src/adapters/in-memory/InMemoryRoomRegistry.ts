/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { randomUUID } from "node:crypto";

import {
  activatePendingPlayers,
  applyPendingConfig,
  assertValidRoom,
  createPlayer,
  isHost,
} from "../../domain/entities/RoomRules.js";
import type {
  JoinOutcome,
  LeaveOutcome,
  RegistryResult,
  ResumeOutcome,
  Room,
  RoomParams,
  RoomRegistry,
  StagedChange,
} from "../../domain/ports/RoomRegistry.js";
import type { RejectionCode } from "../../domain/errors/StateConflictError.js";
import type { PlayerId, RoomId, Sender, TimePoint } from "../../domain/typedefs.js";

interface InMemoryRoomRegistryOptions {
  readonly maxRooms: number;
  readonly generateId?: () => RoomId;
}

/**
 * Process-scoped room table plus the player → room index.
 *
 * Every method is synchronous, so each one runs to completion on the event loop
 * without interleaving with any other registry call.
 */
export class InMemoryRoomRegistry implements RoomRegistry {
  #rooms = new Map<RoomId, Room>();
  #playerRooms = new Map<PlayerId, RoomId>();
  readonly #maxRooms: number;
  readonly #generateId: () => RoomId;

  constructor({ maxRooms, generateId = () => randomUUID().slice(0, 8) }: InMemoryRoomRegistryOptions) {
    this.#maxRooms = maxRooms;
    this.#generateId = generateId;
  }

  canCreateRoom(): boolean {
    return this.#rooms.size < this.#maxRooms;
  }

  createRoom(creator: Sender, params: RoomParams, at: TimePoint): RegistryResult<Room> {
    if (!this.canCreateRoom()) return reject("AtCapacity");
    if (this.#playerRooms.has(creator.id)) return reject("CreatorAlreadyInRoom");

    const host = createPlayer(creator, at);
    const room: Room = {
      id: this.#freshId(),
      name: params.name,
      host: creator.id,
      hostAddress: creator.address,
      worldSetting: params.worldSetting,
      ...(params.originalWorldSetting !== undefined
        ? { originalWorldSetting: params.originalWorldSetting }
        : {}),
      phase: "waiting",
      paused: false,
      activePlayers: new Map([[host.id, host]]),
      pendingPlayers: new Map(),
      roundTimeoutSec: params.roundTimeoutSec,
      characterCreationTimeoutSec: params.characterCreationTimeoutSec,
      currentRound: 0,
      history: [],
      pendingConfig: {},
      timerSeq: 0,
      createdAt: at,
    };

    this.#rooms.set(room.id, room);
    this.#playerRooms.set(creator.id, room.id);
    return { ok: true, value: room };
  }

  getRoom(roomId: RoomId): Room | undefined {
    return this.#rooms.get(roomId);
  }

  getRoomByPlayer(playerId: PlayerId): Room | undefined {
    const roomId = this.#playerRooms.get(playerId);
    return roomId === undefined ? undefined : this.#rooms.get(roomId);
  }

  listRooms(): readonly Room[] {
    return [...this.#rooms.values()];
  }

  joinRoom(
    roomId: RoomId,
    player: Sender,
    maxPerRoom: number,
    at: TimePoint,
  ): RegistryResult<JoinOutcome> {
    const room = this.#rooms.get(roomId);
    if (!room) return reject("NotFound");
    if (room.phase === "closed") return reject("Closed");
    if (room.phase === "character-creation" || room.phase === "active") {
      return reject("AlreadyStarted");
    }
    if (this.#playerRooms.has(player.id)) return reject("AlreadyInARoom");
    if (room.activePlayers.size + room.pendingPlayers.size >= maxPerRoom) {
      return reject("Full");
    }

    const staged = room.paused;
    if (staged) {
      room.pendingPlayers.set(player.id, createPlayer(player, at, "pending"));
    } else {
      room.activePlayers.set(player.id, createPlayer(player, at));
    }

    this.#playerRooms.set(player.id, room.id);
    assertValidRoom(room);
    return { ok: true, value: { room, staged } };
  }

  leaveRoom(playerId: PlayerId): RegistryResult<LeaveOutcome> {
    const roomId = this.#playerRooms.get(playerId);
    const room = roomId === undefined ? undefined : this.#rooms.get(roomId);
    const player = room?.activePlayers.get(playerId) ?? room?.pendingPlayers.get(playerId);
    if (!room || !player) {
      this.#playerRooms.delete(playerId);
      return reject("NotInRoom");
    }

    room.activePlayers.delete(playerId);
    room.pendingPlayers.delete(playerId);
    this.#playerRooms.delete(playerId);

    if (isHost(room, playerId)) {
      this.closeRoom(room.id);
      return { ok: true, value: { room, player, closed: true } };
    }

    return { ok: true, value: { room, player, closed: false } };
  }

  closeRoom(roomId: RoomId): boolean {
    const room = this.#rooms.get(roomId);
    if (!room) return false;

    room.phase = "closed";
    room.paused = false;
    for (const playerId of [...room.activePlayers.keys(), ...room.pendingPlayers.keys()]) {
      this.#playerRooms.delete(playerId);
    }
    this.#rooms.delete(roomId);
    return true;
  }

  pauseRoom(roomId: RoomId, requester: PlayerId): RegistryResult<Room> {
    const room = this.#rooms.get(roomId);
    if (!room) return reject("NotFound");
    if (!isHost(room, requester)) return reject("NotHost");
    if (room.paused) return reject("AlreadyPaused");
    if (room.phase !== "active") return reject("NotStarted");

    room.paused = true;
    room.phase = "paused";
    return { ok: true, value: room };
  }

  resumeRoom(roomId: RoomId, requester: PlayerId): RegistryResult<ResumeOutcome> {
    const room = this.#rooms.get(roomId);
    if (!room) return reject("NotFound");
    if (!isHost(room, requester)) return reject("NotHost");
    if (!room.paused) return reject("NotPaused");

    const appliedTimeoutSec = applyPendingConfig(room);
    const admitted = activatePendingPlayers(room);
    room.paused = false;
    room.phase = "active";
    assertValidRoom(room);

    return {
      ok: true,
      value: {
        room,
        admitted,
        ...(appliedTimeoutSec !== undefined ? { appliedTimeoutSec } : {}),
      },
    };
  }

  stageConfig(
    roomId: RoomId,
    requester: PlayerId,
    change: StagedChange,
  ): RegistryResult<Room> {
    const room = this.#rooms.get(roomId);
    if (!room) return reject("NotFound");
    if (!isHost(room, requester)) return reject("NotHost");
    if (!room.paused) return reject("NotPaused");

    if (change.kind === "timeout") {
      room.pendingConfig.roundTimeoutSec = change.seconds;
    } else {
      room.pendingConfig.note = change.text;
    }
    return { ok: true, value: room };
  }

  membership(): ReadonlyMap<PlayerId, RoomId> {
    return new Map(this.#playerRooms);
  }

  clear(): void {
    for (const roomId of [...this.#rooms.keys()]) {
      this.closeRoom(roomId);
    }
    this.#playerRooms.clear();
  }

  #freshId(): RoomId {
    let id = this.#generateId();
    while (this.#rooms.has(id)) {
      id = this.#generateId();
    }
    return id;
  }
}

function reject(reason: RejectionCode): { readonly ok: false; readonly reason: RejectionCode } {
  return { ok: false, reason };
}
