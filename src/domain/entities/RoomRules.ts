/* eslint-disable functional/immutable-data */
import { InvariantViolation } from "../errors/InvariantViolation.js";
import type { Player, Room } from "../ports/RoomRegistry.js";
import type {
  Address,
  PlayerId,
  PlayerStatus,
  RoomPhase,
  Sender,
  TimePoint,
} from "../typedefs.js";
import { preview } from "./MessageFormat.js";

export const DEFAULT_CHARACTER_SETTING = "A mysterious adventurer";

const NARRATION_PREVIEW_LENGTH = 100;

export function createPlayer(
  sender: Sender,
  at: TimePoint,
  status: PlayerStatus = "active",
): Player {
  return {
    id: sender.id,
    name: sender.name,
    address: sender.address,
    status,
    joinedAt: at,
  };
}

/** Character name once one exists, otherwise the player's own name. */
export function displayName(player: Player): string {
  return player.character?.name ?? player.name;
}

export function isHost(room: Room, playerId: string): boolean {
  return room.host === playerId;
}

/** Deduplicated reply addresses of everyone in the room, pending joiners included. */
export function roomRecipients(room: Room): Address[] {
  const addresses = new Set<Address>();
  for (const player of [...room.activePlayers.values(), ...room.pendingPlayers.values()]) {
    addresses.add(player.address);
  }
  return [...addresses];
}

export function startCharacterCreation(room: Room, at: TimePoint): void {
  room.phase = "character-creation";
  room.characterCreationStartedAt = at;
  for (const player of room.activePlayers.values()) {
    player.status = "creating-character";
  }
}

export function allCharactersDone(room: Room): boolean {
  return [...room.activePlayers.values()].every(
    (player) => player.status === "character-done",
  );
}

/** Whether an active player other than `playerId` already goes by `name`, ignoring case. */
export function isNameTaken(room: Room, playerId: PlayerId, name: string): boolean {
  const wanted = name.toLowerCase();
  return [...room.activePlayers.values()].some(
    (player) => player.id !== playerId && displayName(player).toLowerCase() === wanted,
  );
}

function characterNameTaken(room: Room, name: string): boolean {
  const wanted = name.toLowerCase();
  return [...room.activePlayers.values()].some(
    (player) => player.character?.name.toLowerCase() === wanted,
  );
}

/**
 * Gives every player still writing a character the default one, named after
 * the player (`bob 2`, `bob 3`, ... when that name is taken).
 * Returns the names of the players that were filled in.
 */
export function assignDefaultCharacters(room: Room): string[] {
  const assigned: string[] = [];
  for (const player of room.activePlayers.values()) {
    if (player.status !== "creating-character") continue;
    let name = player.name;
    for (let suffix = 2; characterNameTaken(room, name); suffix += 1) {
      name = `${player.name} ${suffix}`;
    }
    player.character = { name, setting: DEFAULT_CHARACTER_SETTING };
    player.status = "character-done";
    assigned.push(player.name);
  }
  return assigned;
}

/** Invalidates every timer issued so far; returns the value for the next one. */
export function nextTimerSeq(room: Room): number {
  room.timerSeq += 1;
  return room.timerSeq;
}

/** The only place the round counter moves. */
export function startNewRound(room: Room, at: TimePoint): void {
  room.currentRound += 1;
  room.roundStartedAt = at;
  for (const player of room.activePlayers.values()) {
    player.status = "active";
    delete player.lastAction;
  }
}

/** Restarts the same round after it ended with no actions at all. */
export function reopenRound(room: Room, at: TimePoint): void {
  room.roundStartedAt = at;
  for (const player of room.activePlayers.values()) {
    if (player.status === "timed-out") player.status = "active";
  }
}

export function recordAction(player: Player, action: string, at: TimePoint): void {
  player.lastAction = action;
  player.lastActionAt = at;
  player.status = "acted";
}

export function allPlayersActed(room: Room): boolean {
  return [...room.activePlayers.values()].every((player) => player.status !== "active");
}

export function allPlayersTimedOut(room: Room): boolean {
  return [...room.activePlayers.values()].every(
    (player) => player.status === "timed-out",
  );
}

/** Marks everyone who has not acted as timed out; returns their display names. */
export function markTimedOut(room: Room): string[] {
  const timedOut: string[] = [];
  for (const player of room.activePlayers.values()) {
    if (player.status !== "active") continue;
    player.status = "timed-out";
    timedOut.push(displayName(player));
  }
  return timedOut;
}

export function roundActions(room: Room): Record<string, string> {
  const actions: Record<string, string> = {};
  for (const player of room.activePlayers.values()) {
    if (player.lastAction) {
      actions[displayName(player)] = player.lastAction;
    }
  }
  return actions;
}

export function charactersInfo(room: Room): string | undefined {
  const lines: string[] = [];
  for (const player of room.activePlayers.values()) {
    if (player.character) {
      lines.push(`[${player.character.name}]\n${player.character.setting}`);
    }
  }
  return lines.length > 0 ? lines.join("\n\n") : undefined;
}

/** Most recent `count` rounds, oldest first. The log itself is never trimmed. */
export function recentHistory(room: Room, count: number): Room["history"] {
  return count > 0 ? room.history.slice(-count) : [];
}

export function buildGameContext(room: Room, historyRounds: number): string {
  const parts = [`[World]\n${room.worldSetting}`];

  const characters = charactersInfo(room);
  if (characters) {
    parts.push(`\n[Characters]\n${characters}`);
  }

  if (room.hostNote) {
    parts.push(`\n[Host note]\n${room.hostNote}`);
  }

  const history = recentHistory(room, historyRounds);
  if (history.length > 0) {
    parts.push("\n[History]");
    for (const entry of history) {
      parts.push(`\nRound ${entry.round}:`);
      for (const [name, action] of Object.entries(entry.actions)) {
        parts.push(`  - ${name}: ${action}`);
      }
      parts.push(`  Narrator: ${preview(entry.narration, NARRATION_PREVIEW_LENGTH)}`);
    }
  }

  return parts.join("\n");
}

export function activatePendingPlayers(room: Room): Player[] {
  const admitted = [...room.pendingPlayers.values()];
  for (const player of admitted) {
    player.status = "active";
    room.activePlayers.set(player.id, player);
  }
  room.pendingPlayers.clear();
  return admitted;
}

/**
 * Applies what the host staged during the pause and clears the staging slot.
 * Returns the new round timeout when one was applied.
 */
export function applyPendingConfig(room: Room): number | undefined {
  const { roundTimeoutSec, note } = room.pendingConfig;
  if (roundTimeoutSec !== undefined) {
    room.roundTimeoutSec = roundTimeoutSec;
  }
  if (note !== undefined) {
    room.hostNote = note;
  }
  room.pendingConfig = {};
  return roundTimeoutSec;
}

const LEGAL_STATUSES: Record<RoomPhase, readonly PlayerStatus[]> = {
  waiting: ["active"],
  "character-creation": ["creating-character", "character-done"],
  active: ["active", "acted", "timed-out"],
  paused: ["active", "acted", "timed-out"],
  closed: [],
};

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the room invariants
// -----------------------------------------------------------------------------
export function assertValidRoom(room: Room): void {
  const fail = (reason: string): never => {
    throw new InvariantViolation(reason, room);
  };

  if (room.phase === "closed") fail("closed room is still registered");
  if ((room.phase === "paused") !== room.paused) fail("paused flag disagrees with phase");
  if (!Number.isInteger(room.currentRound) || room.currentRound < 0)
    fail("round number must be a non-negative integer");
  if (!room.activePlayers.has(room.host)) fail("host is not an active player");

  for (const playerId of room.pendingPlayers.keys()) {
    if (room.activePlayers.has(playerId)) fail(`player ${playerId} is both active and pending`);
  }

  const legal = LEGAL_STATUSES[room.phase];
  for (const player of room.activePlayers.values()) {
    if (!legal.includes(player.status))
      fail(`status ${player.status} is illegal during ${room.phase}`);
  }

  for (const player of room.pendingPlayers.values()) {
    if (player.status !== "pending") fail(`pending player ${player.id} has status ${player.status}`);
  }
}
