import type { Player, Room } from "../ports/RoomRegistry.js";
import type { PlayerStatus, RoomPhase } from "../typedefs.js";

const PHASE_LABELS: Record<RoomPhase, string> = {
  waiting: "waiting for players",
  "character-creation": "creating characters",
  active: "in progress",
  paused: "paused",
  closed: "closed",
};

const STATUS_LABELS: Record<PlayerStatus, string> = {
  active: "thinking",
  pending: "joins on resume",
  "timed-out": "timed out",
  acted: "acted",
  "creating-character": "writing character",
  "character-done": "ready",
};

export function phaseLabel(room: Room): string {
  return PHASE_LABELS[room.phase];
}

export function hostName(room: Room): string {
  return room.activePlayers.get(room.host)?.name ?? "?";
}

function playerLine(player: Player): string {
  const character = player.character ? ` [${player.character.name}]` : "";
  return `  - ${player.name}${character} (${STATUS_LABELS[player.status]})`;
}

export function roomStatus(room: Room): string {
  const lines = [
    room.name,
    `ID: ${room.id}`,
    `Host: ${hostName(room)}`,
    `Phase: ${phaseLabel(room)}`,
    `Round ${room.currentRound} | Timeout ${room.roundTimeoutSec}s`,
    `Players (${room.activePlayers.size}):`,
    ...[...room.activePlayers.values()].map(playerLine),
  ];

  if (room.pendingPlayers.size > 0) {
    lines.push(`Waiting to join (${room.pendingPlayers.size}):`);
    lines.push(...[...room.pendingPlayers.values()].map(playerLine));
  }

  return lines.join("\n");
}

export function roomListing(rooms: readonly Room[]): string {
  if (rooms.length === 0) {
    return "No rooms yet\n/tw create to start one";
  }

  return [
    `Rooms (${rooms.length})`,
    ...rooms.map(
      (room) =>
        `${room.name} (${phaseLabel(room)})\n   ID: ${room.id} | players: ${room.activePlayers.size}`,
    ),
  ].join("\n");
}

/** Operator view: every room with its host, round and waiting joiners. */
export function adminListing(rooms: readonly Room[]): string {
  if (rooms.length === 0) {
    return "No rooms";
  }

  return [
    `All rooms (${rooms.length})`,
    ...rooms.map((room) =>
      [
        `${room.name}`,
        `   ID: ${room.id}`,
        `   Host: ${hostName(room)}`,
        `   Phase: ${phaseLabel(room)} | round ${room.currentRound}`,
        `   Players: ${room.activePlayers.size} (+${room.pendingPlayers.size} waiting)`,
      ].join("\n"),
    ),
  ].join("\n");
}
