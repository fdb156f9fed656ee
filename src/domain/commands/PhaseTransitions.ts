import { buildOpeningPrompt, OPENING_FALLBACK } from "../entities/Narration.js";
import {
  displayName,
  nextTimerSeq,
  startCharacterCreation,
  startNewRound,
} from "../entities/RoomRules.js";
import { preview } from "../entities/MessageFormat.js";
import type { Room } from "../ports/RoomRegistry.js";
import type { RoomId, TimePoint, TimerPhase } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { broadcast, generateOr } from "./Notifications.js";

type PhaseTransitionContext = Pick<
  CommandContext,
  "registry" | "bus" | "logger" | "scheduler" | "config"
>;

const WORLD_PREVIEW_LENGTH = 300;

/** Everything needed to finish a game start once the lock is released. */
export interface OpeningTicket {
  readonly roomId: RoomId;
  readonly prompt: string;
}

export async function openCharacterCreation(
  room: Room,
  at: TimePoint,
  { bus, scheduler, logger }: PhaseTransitionContext,
): Promise<void> {
  startCharacterCreation(room, at);

  await scheduler.scheduleTimeout(
    room.id,
    "character-creation",
    room.currentRound,
    room.characterCreationTimeoutSec * 1000,
    nextTimerSeq(room),
  );

  logger?.info("Room entering character creation", {
    roomId: room.id,
    at,
    players: room.activePlayers.size,
  });

  await broadcast(
    { bus },
    room,
    [
      `${room.name} - character creation`,
      "",
      "[World preview]",
      preview(room.worldSetting, WORLD_PREVIEW_LENGTH),
      "",
      `Create your character within ${room.characterCreationTimeoutSec}s`,
      "Format: Name: background, personality, skills",
      "Example: Elin: elven archer, calm, expert tracker",
    ].join("\n"),
  );
}

/**
 * Moves the room into its first round and marks the opening narration as in
 * flight. Call with the room lock held, then pass the ticket to
 * {@link completeGameStart} after releasing it.
 */
export async function prepareGameStart(
  room: Room,
  at: TimePoint,
  { scheduler, config }: PhaseTransitionContext,
): Promise<OpeningTicket> {
  await cancelRoomTimer(room, "character-creation", { scheduler });

  room.phase = "active";
  startNewRound(room, at);
  room.narration = "opening";

  return { roomId: room.id, prompt: buildOpeningPrompt(room, config) };
}

export async function completeGameStart(
  ticket: OpeningTicket,
  at: TimePoint,
  ctx: PhaseTransitionContext & Pick<CommandContext, "locks" | "textGenerator">,
): Promise<void> {
  const opening = await generateOr(ctx, ticket.prompt, OPENING_FALLBACK, {
    roomId: ticket.roomId,
    kind: "opening",
  });

  await ctx.locks.runExclusive(ticket.roomId, async () => {
    const room = ctx.registry.getRoom(ticket.roomId);
    if (!room || room.narration !== "opening") {
      ctx.logger?.info("Opening narration discarded", { roomId: ticket.roomId, at });
      return;
    }

    delete room.narration;

    await broadcast(ctx, room, openingMessage(room, opening));
    if (!room.paused) {
      await scheduleRoundTimer(room, ctx);
    }

    ctx.logger?.info("Game started", {
      roomId: room.id,
      at,
      players: room.activePlayers.size,
    });
  });
}

export async function scheduleRoundTimer(
  room: Room,
  { scheduler }: Pick<CommandContext, "scheduler">,
): Promise<void> {
  await scheduler.scheduleTimeout(
    room.id,
    "round",
    room.currentRound,
    room.roundTimeoutSec * 1000,
    nextTimerSeq(room),
  );
}

/** Call with the room lock held; a delivery already on its way is stale afterwards. */
export async function cancelRoomTimer(
  room: Room,
  phase: TimerPhase,
  { scheduler }: Pick<CommandContext, "scheduler">,
): Promise<void> {
  nextTimerSeq(room);
  await scheduler.cancelTimeout(room.id, phase);
}

/** Cancels both of the room's timers and drops it from the registry. */
export async function closeRoomWithTimers(
  room: Room,
  at: TimePoint,
  { registry, scheduler, logger }: Pick<CommandContext, "registry" | "scheduler" | "logger">,
): Promise<void> {
  await cancelRoomTimer(room, "character-creation", { scheduler });
  await cancelRoomTimer(room, "round", { scheduler });
  registry.closeRoom(room.id);

  logger?.info("Room closed", { roomId: room.id, at, round: room.currentRound });
}

export function roundFooter(room: Room): string {
  return room.paused
    ? `Round ${room.currentRound} will begin when the host resumes`
    : `Round ${room.currentRound} | Timeout ${room.roundTimeoutSec}s\nUse /tw act <action> to play`;
}

function openingMessage(room: Room, opening: string): string {
  const roster = [...room.activePlayers.values()].map(
    (player) => `  - ${displayName(player)} (${player.name})`,
  );

  return [
    "==== The adventure begins ====",
    "",
    "[Characters]",
    ...roster,
    "",
    "[Opening]",
    opening,
    "",
    "----------------",
    roundFooter(room),
  ].join("\n");
}
