/* eslint-disable functional/immutable-data */
import {
  buildRoundPrompt,
  formatActionLines,
  NARRATION_PLACEHOLDER,
} from "../entities/Narration.js";
import { reopenRound, roundActions, startNewRound } from "../entities/RoomRules.js";
import type { Room } from "../ports/RoomRegistry.js";
import type { RoomId, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { broadcast, generateOr } from "./Notifications.js";
import { cancelRoomTimer, roundFooter, scheduleRoundTimer } from "./PhaseTransitions.js";

export interface ResolutionTicket {
  readonly roomId: RoomId;
  readonly round: number;
  readonly actions: Readonly<Record<string, string>>;
  readonly prompt: string;
}

/**
 * Closes the current round for input. Call with the room lock held.
 *
 * Returns a ticket for {@link completeResolution}, or `undefined` when nobody
 * acted; the same round is then restarted instead of being narrated.
 */
export async function beginResolution(
  room: Room,
  at: TimePoint,
  ctx: Pick<CommandContext, "bus" | "scheduler" | "config" | "logger">,
): Promise<ResolutionTicket | undefined> {
  await cancelRoomTimer(room, "round", ctx);

  const actions = roundActions(room);
  if (Object.keys(actions).length === 0) {
    reopenRound(room, at);
    ctx.logger?.info("Round ended with no actions; restarting", {
      roomId: room.id,
      round: room.currentRound,
      at,
    });
    await broadcast(
      ctx,
      room,
      `No actions were submitted in round ${room.currentRound}; the round starts over\n${roundFooter(room)}`,
    );
    if (!room.paused) {
      await scheduleRoundTimer(room, ctx);
    }
    return undefined;
  }

  room.narration = "round";

  return {
    roomId: room.id,
    round: room.currentRound,
    actions,
    prompt: buildRoundPrompt(room, actions, ctx.config),
  };
}

/**
 * Generates the narration without holding the lock, then records the round and
 * starts the next one. A room that closed or moved on meanwhile is left alone.
 */
export async function completeResolution(
  ticket: ResolutionTicket,
  at: TimePoint,
  ctx: CommandContext,
): Promise<void> {
  const narration = await generateOr(ctx, ticket.prompt, NARRATION_PLACEHOLDER, {
    roomId: ticket.roomId,
    round: ticket.round,
  });

  await ctx.locks.runExclusive(ticket.roomId, async () => {
    const room = ctx.registry.getRoom(ticket.roomId);
    if (!room || room.narration !== "round" || room.currentRound !== ticket.round) {
      ctx.logger?.info("Round narration discarded", {
        roomId: ticket.roomId,
        round: ticket.round,
        at,
      });
      return;
    }

    room.history.push({ round: ticket.round, actions: ticket.actions, narration, at });
    delete room.hostNote;
    delete room.narration;
    startNewRound(room, at);

    await broadcast(ctx, room, resultMessage(ticket, narration, room));
    if (!room.paused) {
      await scheduleRoundTimer(room, ctx);
    }

    ctx.logger?.info("Round resolved", {
      roomId: room.id,
      round: ticket.round,
      actions: Object.keys(ticket.actions).length,
      at,
    });
  });
}

function resultMessage(ticket: ResolutionTicket, narration: string, room: Room): string {
  return [
    `==== Round ${ticket.round} results ====`,
    "",
    "[Actions]",
    formatActionLines(ticket.actions, "  "),
    "",
    "[Narrator]",
    narration,
    "",
    "----------------",
    roundFooter(room),
  ].join("\n");
}
