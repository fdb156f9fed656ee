import { assignDefaultCharacters, allPlayersTimedOut, markTimedOut } from "../entities/RoomRules.js";
import type { RoomId, TimePoint, TimerPhase } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast } from "./Notifications.js";
import {
  closeRoomWithTimers,
  completeGameStart,
  prepareGameStart,
  type OpeningTicket,
} from "./PhaseTransitions.js";
import { beginResolution, completeResolution, type ResolutionTicket } from "./ResolveRound.js";

type FollowUp =
  | { readonly kind: "opening"; readonly ticket: OpeningTicket }
  | { readonly kind: "resolution"; readonly ticket: ResolutionTicket };

/**
 * Delivered by the scheduler when a room timer expires. A delivery that no
 * longer matches the room does nothing: the room is closed, paused or
 * narrating, it moved to another phase or round, or the timer was cancelled
 * or replaced after this delivery was issued.
 */
export class PhaseTimeout extends Command {
  readonly type = "PhaseTimeout" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly phase: TimerPhase,
    public readonly round: number,
    public readonly at: TimePoint,
    public readonly timerSeq: number,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const followUp = await ctx.locks.runExclusive(this.roomId, () => this.#expire(ctx));

    if (followUp?.kind === "opening") {
      await completeGameStart(followUp.ticket, this.at, ctx);
    } else if (followUp?.kind === "resolution") {
      await completeResolution(followUp.ticket, this.at, ctx);
    }
  }

  async #expire(ctx: CommandContext): Promise<FollowUp | undefined> {
    const { registry, logger } = ctx;
    const room = registry.getRoom(this.roomId);

    const stale =
      !room ||
      room.paused ||
      room.narration !== undefined ||
      room.timerSeq !== this.timerSeq ||
      room.currentRound !== this.round ||
      room.phase !== (this.phase === "round" ? "active" : "character-creation");

    if (!room || stale) {
      logger?.debug("Stale timeout ignored", {
        type: this.type,
        roomId: this.roomId,
        phase: this.phase,
        round: this.round,
        timerSeq: this.timerSeq,
      });
      return undefined;
    }

    if (this.phase === "character-creation") {
      const assigned = assignDefaultCharacters(room);
      logger?.info("Character creation timed out", {
        type: this.type,
        roomId: room.id,
        assigned: assigned.length,
        at: this.at,
      });
      if (assigned.length > 0) {
        await broadcast(
          ctx,
          room,
          `Time is up! Default characters were given to: ${assigned.join(", ")}`,
        );
      }
      return { kind: "opening", ticket: await prepareGameStart(room, this.at, ctx) };
    }

    const timedOut = markTimedOut(room);
    logger?.info("Round timed out", {
      type: this.type,
      roomId: room.id,
      round: room.currentRound,
      timedOut: timedOut.length,
      at: this.at,
    });

    if (allPlayersTimedOut(room)) {
      await broadcast(ctx, room, `Nobody acted in time; room ${room.name} is closed`);
      await closeRoomWithTimers(room, this.at, ctx);
      return undefined;
    }

    if (timedOut.length > 0) {
      await broadcast(ctx, room, `Time is up! No action from: ${timedOut.join(", ")}`);
    }

    const ticket = await beginResolution(room, this.at, ctx);
    return ticket ? { kind: "resolution", ticket } : undefined;
  }
}
