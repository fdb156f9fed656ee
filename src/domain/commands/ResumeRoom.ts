import { displayName, allPlayersActed } from "../entities/RoomRules.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type { ResumeOutcome } from "../ports/RoomRegistry.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, requireRoomOf } from "./Notifications.js";
import { scheduleRoundTimer } from "./PhaseTransitions.js";
import { beginResolution, completeResolution } from "./ResolveRound.js";

/**
 * Ends a pause: applies the staged configuration, admits pending joiners and
 * either resolves a round everyone already acted in or restarts its timer.
 */
export class ResumeRoom extends Command {
  readonly type = "ResumeRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    const ticket = await ctx.locks.runExclusive(roomId, async () => {
      const resumed = ctx.registry.resumeRoom(roomId, this.issuer.id);
      if (!resumed.ok) {
        throw StateConflictError.of(resumed.reason);
      }

      const { room } = resumed.value;
      ctx.logger?.info("Room resumed", {
        type: this.type,
        roomId: room.id,
        round: room.currentRound,
        admitted: resumed.value.admitted.length,
        at: this.at,
      });

      await broadcast(ctx, room, resumeNotice(resumed.value));

      if (room.narration) return undefined;
      if (allPlayersActed(room)) return beginResolution(room, this.at, ctx);

      room.roundStartedAt = this.at;
      await scheduleRoundTimer(room, ctx);
      return undefined;
    });

    if (ticket) {
      await completeResolution(ticket, this.at, ctx);
    }
  }
}

function resumeNotice({ room, admitted, appliedTimeoutSec }: ResumeOutcome): string {
  const lines = [`Resumed! Round ${room.currentRound}`];
  if (admitted.length > 0) {
    lines.push(`Joining now: ${admitted.map(displayName).join(", ")}`);
  }
  if (appliedTimeoutSec !== undefined) {
    lines.push(`Round timeout is now ${appliedTimeoutSec}s`);
  }
  if (room.hostNote) {
    lines.push(`Host note: ${room.hostNote}`);
  }
  lines.push("Use /tw act <action> to play");
  return lines.join("\n");
}
