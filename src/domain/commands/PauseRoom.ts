import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, requireRoomOf } from "./Notifications.js";
import { cancelRoomTimer } from "./PhaseTransitions.js";

export class PauseRoom extends Command {
  readonly type = "PauseRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    await ctx.locks.runExclusive(roomId, async () => {
      const paused = ctx.registry.pauseRoom(roomId, this.issuer.id);
      if (!paused.ok) {
        throw StateConflictError.of(paused.reason);
      }

      const room = paused.value;
      await cancelRoomTimer(room, "round", ctx);

      ctx.logger?.info("Room paused", {
        type: this.type,
        roomId: room.id,
        round: room.currentRound,
        at: this.at,
      });

      await broadcast(
        ctx,
        room,
        "The room is paused\n" +
          "Host: /tw config timeout <seconds> or /tw config note <text>, then /tw resume",
      );
    });
  }
}
