import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, requireRoomOf } from "./Notifications.js";
import { closeRoomWithTimers } from "./PhaseTransitions.js";

export class CloseRoom extends Command {
  readonly type = "CloseRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    await ctx.locks.runExclusive(roomId, async () => {
      const room = requireRoomOf(ctx, this.issuer.id);
      if (room.host !== this.issuer.id) {
        throw StateConflictError.of("NotHost");
      }

      await broadcast(ctx, room, `Room ${room.name} has been closed`);
      await closeRoomWithTimers(room, this.at, ctx);
    });
  }
}
