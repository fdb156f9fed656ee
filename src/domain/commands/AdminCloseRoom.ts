import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { RoomId, Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, reply } from "./Notifications.js";
import { closeRoomWithTimers } from "./PhaseTransitions.js";

export class AdminCloseRoom extends Command {
  readonly type = "AdminCloseRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly roomId: RoomId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!roomId.trim()) {
      throw UserInputError.because(["Usage: /tw admin close <roomId>"]);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    if (!ctx.config.adminIds.includes(this.issuer.id)) {
      throw StateConflictError.of("NotAdmin");
    }

    await ctx.locks.runExclusive(this.roomId, async () => {
      const room = ctx.registry.getRoom(this.roomId);
      if (!room) {
        throw new RoomNotFoundError(this.roomId);
      }

      await broadcast(ctx, room, `Room ${room.name} was closed by an administrator`);
      await closeRoomWithTimers(room, this.at, ctx);
      await reply(ctx, this.issuer.address, `Closed ${room.name} (${room.id})`);
    });
  }
}
