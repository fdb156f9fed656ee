import { charLength } from "../entities/MessageFormat.js";
import { allPlayersActed, displayName, recordAction } from "../entities/RoomRules.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply, requireRoomOf } from "./Notifications.js";
import { beginResolution, completeResolution } from "./ResolveRound.js";

export class SubmitAction extends Command {
  readonly type = "SubmitAction" as const;
  readonly action: string;

  constructor(
    public readonly issuer: Sender,
    action: string,
    public readonly at: TimePoint,
  ) {
    super();

    this.action = action.trim();
    if (charLength(this.action) === 0) {
      throw UserInputError.because(["Usage: /tw act <action>"]);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    const ticket = await ctx.locks.runExclusive(roomId, async () => {
      const room = requireRoomOf(ctx, this.issuer.id);
      if (room.paused) throw StateConflictError.of("Paused");
      if (room.phase !== "active") throw StateConflictError.of("NotStarted");
      if (room.narration) throw StateConflictError.of("NarrationInProgress");

      const player = room.activePlayers.get(this.issuer.id);
      if (!player) throw StateConflictError.of("NotAPlayer");
      if (player.status === "acted") throw StateConflictError.of("AlreadyActed");

      recordAction(player, this.action, this.at);
      ctx.logger?.info("Action recorded", {
        type: this.type,
        roomId: room.id,
        round: room.currentRound,
        playerId: player.id,
        at: this.at,
      });
      await reply(ctx, this.issuer.address, `[${displayName(player)}] action recorded`);

      return allPlayersActed(room) ? beginResolution(room, this.at, ctx) : undefined;
    });

    if (ticket) {
      await completeResolution(ticket, this.at, ctx);
    }
  }
}
