import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply, requireRoomOf } from "./Notifications.js";
import { openCharacterCreation } from "./PhaseTransitions.js";

export class BeginGame extends Command {
  readonly type = "BeginGame" as const;

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
      if (room.phase !== "waiting") {
        throw StateConflictError.of("AlreadyStarted");
      }

      await openCharacterCreation(room, this.at, ctx);
    });
  }
}
