import { StateConflictError } from "../errors/StateConflictError.js";
import type { StagedChange } from "../ports/RoomRegistry.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, reply, requireRoomOf } from "./Notifications.js";

/** Stages a change during a pause; it takes effect on resume. */
export class StageRoomConfig extends Command {
  readonly type = "StageRoomConfig" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly change: StagedChange,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    await ctx.locks.runExclusive(roomId, async () => {
      const staged = ctx.registry.stageConfig(roomId, this.issuer.id, this.change);
      if (!staged.ok) {
        throw StateConflictError.of(staged.reason);
      }

      const room = staged.value;
      ctx.logger?.info("Room change staged", {
        type: this.type,
        roomId,
        kind: this.change.kind,
        at: this.at,
      });

      await broadcast(
        ctx,
        room,
        this.change.kind === "timeout"
          ? "The host staged a new round timeout; it applies on resume"
          : "The host staged a note; it applies on resume",
      );
      await reply(
        ctx,
        this.issuer.address,
        this.change.kind === "timeout"
          ? `Staged: round timeout ${this.change.seconds}s (applied on resume)`
          : "Staged: host note (applied on resume)",
      );
    });
  }
}
