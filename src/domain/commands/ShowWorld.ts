import { charLength, formatLongMessage } from "../entities/MessageFormat.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply, requireRoomOf } from "./Notifications.js";

export class ShowWorld extends Command {
  readonly type = "ShowWorld" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const room = requireRoomOf(ctx, this.issuer.id);
    const world = room.worldSetting;

    await reply(
      ctx,
      this.issuer.address,
      formatLongMessage(world, ctx.config.chunkSize, `World setting (${charLength(world)} characters)`),
    );
  }
}
