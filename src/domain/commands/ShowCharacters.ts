import { charactersInfo } from "../entities/RoomRules.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply, requireRoomOf } from "./Notifications.js";

export class ShowCharacters extends Command {
  readonly type = "ShowCharacters" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const room = requireRoomOf(ctx, this.issuer.id);
    const info = charactersInfo(room);

    await reply(ctx, this.issuer.address, info ? `Characters\n\n${info}` : "No characters yet");
  }
}
