import { roomListing } from "../entities/RoomSummary.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export class ListRooms extends Command {
  readonly type = "ListRooms" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ registry, bus }: CommandContext): Promise<void> {
    await reply({ bus }, this.issuer.address, roomListing(registry.listRooms()));
  }
}
