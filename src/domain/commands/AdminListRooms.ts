import { adminListing } from "../entities/RoomSummary.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export class AdminListRooms extends Command {
  readonly type = "AdminListRooms" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ registry, bus, config }: CommandContext): Promise<void> {
    if (!config.adminIds.includes(this.issuer.id)) {
      throw StateConflictError.of("NotAdmin");
    }

    await reply({ bus }, this.issuer.address, adminListing(registry.listRooms()));
  }
}
