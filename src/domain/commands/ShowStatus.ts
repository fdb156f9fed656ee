import { roomStatus } from "../entities/RoomSummary.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type { RoomId, Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export class ShowStatus extends Command {
  readonly type = "ShowStatus" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly roomId: RoomId | undefined,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ registry, bus }: CommandContext): Promise<void> {
    const room =
      this.roomId === undefined
        ? registry.getRoomByPlayer(this.issuer.id)
        : registry.getRoom(this.roomId);

    if (!room) {
      throw this.roomId === undefined
        ? StateConflictError.of("NotInRoom")
        : new RoomNotFoundError(this.roomId);
    }

    await reply({ bus }, this.issuer.address, roomStatus(room));
  }
}
