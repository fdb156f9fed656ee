import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { RoomId, Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, reply } from "./Notifications.js";

export class JoinRoom extends Command {
  readonly type = "JoinRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly roomId: RoomId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!roomId.trim()) {
      throw UserInputError.because(["Usage: /tw join <roomId>"]);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, creations, locks, config, logger } = ctx;
    creations.delete(this.issuer.id);

    await locks.runExclusive(this.roomId, async () => {
      const joined = registry.joinRoom(this.roomId, this.issuer, config.maxPlayersPerRoom, this.at);
      if (!joined.ok) {
        throw joined.reason === "NotFound"
          ? new RoomNotFoundError(this.roomId)
          : StateConflictError.of(joined.reason);
      }

      const { room, staged } = joined.value;
      logger?.info("Player joined", {
        type: this.type,
        roomId: room.id,
        playerId: this.issuer.id,
        staged,
        at: this.at,
      });

      if (staged) {
        await broadcast(
          ctx,
          room,
          `${this.issuer.name} joined and will enter when the host resumes (${room.pendingPlayers.size} waiting)`,
        );
        await reply(ctx, this.issuer.address, `Joined ${room.name}; the room is paused`);
        return;
      }

      await broadcast(ctx, room, `${this.issuer.name} joined! (${room.activePlayers.size} players)`);
      await reply(ctx, this.issuer.address, `Joined ${room.name}\nWaiting for the host to /tw begin`);
    });
  }
}
