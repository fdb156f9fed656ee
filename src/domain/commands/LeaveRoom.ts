import { allCharactersDone, allPlayersActed } from "../entities/RoomRules.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type { Room } from "../ports/RoomRegistry.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, reply, requireRoomOf } from "./Notifications.js";
import {
  closeRoomWithTimers,
  completeGameStart,
  prepareGameStart,
  type OpeningTicket,
} from "./PhaseTransitions.js";
import { beginResolution, completeResolution, type ResolutionTicket } from "./ResolveRound.js";

type FollowUp =
  | { readonly kind: "opening"; readonly ticket: OpeningTicket }
  | { readonly kind: "resolution"; readonly ticket: ResolutionTicket };

/**
 * Leaves the sender's room. The host leaving closes the room; anyone else
 * leaving may complete the round or the character roster they were holding up.
 */
export class LeaveRoom extends Command {
  readonly type = "LeaveRoom" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { id: roomId } = requireRoomOf(ctx, this.issuer.id);

    const followUp = await ctx.locks.runExclusive(roomId, async () => {
      const room = requireRoomOf(ctx, this.issuer.id);

      if (room.host === this.issuer.id) {
        await broadcast(ctx, room, `The host left; room ${room.name} is closed`);
        await closeRoomWithTimers(room, this.at, ctx);
        this.#logLeft(room, ctx);
        return undefined;
      }

      const left = ctx.registry.leaveRoom(this.issuer.id);
      if (!left.ok) {
        throw StateConflictError.of(left.reason);
      }

      this.#logLeft(room, ctx);
      await reply(ctx, this.issuer.address, `You left ${room.name}`);
      await broadcast(ctx, room, `${this.issuer.name} left the room`);

      return this.#afterDeparture(room, ctx);
    });

    if (followUp?.kind === "opening") {
      await completeGameStart(followUp.ticket, this.at, ctx);
    } else if (followUp?.kind === "resolution") {
      await completeResolution(followUp.ticket, this.at, ctx);
    }
  }

  async #afterDeparture(room: Room, ctx: CommandContext): Promise<FollowUp | undefined> {
    if (room.activePlayers.size === 0) return undefined;

    if (room.phase === "character-creation" && allCharactersDone(room)) {
      return { kind: "opening", ticket: await prepareGameStart(room, this.at, ctx) };
    }

    if (room.phase === "active" && !room.narration && allPlayersActed(room)) {
      const ticket = await beginResolution(room, this.at, ctx);
      return ticket ? { kind: "resolution", ticket } : undefined;
    }

    return undefined;
  }

  #logLeft(room: Room, { logger }: CommandContext): void {
    logger?.info("Player left", {
      type: this.type,
      roomId: room.id,
      playerId: this.issuer.id,
      closed: room.host === this.issuer.id,
      at: this.at,
    });
  }
}
