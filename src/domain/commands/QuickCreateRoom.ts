import { ROOM_NAME_MAX_LENGTH } from "../entities/CreationWizard.js";
import { charLength } from "../entities/MessageFormat.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export const QUICK_ROOM_NAME = "Quick Adventure";
export const QUICK_WORLD_SETTING =
  "A world of fantasy and adventure where magic and swordplay live side by side, " +
  "and danger and opportunity go hand in hand.";

/** Creates a room in one step with the default timeout and world. */
export class QuickCreateRoom extends Command {
  readonly type = "QuickCreateRoom" as const;
  readonly roomName: string;

  constructor(
    public readonly issuer: Sender,
    roomName: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();

    const name = roomName?.trim() || QUICK_ROOM_NAME;
    if (charLength(name) > ROOM_NAME_MAX_LENGTH) {
      throw UserInputError.because([`Room name must be 1-${ROOM_NAME_MAX_LENGTH} characters`]);
    }
    this.roomName = name;
  }

  async execute({ registry, creations, bus, config, logger }: CommandContext): Promise<void> {
    if (registry.getRoomByPlayer(this.issuer.id)) {
      throw StateConflictError.of("AlreadyInARoom");
    }

    creations.delete(this.issuer.id);

    const created = registry.createRoom(
      this.issuer,
      {
        name: this.roomName,
        worldSetting: config.worldTemplate || QUICK_WORLD_SETTING,
        roundTimeoutSec: config.defaultRoundTimeoutSec,
        characterCreationTimeoutSec: config.characterCreationTimeoutSec,
      },
      this.at,
    );

    if (!created.ok) {
      throw StateConflictError.of(created.reason);
    }

    const room = created.value;
    logger?.info("Room created", {
      type: this.type,
      roomId: room.id,
      host: this.issuer.id,
      at: this.at,
    });

    await reply(
      { bus },
      this.issuer.address,
      [
        "Quick room created!",
        `${room.name} | ID: ${room.id}`,
        `Invite: /tw join ${room.id}`,
        "Start: /tw begin",
      ].join("\n"),
    );
  }
}
