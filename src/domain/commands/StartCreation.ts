import { isWizardExpired, ROOM_NAME_PROMPT, startCreation } from "../entities/CreationWizard.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export class StartCreation extends Command {
  readonly type = "StartCreation" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ registry, creations, bus, config, logger }: CommandContext): Promise<void> {
    if (registry.getRoomByPlayer(this.issuer.id)) {
      throw StateConflictError.of("AlreadyInARoom");
    }

    const existing = creations.get(this.issuer.id);
    if (existing && !isWizardExpired(existing, this.at, config.wizardTimeoutSec)) {
      throw StateConflictError.of("CreationInProgress");
    }

    if (!registry.canCreateRoom()) {
      throw StateConflictError.of("AtCapacity");
    }

    creations.put(startCreation(this.issuer, this.at));

    logger?.info("Room creation started", {
      type: this.type,
      playerId: this.issuer.id,
      at: this.at,
    });

    await reply(
      { bus },
      this.issuer.address,
      `Creating a new room\n${ROOM_NAME_PROMPT}\n/tw cancel to abort`,
    );
  }
}
