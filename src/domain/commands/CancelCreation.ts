import { StateConflictError } from "../errors/StateConflictError.js";
import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export class CancelCreation extends Command {
  readonly type = "CancelCreation" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ creations, bus }: CommandContext): Promise<void> {
    if (!creations.delete(this.issuer.id)) {
      throw StateConflictError.of("NoCreationInProgress");
    }

    await reply({ bus }, this.issuer.address, "Room creation cancelled");
  }
}
