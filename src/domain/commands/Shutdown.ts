import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Tears the engine down: no timer fires afterwards and every room and wizard is gone. */
export class Shutdown extends Command {
  readonly type = "Shutdown" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ registry, creations, scheduler, logger }: CommandContext): Promise<void> {
    const rooms = registry.listRooms().length;

    await scheduler.cancelAll();
    registry.clear();
    creations.clear();

    logger?.info("Engine shut down", { type: this.type, rooms, at: this.at });
  }
}
