import type { PendingCreation } from "../entities/CreationWizard.js";
import type { PlayerId } from "../typedefs.js";

/** Holds at most one in-progress creation wizard per player. */
export interface CreationStore {
  get(playerId: PlayerId): PendingCreation | undefined;
  put(creation: PendingCreation): void;
  delete(playerId: PlayerId): boolean;
  clear(): void;
}
