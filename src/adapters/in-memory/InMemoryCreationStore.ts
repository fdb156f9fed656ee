import type { PendingCreation } from "../../domain/entities/CreationWizard.js";
import type { CreationStore } from "../../domain/ports/CreationStore.js";
import type { PlayerId } from "../../domain/typedefs.js";

export class InMemoryCreationStore implements CreationStore {
  readonly #creations = new Map<PlayerId, PendingCreation>();

  get(playerId: PlayerId): PendingCreation | undefined {
    return this.#creations.get(playerId);
  }

  put(creation: PendingCreation): void {
    this.#creations.set(creation.playerId, creation);
  }

  delete(playerId: PlayerId): boolean {
    return this.#creations.delete(playerId);
  }

  clear(): void {
    this.#creations.clear();
  }

  get size(): number {
    return this.#creations.size;
  }
}
