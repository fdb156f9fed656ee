/* eslint-disable functional/immutable-data */
import type { RoomLock } from "../../domain/ports/RoomLock.js";
import type { RoomId } from "../../domain/typedefs.js";

/**
 * Promise-chain mutex keyed by room. Each room has its own tail; a task starts once
 * the previous task for the same room has settled, whatever its outcome.
 */
export class InMemoryRoomLock implements RoomLock {
  #tails = new Map<RoomId, Promise<void>>();

  runExclusive<T>(roomId: RoomId, task: () => Promise<T> | T): Promise<T> {
    const previous = this.#tails.get(roomId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );

    this.#tails.set(roomId, tail);
    void tail.then(() => {
      if (this.#tails.get(roomId) === tail) {
        this.#tails.delete(roomId);
      }
    });

    return run;
  }

  /** Number of rooms with queued or running tasks. */
  get busyRooms(): number {
    return this.#tails.size;
  }
}
