import type { RoomId } from "../typedefs.js";

/**
 * Serializes every state change of one room. Tasks for the same room run one at
 * a time in submission order; tasks for different rooms never wait on each other.
 *
 * A task must not await a backend call or another `runExclusive` for the same room.
 */
export interface RoomLock {
  runExclusive<T>(roomId: RoomId, task: () => Promise<T> | T): Promise<T>;
}
