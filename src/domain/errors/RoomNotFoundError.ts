import type { RoomId } from "../typedefs.js";
import { StateConflictError } from "./StateConflictError.js";

export class RoomNotFoundError extends StateConflictError {
  constructor(public readonly roomId: RoomId) {
    super("NotFound", `Room ${roomId} not found`);
    this.name = "RoomNotFoundError";
  }
}
