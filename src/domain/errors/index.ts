export { CollaboratorFailure, type Collaborator } from "./CollaboratorFailure.js";
export { InvariantViolation } from "./InvariantViolation.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
export { StateConflictError, type RejectionCode } from "./StateConflictError.js";
export { UserInputError } from "./UserInputError.js";

import { StateConflictError } from "./StateConflictError.js";
import { UserInputError } from "./UserInputError.js";

/** Errors whose message is meant for the player who caused them. */
export function isUserFacing(error: unknown): error is UserInputError | StateConflictError {
  return error instanceof UserInputError || error instanceof StateConflictError;
}
