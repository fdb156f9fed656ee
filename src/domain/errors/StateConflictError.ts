/**
 * Every reason an operation can be refused because of the current state
 * rather than because of malformed input.
 */
export type RejectionCode =
  | "NotFound"
  | "Closed"
  | "AlreadyStarted"
  | "AlreadyInARoom"
  | "Full"
  | "AtCapacity"
  | "CreatorAlreadyInRoom"
  | "NotInRoom"
  | "NotHost"
  | "NotAdmin"
  | "AlreadyPaused"
  | "NotPaused"
  | "Paused"
  | "NotStarted"
  | "WrongPhase"
  | "NotAPlayer"
  | "AlreadyActed"
  | "NarrationInProgress"
  | "CreationInProgress"
  | "NoCreationInProgress";

const DEFAULT_MESSAGES: Record<RejectionCode, string> = {
  NotFound: "Room not found",
  Closed: "The room is closed",
  AlreadyStarted: "The game has already started",
  AlreadyInARoom: "You are already in a room; /tw leave first",
  Full: "The room is full",
  AtCapacity: "The maximum number of rooms has been reached",
  CreatorAlreadyInRoom: "You are already in a room; /tw leave first",
  NotInRoom: "You are not in a room",
  NotHost: "Only the host can do that",
  NotAdmin: "You are not an administrator",
  AlreadyPaused: "The room is already paused",
  NotPaused: "The room is not paused",
  Paused: "The room is paused",
  NotStarted: "The game has not started",
  WrongPhase: "That is not possible in the current phase",
  NotAPlayer: "You are not an active player this round",
  AlreadyActed: "You have already acted this round",
  NarrationInProgress: "The narrator is still writing; try again in a moment",
  CreationInProgress: "You are already creating a room; /tw cancel to abort",
  NoCreationInProgress: "No room creation in progress",
};

export class StateConflictError extends Error {
  constructor(
    public readonly code: RejectionCode,
    message: string = DEFAULT_MESSAGES[code],
  ) {
    super(message);
    this.name = "StateConflictError";
  }

  static of(code: RejectionCode): StateConflictError {
    return new StateConflictError(code);
  }
}
