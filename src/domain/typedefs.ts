/**
 * Core domain typedefs used throughout the engine.
 * These are simple aliases for now; you can later evolve them into
 * branded types for stronger compile-time safety.
 */

/** Unique identifier of a room */
export type RoomId = string;

/** Unique identifier of a player, as reported by the transport */
export type PlayerId = string;

/** Opaque reply address understood by the transport (a chat, a socket channel...) */
export type Address = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Coarse lifecycle stage of a room */
export type RoomPhase =
  | "waiting"
  | "character-creation"
  | "active"
  | "paused"
  | "closed";

/** Per-player status; which values are legal depends on the room phase */
export type PlayerStatus =
  | "active"
  | "pending"
  | "timed-out"
  | "acted"
  | "creating-character"
  | "character-done";

/** The two timers a room can own */
export type TimerPhase = "character-creation" | "round";

/** Identity of whoever sent an inbound message */
export interface Sender {
  readonly id: PlayerId;
  readonly name: string;
  readonly address: Address;
}

/** Uploaded document attached to an inbound message */
export interface FileAttachment {
  readonly url: string;
  readonly filename: string;
}

/** One unit of input delivered by the transport: a command or free text */
export interface InboundMessage {
  readonly sender: Sender;
  readonly text: string;
  readonly attachment?: FileAttachment;
}
