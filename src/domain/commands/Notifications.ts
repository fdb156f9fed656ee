import { CollaboratorFailure } from "../errors/CollaboratorFailure.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { roomRecipients } from "../entities/RoomRules.js";
import type { Room } from "../ports/RoomRegistry.js";
import type { Address, PlayerId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

type NotifyContext = Pick<CommandContext, "bus">;

export async function reply(
  { bus }: NotifyContext,
  address: Address,
  ...texts: readonly string[]
): Promise<void> {
  for (const text of texts) {
    await bus.publish([address], text);
  }
}

export async function broadcast({ bus }: NotifyContext, room: Room, text: string): Promise<void> {
  const recipients = roomRecipients(room);
  if (recipients.length === 0) return;
  await bus.publish(recipients, text);
}

/** Room the player belongs to, or a `NotInRoom` rejection. */
export function requireRoomOf(
  { registry }: Pick<CommandContext, "registry">,
  playerId: PlayerId,
): Room {
  const room = registry.getRoomByPlayer(playerId);
  if (!room) {
    throw StateConflictError.of("NotInRoom");
  }
  return room;
}

/**
 * Runs the text generator and falls back to `fallback` when it fails or
 * returns nothing. Never throws.
 */
export async function generateOr(
  { textGenerator, logger }: Pick<CommandContext, "textGenerator" | "logger">,
  prompt: string,
  fallback: string,
  meta: Record<string, unknown>,
): Promise<string> {
  try {
    const text = (await textGenerator.generate(prompt)).trim();
    return text.length > 0 ? text : fallback;
  } catch (cause) {
    const failure = new CollaboratorFailure("text-generator", "Text generation failed", {
      cause,
    });
    logger?.warn(failure.message, { ...meta, error: failure.cause });
    return fallback;
  }
}
