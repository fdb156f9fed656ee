import { InvariantViolation, isUserFacing } from "../errors/index.js";
import type { InboundMessage, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { dispatchCommand } from "./dispatchCommand.js";
import { reply } from "./Notifications.js";
import { parseInput } from "./parseInput.js";

export type InputOutcome =
  | { readonly status: "handled"; readonly command: string }
  | { readonly status: "ignored" }
  | { readonly status: "rejected"; readonly reason: string };

/**
 * Entry point for the transport. Rejections are replied to the sender as
 * `❌ <reason>`; any other failure propagates to the caller.
 */
export async function submitInput(
  message: InboundMessage,
  ctx: CommandContext,
  at: TimePoint = Date.now(),
): Promise<InputOutcome> {
  try {
    const command = parseInput(message, at);
    if (!command) {
      return { status: "ignored" };
    }

    await dispatchCommand(command, ctx);
    return { status: "handled", command: command.type };
  } catch (error) {
    if (isUserFacing(error)) {
      await reply(ctx, message.sender.address, `❌ ${error.message}`);
      return { status: "rejected", reason: error.message };
    }

    if (error instanceof InvariantViolation) {
      ctx.logger?.error(error.message, { reason: error.reason, playerId: message.sender.id });
      return { status: "ignored" };
    }

    throw error;
  }
}
