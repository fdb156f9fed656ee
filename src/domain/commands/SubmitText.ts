/* eslint-disable functional/immutable-data */
import {
  advanceWizard,
  applySummary,
  isWizardExpired,
  roomParamsFrom,
  type PendingCreation,
} from "../entities/CreationWizard.js";
import { parseCharacterSheet } from "../entities/CharacterSheet.js";
import { charLength, preview } from "../entities/MessageFormat.js";
import { buildSummaryPrompt } from "../entities/Narration.js";
import { allCharactersDone, isNameTaken } from "../entities/RoomRules.js";
import { CollaboratorFailure } from "../errors/CollaboratorFailure.js";
import { StateConflictError } from "../errors/StateConflictError.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { FileAttachment, RoomId, Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcast, reply } from "./Notifications.js";
import { completeGameStart, prepareGameStart, type OpeningTicket } from "./PhaseTransitions.js";

const SUMMARY_FAILED = "the narrator returned nothing usable";

/**
 * Free text without a command prefix. It feeds the sender's creation wizard
 * when one is open, else their character sheet during character creation,
 * and is ignored otherwise.
 */
export class SubmitText extends Command {
  readonly type = "SubmitText" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly text: string,
    public readonly attachment: FileAttachment | undefined,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const wizard = ctx.creations.get(this.issuer.id);
    if (wizard) {
      await this.#continueWizard(wizard, ctx);
      return;
    }

    const room = ctx.registry.getRoomByPlayer(this.issuer.id);
    if (room?.phase === "character-creation") {
      await this.#submitCharacter(room.id, ctx);
      return;
    }

    ctx.logger?.debug("Free text ignored", { type: this.type, playerId: this.issuer.id });
  }

  async #continueWizard(wizard: PendingCreation, ctx: CommandContext): Promise<void> {
    const { creations, config, bus } = ctx;
    const address = this.issuer.address;

    if (isWizardExpired(wizard, this.at, config.wizardTimeoutSec)) {
      creations.delete(this.issuer.id);
      await reply({ bus }, address, "Room creation timed out; /tw create to start again");
      return;
    }

    let input = this.text;
    if (this.attachment && wizard.step === "world-setting") {
      const parsed = await this.#readAttachment(this.attachment, ctx);
      if (parsed === undefined || creations.get(this.issuer.id) !== wizard) return;
      input = parsed;
    }

    const outcome = advanceWizard(wizard, input, config, this.at);

    switch (outcome.kind) {
      case "continue":
        await reply({ bus }, address, ...outcome.replies);
        return;

      case "cancelled":
        creations.delete(this.issuer.id);
        await reply({ bus }, address, ...outcome.replies);
        return;

      case "summarize":
        await reply({ bus }, address, ...outcome.replies);
        await this.#summarize(wizard, outcome.original, ctx);
        return;

      case "confirmed":
        await this.#createRoom(wizard, ctx);
        return;
    }
  }

  async #readAttachment(
    attachment: FileAttachment,
    { fileParser, bus, logger }: CommandContext,
  ): Promise<string | undefined> {
    const address = this.issuer.address;
    await reply({ bus }, address, `Reading ${attachment.filename}...`);

    let error: string;
    try {
      const result = await fileParser.parse(attachment.url, attachment.filename);
      if (result.ok) {
        await reply({ bus }, address, `Read ${charLength(result.text)} characters`);
        return result.text;
      }
      error = result.error;
    } catch (cause) {
      const failure = new CollaboratorFailure("file-parser", "File parsing failed", { cause });
      logger?.warn(failure.message, { filename: attachment.filename, error: failure.cause });
      error = failure.message;
    }

    await reply({ bus }, address, `❌ Could not read the file: ${error}`);
    return undefined;
  }

  async #summarize(wizard: PendingCreation, original: string, ctx: CommandContext): Promise<void> {
    let summary: string | undefined;
    let failureReason = SUMMARY_FAILED;
    try {
      summary = await ctx.textGenerator.generate(buildSummaryPrompt(original, ctx.config));
    } catch (cause) {
      const failure = new CollaboratorFailure("text-generator", "Summarization failed", { cause });
      ctx.logger?.warn(failure.message, { playerId: this.issuer.id, error: failure.cause });
      failureReason = failure.message;
    }

    if (ctx.creations.get(this.issuer.id) !== wizard || wizard.step !== "summarizing") {
      return;
    }

    const replies = applySummary(wizard, summary, failureReason);
    await reply(ctx, this.issuer.address, ...replies);
  }

  async #createRoom(wizard: PendingCreation, ctx: CommandContext): Promise<void> {
    const { registry, creations, config, bus, logger } = ctx;
    creations.delete(this.issuer.id);

    const created = registry.createRoom(this.issuer, roomParamsFrom(wizard, config), this.at);
    if (!created.ok) {
      throw StateConflictError.of(created.reason);
    }

    const room = created.value;
    logger?.info("Room created", {
      type: this.type,
      roomId: room.id,
      host: this.issuer.id,
      at: this.at,
    });

    await reply(
      { bus },
      this.issuer.address,
      [
        "Room created!",
        `${room.name} | ID: ${room.id}`,
        `Timeout: ${room.roundTimeoutSec}s | World: ${charLength(room.worldSetting)} characters`,
        `Invite: /tw join ${room.id}`,
        "Start: /tw begin",
      ].join("\n"),
    );
  }

  async #submitCharacter(roomId: RoomId, ctx: CommandContext): Promise<void> {
    const ticket = await ctx.locks.runExclusive(
      roomId,
      async (): Promise<OpeningTicket | undefined> => {
        const room = ctx.registry.getRoomByPlayer(this.issuer.id);
        const player = room?.activePlayers.get(this.issuer.id);
        if (
          !room ||
          !player ||
          room.phase !== "character-creation" ||
          player.status !== "creating-character"
        ) {
          return undefined;
        }

        const character = parseCharacterSheet(this.text, ctx.config.characterSettingMaxLength);
        if (isNameTaken(room, player.id, character.name)) {
          throw UserInputError.because([
            `${character.name} is already taken in this room; pick another name`,
          ]);
        }
        player.character = character;
        player.status = "character-done";

        await broadcast(ctx, room, `${player.name} -> [${character.name}]`);
        await reply(
          ctx,
          this.issuer.address,
          `Character created!\n${character.name}\n${preview(character.setting, 80)}`,
        );

        return allCharactersDone(room) ? prepareGameStart(room, this.at, ctx) : undefined;
      },
    );

    if (ticket) {
      await completeGameStart(ticket, this.at, ctx);
    }
  }
}
