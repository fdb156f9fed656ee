/* eslint-disable functional/immutable-data */
import {
  ROUND_TIMEOUT_MAX_SEC,
  ROUND_TIMEOUT_MIN_SEC,
  type EngineConfig,
} from "../EngineConfig.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { RoomParams } from "../ports/RoomRegistry.js";
import type { Address, PlayerId, Sender, TimePoint } from "../typedefs.js";
import { charLength, formatLongMessage, preview, takeChars } from "./MessageFormat.js";

export type CreationStep =
  | "room-name"
  | "timeout"
  | "world-setting"
  | "world-too-long"
  | "summarizing"
  | "confirm";

/** One player's half-filled room creation form. Private to that player. */
export interface PendingCreation {
  readonly playerId: PlayerId;
  readonly playerName: string;
  readonly address: Address;
  step: CreationStep;
  roomName?: string;
  roundTimeoutSec?: number;
  worldSetting?: string;
  originalWorldSetting?: string;
  /** Wizard clock; reset by "restart" */
  startedAt: TimePoint;
}

export type WizardOutcome =
  | { readonly kind: "continue"; readonly replies: readonly string[] }
  | {
      readonly kind: "summarize";
      readonly original: string;
      readonly replies: readonly string[];
    }
  | { readonly kind: "confirmed" }
  | { readonly kind: "cancelled"; readonly replies: readonly string[] };

export const ROOM_NAME_MAX_LENGTH = 30;
export const WORLD_SETTING_MIN_LENGTH = 10;
/** Summaries this short are treated as a failed summarization */
export const SUMMARY_MIN_LENGTH = 50;

const DEFAULT_KEYWORDS = ["default"];
const SUMMARIZE_KEYWORDS = ["summarize", "summary", "ai", "1"];
const TRUNCATE_KEYWORDS = ["truncate", "cut", "2"];
const KEEP_KEYWORDS = ["keep", "full", "3"];
const CONFIRM_KEYWORDS = ["confirm", "yes", "y", "ok"];
const CANCEL_KEYWORDS = ["cancel", "no", "n"];
const RESTART_KEYWORDS = ["restart", "reset"];
const VIEW_KEYWORDS = ["view"];

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const ROOM_NAME_PROMPT = `Enter a room name (1-${ROOM_NAME_MAX_LENGTH} characters)`;

export function startCreation(sender: Sender, at: TimePoint): PendingCreation {
  return {
    playerId: sender.id,
    playerName: sender.name,
    address: sender.address,
    step: "room-name",
    startedAt: at,
  };
}

export function isWizardExpired(
  pending: PendingCreation,
  at: TimePoint,
  timeoutSec: number,
): boolean {
  return at - pending.startedAt > timeoutSec * 1000;
}

/**
 * Feeds one input to the wizard. Valid input mutates `pending` and moves it to
 * the next step; invalid input throws {@link UserInputError} and leaves it as is.
 */
export function advanceWizard(
  pending: PendingCreation,
  input: string,
  config: EngineConfig,
  at: TimePoint,
): WizardOutcome {
  const text = input.trim();
  const keyword = text.toLowerCase();

  switch (pending.step) {
    case "room-name":
      return acceptRoomName(pending, text, config);
    case "timeout":
      return acceptTimeout(pending, keyword, config);
    case "world-setting":
      return acceptWorldSetting(pending, text, config);
    case "world-too-long":
      return resolveTooLong(pending, text, config);
    case "summarizing":
      return continueWith("Still summarizing, please wait...");
    case "confirm":
      return acceptConfirmation(pending, text, config, at);
  }
}

/** Completes a summarization started by a `summarize` outcome. */
export function applySummary(
  pending: PendingCreation,
  summary: string | undefined,
  failureReason: string,
): readonly string[] {
  const original = pending.originalWorldSetting ?? "";
  const trimmed = summary?.trim() ?? "";

  if (charLength(trimmed) > SUMMARY_MIN_LENGTH) {
    pending.worldSetting = trimmed;
    pending.step = "confirm";
    return [
      `Summary ready: ${charLength(original)} -> ${charLength(trimmed)} characters`,
      confirmationCard(pending),
    ];
  }

  pending.step = "world-too-long";
  return [`Summary failed: ${failureReason}\nChoose again: summarize / truncate / keep`];
}

export function confirmationCard(pending: PendingCreation): string {
  const world = pending.worldSetting ?? "";
  const worldLength = charLength(world);
  const original = pending.originalWorldSetting;
  const originalInfo =
    original !== undefined && charLength(original) !== worldLength
      ? ` (original ${charLength(original)} -> now ${worldLength})`
      : "";

  return [
    "Please confirm the room",
    `Name: ${pending.roomName ?? ""}`,
    `Timeout: ${pending.roundTimeoutSec ?? 0}s`,
    `World: ${worldLength} characters${originalInfo}`,
    "",
    preview(world, 200),
    "",
    "Enter: confirm | cancel | restart | view",
  ].join("\n");
}

export function roomParamsFrom(pending: PendingCreation, config: EngineConfig): RoomParams {
  return {
    name: pending.roomName ?? "Adventure",
    worldSetting: pending.worldSetting ?? "",
    ...(pending.originalWorldSetting !== undefined
      ? { originalWorldSetting: pending.originalWorldSetting }
      : {}),
    roundTimeoutSec: pending.roundTimeoutSec ?? config.defaultRoundTimeoutSec,
    characterCreationTimeoutSec: config.characterCreationTimeoutSec,
  };
}

function acceptRoomName(
  pending: PendingCreation,
  text: string,
  config: EngineConfig,
): WizardOutcome {
  const length = charLength(text);
  if (length < 1 || length > ROOM_NAME_MAX_LENGTH) {
    throw UserInputError.because([
      `Room name must be 1-${ROOM_NAME_MAX_LENGTH} characters`,
    ]);
  }

  pending.roomName = text;
  pending.step = "timeout";

  return continueWith(
    `Name: ${text}\n` +
      `Enter the round timeout in seconds (${ROUND_TIMEOUT_MIN_SEC}-${ROUND_TIMEOUT_MAX_SEC}), ` +
      `or "default" for ${config.defaultRoundTimeoutSec}s`,
  );
}

function acceptTimeout(
  pending: PendingCreation,
  keyword: string,
  config: EngineConfig,
): WizardOutcome {
  if (DEFAULT_KEYWORDS.includes(keyword)) {
    pending.roundTimeoutSec = config.defaultRoundTimeoutSec;
  } else {
    pending.roundTimeoutSec = parseRoundTimeout(keyword);
  }

  pending.step = "world-setting";

  return continueWith(
    `Timeout: ${pending.roundTimeoutSec}s\n` +
      "Enter the world setting: type it, or upload a .txt, .md or .docx file " +
      `(up to ${config.worldSettingMaxLength} characters recommended)`,
  );
}

/** Validates a round timeout typed by a player. Shared by the wizard and staged config. */
export function parseRoundTimeout(text: string): number {
  if (!INTEGER_PATTERN.test(text)) {
    throw UserInputError.because(['Enter a number of seconds or "default"']);
  }

  const seconds = Number.parseInt(text, 10);
  if (seconds < ROUND_TIMEOUT_MIN_SEC || seconds > ROUND_TIMEOUT_MAX_SEC) {
    throw UserInputError.because([
      `Enter a number between ${ROUND_TIMEOUT_MIN_SEC} and ${ROUND_TIMEOUT_MAX_SEC}`,
    ]);
  }

  return seconds;
}

function acceptWorldSetting(
  pending: PendingCreation,
  text: string,
  config: EngineConfig,
): WizardOutcome {
  if (DEFAULT_KEYWORDS.includes(text.toLowerCase()) && config.worldTemplate) {
    pending.worldSetting = config.worldTemplate;
    pending.step = "confirm";
    return continueWith(confirmationCard(pending));
  }

  const length = charLength(text);
  if (length < WORLD_SETTING_MIN_LENGTH) {
    throw UserInputError.because([
      `The world setting needs at least ${WORLD_SETTING_MIN_LENGTH} characters`,
    ]);
  }

  if (length > config.worldSettingMaxLength) {
    pending.originalWorldSetting = text;
    pending.step = "world-too-long";
    return continueWith(tooLongNotice(length, config));
  }

  pending.worldSetting = text;
  pending.step = "confirm";
  return continueWith(confirmationCard(pending));
}

function resolveTooLong(
  pending: PendingCreation,
  text: string,
  config: EngineConfig,
): WizardOutcome {
  const choice = text.toLowerCase();
  const original = pending.originalWorldSetting ?? "";
  const max = config.worldSettingMaxLength;

  if (SUMMARIZE_KEYWORDS.includes(choice)) {
    pending.step = "summarizing";
    return {
      kind: "summarize",
      original,
      replies: [`Summarizing ${charLength(original)} characters...`],
    };
  }

  if (TRUNCATE_KEYWORDS.includes(choice)) {
    pending.worldSetting = takeChars(original, max);
    pending.step = "confirm";
    return continueWith(`Truncated to the first ${max} characters`, confirmationCard(pending));
  }

  if (KEEP_KEYWORDS.includes(choice)) {
    pending.worldSetting = original;
    pending.step = "confirm";
    return continueWith(
      `Keeping all ${charLength(original)} characters`,
      confirmationCard(pending),
    );
  }

  const length = charLength(text);
  if (length >= WORLD_SETTING_MIN_LENGTH) {
    if (length <= max) {
      pending.worldSetting = text;
      delete pending.originalWorldSetting;
      pending.step = "confirm";
      return continueWith(
        `New world setting saved (${length} characters)`,
        confirmationCard(pending),
      );
    }

    pending.originalWorldSetting = text;
    return continueWith(
      `Still too long (${length} characters). Choose: summarize / truncate / keep`,
    );
  }

  return continueWith(
    "Choose: summarize / truncate / keep, " +
      `or send a new world setting (at least ${WORLD_SETTING_MIN_LENGTH} characters)`,
  );
}

function acceptConfirmation(
  pending: PendingCreation,
  text: string,
  config: EngineConfig,
  at: TimePoint,
): WizardOutcome {
  const choice = text.toLowerCase();

  if (CONFIRM_KEYWORDS.includes(choice)) {
    return { kind: "confirmed" };
  }

  if (CANCEL_KEYWORDS.includes(choice)) {
    return { kind: "cancelled", replies: ["Room creation cancelled"] };
  }

  if (RESTART_KEYWORDS.includes(choice)) {
    pending.step = "room-name";
    delete pending.roomName;
    delete pending.roundTimeoutSec;
    delete pending.worldSetting;
    delete pending.originalWorldSetting;
    pending.startedAt = at;
    return continueWith(`Starting over\n${ROOM_NAME_PROMPT}`);
  }

  if (VIEW_KEYWORDS.includes(choice)) {
    const world = pending.worldSetting ?? "";
    return continueWith(
      formatLongMessage(
        world,
        config.chunkSize,
        `Full world setting (${charLength(world)} characters)`,
      ),
    );
  }

  return continueWith("Enter: confirm | cancel | restart | view");
}

function tooLongNotice(length: number, config: EngineConfig): string {
  const max = config.worldSettingMaxLength;
  return [
    `The world setting is too long: ${length} characters (limit ${max}).`,
    "Choose:",
    `1. "summarize" - condense it to about ${config.worldSettingSummaryLength} characters`,
    `2. "truncate" - keep the first ${max} characters`,
    '3. "keep" - use the full text',
    "4. or send a shorter world setting",
  ].join("\n");
}

function continueWith(...replies: string[]): WizardOutcome {
  return { kind: "continue", replies };
}
