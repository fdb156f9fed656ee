import type { EngineConfig } from "../EngineConfig.js";
import type { Room } from "../ports/RoomRegistry.js";
import { takeChars } from "./MessageFormat.js";
import { buildGameContext, charactersInfo } from "./RoomRules.js";

export const OPENING_FALLBACK = "The adventure begins...";
export const NARRATION_PLACEHOLDER = "(The narrator stays silent.)";

const OPENING_WORLD_EXCERPT = 1500;

export function buildOpeningPrompt(room: Room, config: EngineConfig): string {
  return [
    `You are the narrator of a multiplayer text adventure. Narration style: ${config.narratorStyle}`,
    "",
    "[World]",
    takeChars(room.worldSetting, OPENING_WORLD_EXCERPT),
    "",
    "[Characters]",
    charactersInfo(room) ?? "No characters",
    "",
    `Describe the opening scene in at most ${config.openingMaxLength} characters. ` +
      "Set the atmosphere and let every character appear naturally. " +
      "Do not make decisions for the players.",
  ].join("\n");
}

export function formatActionLines(
  actions: Readonly<Record<string, string>>,
  indent = "",
): string {
  return Object.entries(actions)
    .map(([name, action]) => `${indent}- ${name}: ${action}`)
    .join("\n");
}

export function buildRoundPrompt(
  room: Room,
  actions: Readonly<Record<string, string>>,
  config: EngineConfig,
): string {
  return [
    `You are the narrator of a multiplayer text adventure. Narration style: ${config.narratorStyle}`,
    "",
    buildGameContext(room, config.historyRoundsInContext),
    "",
    `[Round ${room.currentRound} actions]`,
    formatActionLines(actions),
    "",
    `Describe what happens as a result, in at most ${config.narrationMaxLength} characters, ` +
      "keeping the story consistent. Do not make decisions for the players.",
  ].join("\n");
}

export function buildSummaryPrompt(text: string, config: EngineConfig): string {
  return (
    `Condense the following world setting to at most ${config.worldSettingSummaryLength} ` +
    `characters, keeping its core elements:\n\n${text}`
  );
}
