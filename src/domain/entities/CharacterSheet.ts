import { UserInputError } from "../errors/UserInputError.js";
import type { Character } from "../ports/RoomRegistry.js";
import { charLength, takeChars } from "./MessageFormat.js";

const NAME_MAX_LENGTH = 20;
const SETTING_MIN_LENGTH = 5;

/** Full-width colon first, then ASCII colon, then the first line break. */
const SEPARATORS = ["：", ":", "\n"] as const;

/**
 * Parses `Name: background, personality, skills` into a character.
 * Settings longer than `maxSettingLength` are cut and marked with an ellipsis.
 */
export function parseCharacterSheet(text: string, maxSettingLength: number): Character {
  const separator = SEPARATORS.find((candidate) => text.includes(candidate));
  if (separator === undefined) {
    throw UserInputError.because([
      "Use the format `Name: description` (or the name on its own line, then the description)",
    ]);
  }

  const index = text.indexOf(separator);
  const name = text.slice(0, index).trim();
  let setting = text.slice(index + separator.length).trim();

  const nameLength = charLength(name);
  if (nameLength < 1 || nameLength > NAME_MAX_LENGTH) {
    throw UserInputError.because([
      `Character name must be 1-${NAME_MAX_LENGTH} characters`,
    ]);
  }

  if (charLength(setting) < SETTING_MIN_LENGTH) {
    throw UserInputError.because([
      `Character description needs at least ${SETTING_MIN_LENGTH} characters`,
    ]);
  }

  if (charLength(setting) > maxSettingLength) {
    setting = `${takeChars(setting, maxSettingLength)}...`;
  }

  return { name, setting };
}
