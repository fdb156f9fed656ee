import { z } from "zod";

import { createEngineConfig, type EngineConfig } from "./core.js";

const count = z.coerce.number().int().positive();
const seconds = z.coerce.number().int().positive();

const idList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
  );

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  TALEROOM_MAX_ROOMS: count.optional(),
  TALEROOM_MAX_PLAYERS_PER_ROOM: count.optional(),
  TALEROOM_ROUND_TIMEOUT_SEC: seconds.min(30).max(600).optional(),
  TALEROOM_CHARACTER_TIMEOUT_SEC: seconds.optional(),
  TALEROOM_WIZARD_TIMEOUT_SEC: seconds.optional(),
  TALEROOM_WORLD_MAX_LENGTH: count.optional(),
  TALEROOM_WORLD_SUMMARY_LENGTH: count.optional(),
  TALEROOM_WORLD_TEMPLATE: z.string().optional(),
  TALEROOM_CHUNK_SIZE: count.optional(),
  TALEROOM_OPENING_MAX_LENGTH: count.optional(),
  TALEROOM_NARRATION_MAX_LENGTH: count.optional(),
  TALEROOM_HISTORY_ROUNDS: z.coerce.number().int().min(0).optional(),
  TALEROOM_CHARACTER_MAX_LENGTH: count.optional(),
  TALEROOM_NARRATOR_STYLE: z.string().min(1).optional(),
  TALEROOM_ADMIN_IDS: idList.optional(),
});

export interface BackendConfig {
  readonly port: number;
  readonly openai: {
    readonly apiKey: string;
    readonly model: string;
    readonly baseUrl: string;
  };
  readonly engine: EngineConfig;
}

/** Reads the backend settings from environment variables; throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      baseUrl: vars.OPENAI_BASE_URL.replace(/\/+$/, ""),
    },
    engine: createEngineConfig({
      maxRooms: vars.TALEROOM_MAX_ROOMS,
      maxPlayersPerRoom: vars.TALEROOM_MAX_PLAYERS_PER_ROOM,
      defaultRoundTimeoutSec: vars.TALEROOM_ROUND_TIMEOUT_SEC,
      characterCreationTimeoutSec: vars.TALEROOM_CHARACTER_TIMEOUT_SEC,
      wizardTimeoutSec: vars.TALEROOM_WIZARD_TIMEOUT_SEC,
      worldSettingMaxLength: vars.TALEROOM_WORLD_MAX_LENGTH,
      worldSettingSummaryLength: vars.TALEROOM_WORLD_SUMMARY_LENGTH,
      worldTemplate: vars.TALEROOM_WORLD_TEMPLATE,
      chunkSize: vars.TALEROOM_CHUNK_SIZE,
      openingMaxLength: vars.TALEROOM_OPENING_MAX_LENGTH,
      narrationMaxLength: vars.TALEROOM_NARRATION_MAX_LENGTH,
      historyRoundsInContext: vars.TALEROOM_HISTORY_ROUNDS,
      characterSettingMaxLength: vars.TALEROOM_CHARACTER_MAX_LENGTH,
      narratorStyle: vars.TALEROOM_NARRATOR_STYLE,
      adminIds: vars.TALEROOM_ADMIN_IDS,
    }),
  };
}
