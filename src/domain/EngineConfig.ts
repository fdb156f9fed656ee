import type { PlayerId } from "./typedefs.js";

export interface EngineConfig {
  readonly maxRooms: number;
  readonly maxPlayersPerRoom: number;
  readonly defaultRoundTimeoutSec: number;
  readonly characterCreationTimeoutSec: number;
  /** How long a creation wizard may sit idle before the next input discards it */
  readonly wizardTimeoutSec: number;
  readonly worldSettingMaxLength: number;
  readonly worldSettingSummaryLength: number;
  /** Used by "default" in the wizard and by quick-create; empty means none configured */
  readonly worldTemplate: string;
  readonly chunkSize: number;
  readonly openingMaxLength: number;
  readonly narrationMaxLength: number;
  readonly historyRoundsInContext: number;
  readonly characterSettingMaxLength: number;
  readonly narratorStyle: string;
  readonly adminIds: readonly PlayerId[];
}

export type EngineConfigOverrides = Partial<EngineConfig>;

export const ROUND_TIMEOUT_MIN_SEC = 30;
export const ROUND_TIMEOUT_MAX_SEC = 600;

export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return {
    maxRooms: overrides.maxRooms ?? 10,
    maxPlayersPerRoom: overrides.maxPlayersPerRoom ?? 8,
    defaultRoundTimeoutSec: overrides.defaultRoundTimeoutSec ?? 300,
    characterCreationTimeoutSec: overrides.characterCreationTimeoutSec ?? 180,
    wizardTimeoutSec: overrides.wizardTimeoutSec ?? 300,
    worldSettingMaxLength: overrides.worldSettingMaxLength ?? 4000,
    worldSettingSummaryLength: overrides.worldSettingSummaryLength ?? 2000,
    worldTemplate: overrides.worldTemplate ?? "",
    chunkSize: overrides.chunkSize ?? 1000,
    openingMaxLength: overrides.openingMaxLength ?? 400,
    narrationMaxLength: overrides.narrationMaxLength ?? 500,
    historyRoundsInContext: overrides.historyRoundsInContext ?? 5,
    characterSettingMaxLength: overrides.characterSettingMaxLength ?? 500,
    narratorStyle: overrides.narratorStyle ?? "vivid, cinematic, with moderate detail",
    adminIds: [...(overrides.adminIds ?? [])],
  };
}
