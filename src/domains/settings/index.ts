export type { BotMode, Settings, SettingsPatch, SyncStatistics } from "./schema";
export {
  botModeSchema,
  commissionRateSchema,
  MAX_SYNC_INTERVAL_SECONDS,
  MIN_SYNC_INTERVAL_SECONDS,
  settingsPatchSchema,
  settingsSchema,
  syncIntervalSchema,
} from "./schema";

export { SettingsError } from "./errors";

export type { SettingsDefaults } from "./settings";
export {
  createDefaultSettings,
  EMPTY_SYNC_STATISTICS,
  mergeSettings,
  parseSettingsDocument,
  parseSettingsPatch,
} from "./settings";
