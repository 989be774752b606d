import * as v from "valibot";

export const MIN_SYNC_INTERVAL_SECONDS = 5;
export const MAX_SYNC_INTERVAL_SECONDS = 3600;

export const botModeSchema = v.picklist(["public", "maintenance"]);
export type BotMode = v.InferOutput<typeof botModeSchema>;

export const commissionRateSchema = v.pipe(v.number(), v.minValue(0), v.maxValue(1));

export const syncIntervalSchema = v.pipe(
  v.number(),
  v.integer(),
  v.minValue(MIN_SYNC_INTERVAL_SECONDS),
  v.maxValue(MAX_SYNC_INTERVAL_SECONDS),
);

const counterSchema = v.pipe(v.number(), v.integer(), v.minValue(0));

export const syncStatisticsSchema = v.object({
  totalSyncs: counterSchema,
  successfulSyncs: counterSchema,
  failedSyncs: counterSchema,
  lastError: v.nullable(v.string()),
});
export type SyncStatistics = v.InferOutput<typeof syncStatisticsSchema>;

/**
 * The persisted settings document. `lastSyncAt` is an ISO-8601 string.
 */
export const settingsSchema = v.object({
  commissionRate: commissionRateSchema,
  botMode: botModeSchema,
  syncEnabled: v.boolean(),
  syncInterval: syncIntervalSchema,
  syncStatistics: syncStatisticsSchema,
  lastSyncAt: v.nullable(v.string()),
});
export type Settings = v.InferOutput<typeof settingsSchema>;

export const settingsPatchSchema = v.strictObject({
  commissionRate: v.optional(commissionRateSchema),
  botMode: v.optional(botModeSchema),
  syncEnabled: v.optional(v.boolean()),
  syncInterval: v.optional(syncIntervalSchema),
  syncStatistics: v.optional(v.partial(syncStatisticsSchema)),
  lastSyncAt: v.optional(v.nullable(v.string())),
});
export type SettingsPatch = v.InferOutput<typeof settingsPatchSchema>;
