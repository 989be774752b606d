import * as v from "valibot";

import { SettingsError } from "./errors";
import {
  type Settings,
  type SettingsPatch,
  type SyncStatistics,
  settingsPatchSchema,
  settingsSchema,
} from "./schema";

export interface SettingsDefaults {
  commissionRate: number;
  syncInterval: number;
}

export const EMPTY_SYNC_STATISTICS: SyncStatistics = {
  totalSyncs: 0,
  successfulSyncs: 0,
  failedSyncs: 0,
  lastError: null,
};

export const createDefaultSettings = (
  defaults: SettingsDefaults = { commissionRate: 0.1, syncInterval: 10 },
): Settings => ({
  commissionRate: defaults.commissionRate,
  botMode: "public",
  syncEnabled: true,
  syncInterval: defaults.syncInterval,
  syncStatistics: { ...EMPTY_SYNC_STATISTICS },
  lastSyncAt: null,
});

const firstIssue = (issues: [v.BaseIssue<unknown>, ...v.BaseIssue<unknown>[]]) => {
  const [issue] = issues;
  const field = issue.path?.map((item) => String(item.key)).join(".");
  return { field, message: field ? `${field}: ${issue.message}` : issue.message };
};

/**
 * Validates an untrusted patch; throws SettingsError naming the first bad field.
 */
export const parseSettingsPatch = (input: unknown): SettingsPatch => {
  const result = v.safeParse(settingsPatchSchema, input);
  if (!result.success) {
    const { field, message } = firstIssue(result.issues);
    throw new SettingsError(`Invalid setting ${message}`, field);
  }
  return result.output;
};

/**
 * Validates a stored document, filling gaps from defaults so older documents
 * missing newer fields still load.
 */
export const parseSettingsDocument = (input: unknown, defaults: Settings): Settings => {
  const stored = input !== null && typeof input === "object" ? input : {};
  const storedStatistics =
    "syncStatistics" in stored &&
    stored.syncStatistics !== null &&
    typeof stored.syncStatistics === "object"
      ? stored.syncStatistics
      : {};
  const result = v.safeParse(settingsSchema, {
    ...defaults,
    ...stored,
    syncStatistics: { ...defaults.syncStatistics, ...storedStatistics },
  });
  if (!result.success) {
    const { field, message } = firstIssue(result.issues);
    throw new SettingsError(`Stored settings are invalid: ${message}`, field);
  }
  return result.output;
};

const withoutUndefined = <T extends object>(value: T): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));

/**
 * Merge-patch: top-level fields replace, `syncStatistics` merges field-wise.
 */
export const mergeSettings = (current: Settings, patch: SettingsPatch): Settings => {
  const { syncStatistics = {}, ...rest } = patch;
  const result = v.safeParse(settingsSchema, {
    ...current,
    ...withoutUndefined(rest),
    syncStatistics: { ...current.syncStatistics, ...withoutUndefined(syncStatistics) },
  });
  if (!result.success) {
    const { field, message } = firstIssue(result.issues);
    throw new SettingsError(`Invalid setting ${message}`, field);
  }
  return result.output;
};
