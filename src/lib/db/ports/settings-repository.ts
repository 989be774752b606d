import type { Settings, SettingsPatch } from "@/domains/settings";

/**
 * Singleton settings document, created with defaults on first read.
 */
export interface SettingsRepository {
  get(): Promise<Settings>;
  /** Merge-patch, last write wins */
  update(patch: SettingsPatch): Promise<Settings>;
}
