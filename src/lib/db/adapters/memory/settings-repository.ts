import { type Settings, createDefaultSettings, mergeSettings } from "@/domains/settings";

import type { SettingsRepository } from "../../ports/settings-repository";

export const createMemorySettingsRepository = (
  defaults: Settings = createDefaultSettings(),
): SettingsRepository => {
  let document: Settings | null = null;

  const current = (): Settings => {
    document ??= structuredClone(defaults);
    return document;
  };

  return {
    get: async () => structuredClone(current()),
    update: async (patch) => {
      document = mergeSettings(current(), patch);
      return structuredClone(document);
    },
  };
};
