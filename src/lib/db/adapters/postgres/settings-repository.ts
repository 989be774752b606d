import { eq } from "drizzle-orm";

import {
  type Settings,
  createDefaultSettings,
  mergeSettings,
  parseSettingsDocument,
} from "@/domains/settings";

import type { Database } from "../../client";
import type { SettingsRepository } from "../../ports/settings-repository";
import { settings } from "../../schema";

const SETTINGS_ID = "bot_config";

export const createPostgresSettingsRepository = (
  db: Database,
  defaults: Settings = createDefaultSettings(),
): SettingsRepository => ({
  get: async () => {
    const [row] = await db.select().from(settings).where(eq(settings.id, SETTINGS_ID));
    if (row) {
      return parseSettingsDocument(row.document, defaults);
    }
    await db
      .insert(settings)
      .values({ id: SETTINGS_ID, document: defaults })
      .onConflictDoNothing();
    return structuredClone(defaults);
  },

  update: async (patch) =>
    db.transaction(async (tx) => {
      const [row] = await tx
        .select()
        .from(settings)
        .where(eq(settings.id, SETTINGS_ID))
        .for("update");
      const next = mergeSettings(row ? parseSettingsDocument(row.document, defaults) : defaults, patch);
      await tx
        .insert(settings)
        .values({ id: SETTINGS_ID, document: next, updatedAt: new Date() })
        .onConflictDoUpdate({
          target: settings.id,
          set: { document: next, updatedAt: new Date() },
        });
      return next;
    }),
});
