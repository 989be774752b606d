import { Hono } from "hono";
import * as v from "valibot";

import { botModeSchema, commissionRateSchema } from "@/domains/settings";
import type { SettingsRepository } from "@/lib/db/ports";

import { readJson } from "../validation";

// Sync fields go through /sync so the loop sees the change
const settingsPatchSchema = v.strictObject({
  commissionRate: v.optional(commissionRateSchema),
  botMode: v.optional(botModeSchema),
});

export const createSettingsRoute = (settings: SettingsRepository): Hono => {
  const route = new Hono();

  route.get("/", async (c) => c.json(await settings.get()));

  route.patch("/", async (c) => {
    const patch = await readJson(c, settingsPatchSchema);
    return c.json(await settings.update(patch));
  });

  return route;
};
