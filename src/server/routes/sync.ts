import { Hono } from "hono";
import * as v from "valibot";

import { syncModeSchema } from "@/domains/sync";
import type { SyncService } from "@/worker/sync";

import { readJson } from "../validation";

const reconcileSchema = v.object({
  partition: v.optional(v.nullable(v.pipe(v.string(), v.trim(), v.minLength(1))), null),
  mode: v.optional(syncModeSchema, "bidirectional"),
});

const enabledSchema = v.object({ enabled: v.boolean() });

// Range checks happen in the service so the error carries the setting name
const intervalSchema = v.object({ seconds: v.number() });

export const createSyncRoute = (sync: SyncService): Hono => {
  const route = new Hono();

  route.get("/status", async (c) => c.json(await sync.getSyncStatus()));

  route.get("/compare", async (c) => c.json(await sync.compare(c.req.query("partition") ?? null)));

  route.post("/reconcile", async (c) => {
    const { partition, mode } = await readJson(c, reconcileSchema);
    return c.json(await sync.forceReconcile(partition, mode));
  });

  route.put("/enabled", async (c) => {
    const { enabled } = await readJson(c, enabledSchema);
    await sync.setSyncEnabled(enabled);
    return c.json(await sync.getSyncStatus());
  });

  route.put("/interval", async (c) => {
    const { seconds } = await readJson(c, intervalSchema);
    await sync.setSyncInterval(seconds);
    return c.json(await sync.getSyncStatus());
  });

  return route;
};
