import { Hono } from "hono";
import * as v from "valibot";

import type { GroupRegistry } from "@/worker/group-registry";

import { readJson } from "../validation";

const nameSchema = v.pipe(v.string(), v.trim(), v.minLength(1), v.maxLength(100));

export const createPartitionsRoute = (registry: GroupRegistry): Hono => {
  const route = new Hono();

  route.get("/", async (c) =>
    c.json(await registry.listPartitions(c.req.query("refresh") === "true")),
  );

  route.post("/", async (c) => {
    const { name } = await readJson(c, v.object({ name: nameSchema }));
    return c.json(await registry.createPartition(name), 201);
  });

  route.get("/orphans", async (c) =>
    c.json(await registry.findOrphanedAccounts(c.req.query("refresh") === "true")),
  );

  route.delete("/orphans", async (c) => c.json({ deleted: await registry.purgeOrphanedAccounts() }));

  route.post("/:name/rename", async (c) => {
    const { to } = await readJson(c, v.object({ to: nameSchema }));
    return c.json(await registry.renamePartition(c.req.param("name"), to));
  });

  route.put("/:name/hidden", async (c) => {
    const { hidden } = await readJson(c, v.object({ hidden: v.boolean() }));
    return c.json(await registry.setPartitionHidden(c.req.param("name"), hidden));
  });

  return route;
};
