import { Hono } from "hono";
import * as v from "valibot";

import { accountRoleSchema } from "@/domains/ledger";
import type { AccountService } from "@/worker/accounts";
import type { TransferEngine } from "@/worker/transfers";

import { LEDGER_ERROR_STATUS } from "../errors";
import { parseInput, readJson } from "../validation";

const idSchema = v.pipe(v.string(), v.trim(), v.minLength(1));

const registerSchema = v.object({
  id: idSchema,
  fullName: v.pipe(v.string(), v.trim(), v.minLength(1), v.maxLength(200)),
  phone: v.optional(v.pipe(v.string(), v.trim())),
  username: v.optional(v.pipe(v.string(), v.trim())),
  role: v.optional(accountRoleSchema),
  groupId: v.optional(v.nullable(idSchema)),
});

const groupSchema = v.object({ groupId: v.nullable(idSchema) });

const historyQuerySchema = v.object({
  limit: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1), v.maxValue(100)),
  ),
});

const pointsSchema = v.object({
  actorId: idSchema,
  delta: v.pipe(v.number(), v.integer(), v.notValue(0, "delta must not be zero")),
  reason: v.optional(v.pipe(v.string(), v.maxLength(500))),
});

export interface AccountsRouteDeps {
  accounts: AccountService;
  transfers: TransferEngine;
}

export const createAccountsRoute = ({ accounts, transfers }: AccountsRouteDeps): Hono => {
  const route = new Hono();

  route.post("/", async (c) => {
    const input = await readJson(c, registerSchema);
    return c.json(await accounts.register(input), 201);
  });

  route.get("/ranking", async (c) => c.json(await accounts.getRanking(c.req.query("group"))));

  route.get("/:id", async (c) => c.json(await accounts.getAccount(c.req.param("id"))));

  route.get("/:id/history", async (c) => {
    const { limit } = parseInput(historyQuerySchema, c.req.query());
    return c.json(await accounts.getHistory(c.req.param("id"), limit));
  });

  // Lifecycle transitions
  route.post("/:id/approve", async (c) => c.json(await accounts.approve(c.req.param("id"))));
  route.post("/:id/reject", async (c) => c.json(await accounts.reject(c.req.param("id"))));
  route.post("/:id/remove", async (c) => c.json(await accounts.remove(c.req.param("id"))));
  route.post("/:id/restore-request", async (c) => c.json(await accounts.requestRestore(c.req.param("id"))));
  route.post("/:id/restore-approve", async (c) => c.json(await accounts.approveRestore(c.req.param("id"))));
  route.post("/:id/restore-reject", async (c) => c.json(await accounts.rejectRestore(c.req.param("id"))));

  route.put("/:id/group", async (c) => {
    const { groupId } = await readJson(c, groupSchema);
    return c.json(await accounts.assignGroup(c.req.param("id"), groupId));
  });

  route.post("/:id/points", async (c) => {
    const { actorId, delta, reason } = await readJson(c, pointsSchema);
    const request = {
      actorId,
      accountId: c.req.param("id"),
      amount: Math.abs(delta),
      ...(reason !== undefined && { reason }),
    };
    const result =
      delta > 0 ? await transfers.addPoints(request) : await transfers.subtractPoints(request);
    return result.success
      ? c.json(result, 200)
      : c.json(result, LEDGER_ERROR_STATUS[result.error.code]);
  });

  return route;
};
