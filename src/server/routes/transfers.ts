import { Hono } from "hono";
import * as v from "valibot";

import type { TransferEngine } from "@/worker/transfers";

import { LEDGER_ERROR_STATUS } from "../errors";
import { parseInput, readJson } from "../validation";

const idSchema = v.pipe(v.string(), v.trim(), v.minLength(1));

// Amount rules live in the engine; here only the shape is checked
const transferSchema = v.object({
  senderId: idSchema,
  recipientId: idSchema,
  amount: v.number(),
});

const quoteQuerySchema = v.object({
  amount: v.pipe(v.string(), v.transform(Number), v.number("amount must be a number")),
});

export const createTransfersRoute = (transfers: TransferEngine): Hono => {
  const route = new Hono();

  route.get("/quote", async (c) => {
    const { amount } = parseInput(quoteQuerySchema, c.req.query());
    return c.json(await transfers.quote(amount));
  });

  route.post("/", async (c) => {
    const request = await readJson(c, transferSchema);
    const result = await transfers.transfer(request);
    return result.success
      ? c.json(result, 200)
      : c.json(result, LEDGER_ERROR_STATUS[result.error.code]);
  });

  return route;
};
