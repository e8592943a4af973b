/**
 * Withdrawal routes.
 *
 * GET  /api/v1/withdrawals/sheet   Daily worksheet (?date=, ?bank=, ?q=, paging)
 * POST /api/v1/withdrawals         Upsert the withdrawal for (card, date)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SheetQuerySchema, WithdrawalBodySchema } from "../types/dto.js";
import { readBody, readQuery } from "../middleware/validate.js";

export function createWithdrawalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/sheet", (c) => {
    const query = readQuery(c, SheetQuerySchema);
    return c.json({ data: c.get("service").dailySheet(query) });
  });

  routes.post("/", async (c) => {
    const body = await readBody(c, WithdrawalBodySchema);
    return c.json({ data: c.get("service").saveWithdrawal(body) });
  });

  return routes;
}
