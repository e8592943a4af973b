/**
 * Card routes.
 *
 * GET    /api/v1/cards                Card totals (range, bank, group filters)
 * POST   /api/v1/cards                Create a card
 * GET    /api/v1/cards/:id            Get a card
 * PUT    /api/v1/cards/:id            Update a card
 * DELETE /api/v1/cards/:id            Delete a card and its withdrawals (admin)
 * GET    /api/v1/cards/:id/timeline   Credits and debits with running balance
 * GET    /api/v1/cards/:id/balance    Carried, received, should-have for a day
 * GET    /api/v1/cards/:id/totals     Received, withdrawn, commission over a range
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BalanceQuerySchema,
  CardBodySchema,
  CardListQuerySchema,
  CardPatchSchema,
  RangeQuerySchema,
  TimelineQuerySchema,
} from "../types/dto.js";
import { readBody, readId, readQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createCardRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, CardListQuerySchema);
    return c.json({ data: c.get("service").listCards(query) });
  });

  routes.post("/", async (c) => {
    const body = await readBody(c, CardBodySchema);
    return c.json({ data: c.get("service").createCard(body) }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getCard(readId(c)) });
  });

  routes.put("/:id", async (c) => {
    const id = readId(c);
    const body = await readBody(c, CardPatchSchema);
    return c.json({ data: c.get("service").updateCard(id, body) });
  });

  routes.delete("/:id", requirePermission("admin"), (c) => {
    return c.json({ data: c.get("service").deleteCard(readId(c)) });
  });

  routes.get("/:id/timeline", (c) => {
    const id = readId(c);
    const query = readQuery(c, TimelineQuerySchema);
    return c.json({ data: c.get("service").cardTimeline(id, query) });
  });

  routes.get("/:id/balance", (c) => {
    const id = readId(c);
    const { date } = readQuery(c, BalanceQuerySchema);
    return c.json({ data: c.get("service").cardBalance(id, date) });
  });

  routes.get("/:id/totals", (c) => {
    const id = readId(c);
    const query = readQuery(c, RangeQuerySchema);
    return c.json({ data: c.get("service").cardRangeTotals(id, query) });
  });

  return routes;
}
