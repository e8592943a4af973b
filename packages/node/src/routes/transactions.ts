/**
 * Transaction routes.
 *
 * GET    /api/v1/transactions       Newest first, paged; card, client, range filters
 * POST   /api/v1/transactions       Record a receipt
 * GET    /api/v1/transactions/:id   Get one, with the timestamp as the form shows it
 * PUT    /api/v1/transactions/:id   Edit
 * DELETE /api/v1/transactions/:id   Delete
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransactionBodySchema, TransactionListQuerySchema } from "../types/dto.js";
import { readBody, readId, readQuery } from "../middleware/validate.js";
import { toPaginatedResponse } from "../types/pagination.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, TransactionListQuerySchema);
    return c.json(toPaginatedResponse(c.get("service").listTransactions(query)));
  });

  routes.post("/", async (c) => {
    const body = await readBody(c, TransactionBodySchema);
    return c.json({ data: c.get("service").createTransaction(body) }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getTransaction(readId(c)) });
  });

  routes.put("/:id", async (c) => {
    const id = readId(c);
    const body = await readBody(c, TransactionBodySchema);
    return c.json({ data: c.get("service").updateTransaction(id, body) });
  });

  routes.delete("/:id", (c) => {
    c.get("service").deleteTransaction(readId(c));
    return c.body(null, 204);
  });

  return routes;
}
