/**
 * Report routes.
 *
 * GET /api/v1/reports/payments  Receipts per client per day (?start=, ?end=)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RangeQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/payments", (c) => {
    const query = readQuery(c, RangeQuerySchema);
    const service = c.get("service");
    return c.json({
      data: service.paymentsSummary(query),
      currencies: service.currencies,
    });
  });

  return routes;
}
