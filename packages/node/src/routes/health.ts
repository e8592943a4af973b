/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (persisted state matches memory)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CashflowService } from "../services/cashflow-service.js";

export function createHealthRoutes(service: CashflowService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, stateHash } = service.readiness();
    const body = {
      status: ready ? "ready" : "not_ready",
      stateHash,
      zone: service.zone.label,
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
