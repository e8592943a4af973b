/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import type { CashflowService } from "./services/cashflow-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, methodPermission } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createCardRoutes } from "./routes/cards.js";
import { createClientRoutes } from "./routes/clients.js";
import { createGroupRoutes } from "./routes/groups.js";
import { createBankRoutes } from "./routes/banks.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createWithdrawalRoutes } from "./routes/withdrawals.js";
import { createReportRoutes } from "./routes/reports.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: CashflowService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called for every error answered with a 500 */
  readonly onUnexpectedError?: ((err: Error, c: Context) => void) | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CashflowService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", async (c, next) => {
      c.set("auth", undefined);
      await next();
    });
  }
  app.use("/api/*", methodPermission());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/cards", createCardRoutes());
  app.route("/api/v1/clients", createClientRoutes());
  app.route("/api/v1/groups", createGroupRoutes());
  app.route("/api/v1/banks", createBankRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/withdrawals", createWithdrawalRoutes());
  app.route("/api/v1/reports", createReportRoutes());

  return { app, service };
}
