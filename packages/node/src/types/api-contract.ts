/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CashflowService } from "../services/cashflow-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the cardflow app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service behind every route */
    service: CashflowService;

    /** Authentication context (set by auth middleware; absent when auth is off) */
    auth: AuthContext | undefined;
  };
}
