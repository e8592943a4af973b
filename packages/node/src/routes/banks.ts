/**
 * Bank routes.
 *
 * GET /api/v1/banks               Bank names in use, with display colors
 * PUT /api/v1/banks/:bank/color   Set a bank's display color
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BankColorBodySchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";

export function createBankRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listBanks() });
  });

  routes.put("/:bank/color", async (c) => {
    const bank = c.req.param("bank");
    const { color } = await readBody(c, BankColorBodySchema);
    return c.json({ data: c.get("service").setBankColor(bank, color) });
  });

  return routes;
}
