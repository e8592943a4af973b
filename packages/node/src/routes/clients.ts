/**
 * Client routes.
 *
 * GET    /api/v1/clients           List clients (paged, optional ?q=)
 * GET    /api/v1/clients/search    Name search for pickers
 * POST   /api/v1/clients           Create a client
 * GET    /api/v1/clients/:id       Get a client
 * PUT    /api/v1/clients/:id       Update a client
 * DELETE /api/v1/clients/:id       Delete an unreferenced client (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ClientBodySchema,
  ClientListQuerySchema,
  ClientPatchSchema,
  SearchQuerySchema,
} from "../types/dto.js";
import { readBody, readId, readQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { toPaginatedResponse } from "../types/pagination.js";

export function createClientRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, ClientListQuerySchema);
    return c.json(toPaginatedResponse(c.get("service").listClients(query)));
  });

  // Registered before /:id so "search" is not read as an id
  routes.get("/search", (c) => {
    const { q } = readQuery(c, SearchQuerySchema);
    return c.json({ data: c.get("service").searchClients(q) });
  });

  routes.post("/", async (c) => {
    const body = await readBody(c, ClientBodySchema);
    return c.json({ data: c.get("service").createClient(body) }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getClient(readId(c)) });
  });

  routes.put("/:id", async (c) => {
    const id = readId(c);
    const body = await readBody(c, ClientPatchSchema);
    return c.json({ data: c.get("service").updateClient(id, body) });
  });

  routes.delete("/:id", requirePermission("admin"), (c) => {
    c.get("service").deleteClient(readId(c));
    return c.body(null, 204);
  });

  return routes;
}
