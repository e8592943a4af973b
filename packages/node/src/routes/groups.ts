/**
 * Card group routes.
 *
 * GET    /api/v1/groups       List groups
 * POST   /api/v1/groups       Get-or-create by name (201 when created)
 * PUT    /api/v1/groups/:id   Rename
 * DELETE /api/v1/groups/:id   Delete; member cards are unlinked
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { GroupBodySchema } from "../types/dto.js";
import { readBody, readId } from "../middleware/validate.js";

export function createGroupRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listGroups() });
  });

  routes.post("/", async (c) => {
    const { name } = await readBody(c, GroupBodySchema);
    const { record, created } = c.get("service").createGroup(name);
    return c.json({ data: record }, created ? 201 : 200);
  });

  routes.put("/:id", async (c) => {
    const id = readId(c);
    const { name } = await readBody(c, GroupBodySchema);
    return c.json({ data: c.get("service").renameGroup(id, name) });
  });

  routes.delete("/:id", (c) => {
    return c.json({ data: c.get("service").deleteGroup(readId(c)) });
  });

  return routes;
}
