/**
 * Administrative routes. Authorization is the engine controller's.
 *
 * POST /api/v1/admin/pause
 * POST /api/v1/admin/unpause
 * POST /api/v1/admin/emergency-withdraw  — Sweep stablecoin escrow to the caller
 * POST /api/v1/admin/roles/grant
 * POST /api/v1/admin/roles/revoke
 * GET  /api/v1/admin/deployment          — Addresses, fee, pause state
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EmergencyWithdrawSchema, RoleChangeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/deployment", (c) => c.json({ data: c.get("service").info() }));

  routes.post("/pause", (c) => {
    return c.json({ data: c.get("service").pause(c.get("caller")) });
  });

  routes.post("/unpause", (c) => {
    return c.json({ data: c.get("service").unpause(c.get("caller")) });
  });

  routes.post("/emergency-withdraw", validateBody(EmergencyWithdrawSchema), (c) => {
    const account = c
      .get("service")
      .emergencyWithdraw(c.get("caller"), c.get("validatedBody").amount);
    return c.json({ data: account });
  });

  routes.post("/roles/grant", validateBody(RoleChangeSchema), (c) => {
    const { role, account } = c.get("validatedBody");
    const changed = c.get("service").grantRole(c.get("caller"), role, account);
    return c.json({ data: { role, account, changed } });
  });

  routes.post("/roles/revoke", validateBody(RoleChangeSchema), (c) => {
    const { role, account } = c.get("validatedBody");
    const changed = c.get("service").revokeRole(c.get("caller"), role, account);
    return c.json({ data: { role, account, changed } });
  });

  return routes;
}
