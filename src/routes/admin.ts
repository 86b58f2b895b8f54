/**
 * Admin Routes
 *
 * Endpoints:
 * - GET    /admin/users                                 employees, filtered and paginated
 * - GET    /admin/users/:id                             one employee
 * - PUT    /admin/users/:id/toggle-active               activate or deactivate
 * - PUT    /admin/users/:id/toggle-claim-permission     allow or stop expense claims
 * - PUT    /admin/users/:id/update-role                 `{ role }`
 * - PUT    /admin/users/:id/update-grade                `{ grade }`, returns the new limits
 * - DELETE /admin/users/:id                             only employees without claims
 * - GET    /admin/system-stats                          user and claim counts
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { getAuthContext, requirePermission } from "../auth/middleware.js";
import type { EmployeeAdmin } from "../core/employee-admin.js";
import type { AppEnv } from "../middleware/context.js";
import { EmployeeId } from "../types/branded.js";
import { GRADES, ROLES } from "../types/claim-contract.js";
import { paginationQuery, parseWith, queryBoolean, readJsonBody, toPublicEmployee } from "./shared/params.js";

const usersQuery = z.object({
  active: queryBoolean.optional(),
  role: z.enum(ROLES).optional(),
  grade: z.enum(GRADES).optional(),
  ...paginationQuery,
});

const roleBody = z.object({
  role: z.enum(ROLES, { errorMap: () => ({ message: `Role must be one of: ${ROLES.join(", ")}` }) }),
});

const gradeBody = z.object({
  grade: z.enum(GRADES, { errorMap: () => ({ message: `Grade must be one of: ${GRADES.join(", ")}` }) }),
});

export function createAdminRouter(admin: EmployeeAdmin, authMiddleware: MiddlewareHandler<AppEnv>): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.use("/admin/*", authMiddleware, requirePermission("user:manage"));

  router.get("/admin/users", async (c) => {
    const query = parseWith(usersQuery, c.req.query());
    const page = await admin.list({
      active: query.active,
      role: query.role,
      grade: query.grade,
      offset: query.skip,
      limit: query.limit,
    });
    return c.json({ ok: true, ...page, items: page.items.map(toPublicEmployee) });
  });

  router.get("/admin/users/:id", async (c) => {
    const employee = await admin.get(EmployeeId(c.req.param("id")));
    return c.json({ ok: true, user: toPublicEmployee(employee) });
  });

  router.put("/admin/users/:id/toggle-active", async (c) => {
    const { actor } = getAuthContext(c);
    const employee = await admin.toggleActive(actor, EmployeeId(c.req.param("id")));
    return c.json({ ok: true, user: toPublicEmployee(employee) });
  });

  router.put("/admin/users/:id/toggle-claim-permission", async (c) => {
    const { actor } = getAuthContext(c);
    const employee = await admin.toggleClaimPermission(actor, EmployeeId(c.req.param("id")));
    return c.json({ ok: true, user: toPublicEmployee(employee) });
  });

  router.put("/admin/users/:id/update-role", async (c) => {
    const { actor } = getAuthContext(c);
    const body = await readJsonBody(c, roleBody);
    const employee = await admin.updateRole(actor, EmployeeId(c.req.param("id")), body.role);
    return c.json({ ok: true, user: toPublicEmployee(employee) });
  });

  router.put("/admin/users/:id/update-grade", async (c) => {
    const { actor } = getAuthContext(c);
    const body = await readJsonBody(c, gradeBody);
    const { employee, limits } = await admin.updateGrade(actor, EmployeeId(c.req.param("id")), body.grade);
    return c.json({ ok: true, user: toPublicEmployee(employee), limits });
  });

  router.delete("/admin/users/:id", async (c) => {
    const { actor } = getAuthContext(c);
    const id = EmployeeId(c.req.param("id"));
    await admin.delete(actor, id);
    return c.json({ ok: true, id });
  });

  router.get("/admin/system-stats", async (c) => {
    return c.json({ ok: true, ...(await admin.systemStats()) });
  });

  return router;
}
