/**
 * Report Routes
 *
 * Endpoints:
 * - GET /reports/search     free text plus structured filters
 * - GET /reports/summary    counts and totals by status and category
 * - GET /reports/audit/:id  audit trail of one claim
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { requirePermission } from "../auth/middleware.js";
import { reviewerView } from "../core/claim-views.js";
import type { ClaimReports } from "../core/claim-reports.js";
import type { AppEnv } from "../middleware/context.js";
import { ClaimId, EmployeeId } from "../types/branded.js";
import {
  CLAIM_STATUSES,
  EXPENSE_CATEGORIES,
  GRADES,
  RECOMMENDATIONS,
} from "../types/claim-contract.js";
import { paginationQuery, parseWith, queryBoolean } from "./shared/params.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD");

const searchQuery = z
  .object({
    q: z.string().trim().max(200).optional(),
    category: z.enum(EXPENSE_CATEGORIES).optional(),
    status: z.enum(CLAIM_STATUSES).optional(),
    employee_id: z.string().min(1).optional(),
    grade: z.enum(GRADES).optional(),
    min_amount: z.coerce.number().min(0).optional(),
    max_amount: z.coerce.number().min(0).optional(),
    from_date: isoDate.optional(),
    to_date: isoDate.optional(),
    recommendation: z
      .string()
      .transform((v) => v.toUpperCase())
      .pipe(z.enum(RECOMMENDATIONS))
      .optional(),
    within_limits: queryBoolean.optional(),
    sort_by: z.enum(["createdAt", "amount", "expenseDate"]).default("createdAt"),
    sort_order: z.enum(["asc", "desc"]).default("desc"),
    ...paginationQuery,
  })
  .refine(
    (q) => q.min_amount === undefined || q.max_amount === undefined || q.min_amount <= q.max_amount,
    { message: "min_amount must not exceed max_amount", path: ["min_amount"] }
  );

const auditQuery = z.object(paginationQuery);

export function createReportRouter(
  reports: ClaimReports,
  authMiddleware: MiddlewareHandler<AppEnv>
): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.use("/reports/*", authMiddleware);

  router.get("/reports/search", requirePermission("reports:read"), async (c) => {
    const query = parseWith(searchQuery, c.req.query());
    const page = await reports.search({
      q: query.q,
      category: query.category,
      status: query.status,
      employeeId: query.employee_id === undefined ? undefined : EmployeeId(query.employee_id),
      grade: query.grade,
      minAmount: query.min_amount,
      maxAmount: query.max_amount,
      fromDate: query.from_date,
      toDate: query.to_date,
      recommendation: query.recommendation,
      withinLimits: query.within_limits,
      sortBy: query.sort_by,
      sortOrder: query.sort_order,
      offset: query.skip,
      limit: query.limit,
    });
    return c.json({ ok: true, ...page, items: page.items.map(reviewerView) });
  });

  router.get("/reports/summary", requirePermission("reports:read"), async (c) => {
    return c.json({ ok: true, ...(await reports.summary()) });
  });

  router.get("/reports/audit/:id", requirePermission("audit:read"), async (c) => {
    const query = parseWith(auditQuery, c.req.query());
    const trail = await reports.auditTrail(ClaimId(c.req.param("id")), {
      offset: query.skip,
      limit: query.limit,
    });
    return c.json({ ok: true, ...trail });
  });

  return router;
}
