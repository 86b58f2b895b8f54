/**
 * Expense Routes
 *
 * Endpoints:
 * - GET    /expenses/limits       caller's grade limits and travel modes
 * - POST   /expenses/claim        multipart claim submission
 * - GET    /expenses/my-expenses  caller's claims, newest first
 * - GET    /expenses/:id          one claim (owner or claim:read_all)
 * - GET    /expenses/:id/bill     the stored bill file
 * - PUT    /expenses/:id          owner edits a claim still at `submitted`
 * - DELETE /expenses/:id          owner withdraws a claim still at `submitted`
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { getAuthContext, requirePermission } from "../auth/middleware.js";
import type { IncomingBill } from "../core/bill-intake.js";
import type { ClaimManager, UpdateClaimInput } from "../core/claim-manager.js";
import { claimViewFor } from "../core/claim-views.js";
import { ValidationError } from "../core/errors.js";
import type { AppEnv } from "../middleware/context.js";
import { gradePolicy, type ExpensePolicy } from "../policy/expense-policy.js";
import { ClaimId } from "../types/branded.js";
import { CLAIM_STATUSES, EXPENSE_CATEGORIES } from "../types/claim-contract.js";
import { paginationQuery, parseWith } from "./shared/params.js";

export interface ExpenseRouterOptions {
  claims: ClaimManager;
  policy: ExpensePolicy;
  currency: string;
  authMiddleware: MiddlewareHandler<AppEnv>;
}

const myExpensesQuery = z.object({
  status: z.enum(CLAIM_STATUSES).optional(),
  category: z.enum(EXPENSE_CATEGORIES).optional(),
  ...paginationQuery,
});

type FormValue = string | File | (string | File)[] | undefined;

function formText(value: FormValue): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function formFlag(value: FormValue, field: string): boolean {
  const text = formText(value)?.trim().toLowerCase();
  if (!text || text === "false" || text === "0" || text === "off") return false;
  if (text === "true" || text === "1" || text === "on") return true;
  throw new ValidationError(`${field} must be true or false`, [{ field, message: "Expected a boolean" }]);
}

async function formFile(value: FormValue): Promise<IncomingBill | null> {
  if (Array.isArray(value)) {
    throw new ValidationError("Attach a single bill file", [{ field: "bill_file", message: "Multiple files" }]);
  }
  if (!(value instanceof File) || (value.size === 0 && !value.name)) {
    return null;
  }
  return { filename: value.name, data: new Uint8Array(await value.arrayBuffer()) };
}

/** Only the fields present in the form are changed */
async function updateFromForm(form: Record<string, FormValue>): Promise<UpdateClaimInput> {
  const input: UpdateClaimInput = {
    category: formText(form["category"]),
    amount: formText(form["amount"]),
    expenseDate: formText(form["expense_date"]),
    description: formText(form["description"]),
    travelMode: formText(form["travel_mode"]),
    travelFrom: formText(form["travel_from"]),
    travelTo: formText(form["travel_to"]),
    noBillReason: formText(form["no_bill_reason"]),
    bill: await formFile(form["bill_file"]),
  };
  if (form["self_declared"] !== undefined) {
    input.selfDeclared = formFlag(form["self_declared"], "self_declared");
  }
  return input;
}

export function createExpenseRouter(options: ExpenseRouterOptions): Hono<AppEnv> {
  const { claims, policy, currency, authMiddleware } = options;
  const router = new Hono<AppEnv>();

  router.use("/expenses/*", authMiddleware);

  router.get("/expenses/limits", (c) => {
    const { employee } = getAuthContext(c);
    return c.json({ ok: true, currency, ...gradePolicy(policy, employee.grade) });
  });

  router.post("/expenses/claim", requirePermission("claim:create"), async (c) => {
    const { employee, actor } = getAuthContext(c);
    const form = await c.req.parseBody();

    const claim = await claims.submit(employee, {
      category: formText(form["category"]) ?? "",
      amount: formText(form["amount"]) ?? "",
      expenseDate: formText(form["expense_date"]) ?? "",
      description: formText(form["description"]) ?? "",
      travelMode: formText(form["travel_mode"]) ?? null,
      travelFrom: formText(form["travel_from"]) ?? null,
      travelTo: formText(form["travel_to"]) ?? null,
      selfDeclared: formFlag(form["self_declared"], "self_declared"),
      noBillReason: formText(form["no_bill_reason"]) ?? null,
      bill: await formFile(form["bill_file"]),
    });

    return c.json({ ok: true, claim: claimViewFor(claim, actor) }, 201);
  });

  router.get("/expenses/my-expenses", requirePermission("claim:read_own"), async (c) => {
    const { actor } = getAuthContext(c);
    const query = parseWith(myExpensesQuery, c.req.query());
    const page = await claims.listOwn(actor, {
      status: query.status,
      category: query.category,
      offset: query.skip,
      limit: query.limit,
    });
    return c.json({ ok: true, ...page, items: page.items.map((claim) => claimViewFor(claim, actor)) });
  });

  router.get("/expenses/:id", requirePermission("claim:read_own"), async (c) => {
    const { actor } = getAuthContext(c);
    const claim = await claims.get(actor, ClaimId(c.req.param("id")));
    return c.json({ ok: true, claim: claimViewFor(claim, actor) });
  });

  router.get("/expenses/:id/bill", requirePermission("claim:read_own"), async (c) => {
    const { actor } = getAuthContext(c);
    const { bill, data } = await claims.getBill(actor, ClaimId(c.req.param("id")));
    return c.body(new Uint8Array(data), 200, {
      "Content-Type": bill.mimeType,
      "Content-Disposition": `attachment; filename="${bill.filename}"`,
    });
  });

  router.put("/expenses/:id", requirePermission("claim:create"), async (c) => {
    const { employee, actor } = getAuthContext(c);
    const form = await c.req.parseBody();
    const claim = await claims.update(employee, ClaimId(c.req.param("id")), await updateFromForm(form));
    return c.json({ ok: true, claim: claimViewFor(claim, actor) });
  });

  router.delete("/expenses/:id", requirePermission("claim:read_own"), async (c) => {
    const { actor } = getAuthContext(c);
    const id = ClaimId(c.req.param("id"));
    await claims.delete(actor, id);
    return c.json({ ok: true, id });
  });

  return router;
}
