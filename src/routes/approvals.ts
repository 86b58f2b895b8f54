/**
 * Approval Routes
 *
 * Endpoints:
 * - GET  /approvals/pending      claims waiting on the caller's role
 * - POST /approvals/:id/approve  approve, optional `comments`
 * - POST /approvals/:id/reject   reject, `comments` required
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { getAuthContext, requirePermission } from "../auth/middleware.js";
import type { ApprovalManager, DecisionResult } from "../core/approval-manager.js";
import { reviewerView } from "../core/claim-views.js";
import type { AppEnv } from "../middleware/context.js";
import { ClaimId } from "../types/branded.js";
import { paginationQuery, parseWith, readJsonBody } from "./shared/params.js";

const decisionBody = z.object({
  comments: z.string().max(1000, "Comments are too long").nullable().optional(),
});

const pendingQuery = z.object(paginationQuery);

function decisionResponse(result: DecisionResult) {
  return { ok: true, claim: reviewerView(result.claim), decision: result.decision };
}

export function createApprovalRouter(
  manager: ApprovalManager,
  authMiddleware: MiddlewareHandler<AppEnv>
): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.use("/approvals/*", authMiddleware, requirePermission("approval:act"));

  router.get("/approvals/pending", async (c) => {
    const { actor } = getAuthContext(c);
    const query = parseWith(pendingQuery, c.req.query());
    const page = await manager.listPending(actor, { offset: query.skip, limit: query.limit });
    return c.json({ ok: true, ...page, items: page.items.map(reviewerView) });
  });

  router.post("/approvals/:id/approve", async (c) => {
    const { actor } = getAuthContext(c);
    const body = await readJsonBody(c, decisionBody);
    const result = await manager.approve({
      claimId: ClaimId(c.req.param("id")),
      actor,
      comment: body.comments,
    });
    return c.json(decisionResponse(result));
  });

  router.post("/approvals/:id/reject", async (c) => {
    const { actor } = getAuthContext(c);
    const body = await readJsonBody(c, decisionBody);
    const result = await manager.reject({
      claimId: ClaimId(c.req.param("id")),
      actor,
      comment: body.comments,
    });
    return c.json(decisionResponse(result));
  });

  return router;
}
