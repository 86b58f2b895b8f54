/**
 * ApprovalManager - manager → HR → finance review of submitted claims.
 *
 * Every attempt is audited. A decision is committed with a conditional
 * status update, so of two concurrent decisions on the same claim only one
 * lands; the other fails with InvalidStateError.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { ClaimStorage, PaginatedResult, PaginationOptions } from "../storage/storage-interface.js";
import { EventId, type ClaimId } from "../types/branded.js";
import type {
  Actor,
  Claim,
  ClaimEventType,
  ClaimStatus,
  Decision,
  DecisionOutcome,
} from "../types/claim-contract.js";
import type { AuditTrail } from "./audit-trail.js";
import { InvalidStateError, NotFoundError, ValidationError } from "./errors.js";
import type { ClaimEventEmitter } from "./event-bus.js";
import { isTerminal, resolveTransition, statusesActionableBy } from "./state-machine.js";

export interface DecisionRequest {
  claimId: ClaimId;
  actor: Actor;
  comment?: string | null;
}

export interface DecisionResult {
  ok: true;
  claim: Claim;
  decision: Decision;
}

export interface ApprovalManagerOptions {
  claims: ClaimStorage;
  audit: AuditTrail;
  events: ClaimEventEmitter;
  logger?: Logger;
  now?: () => Date;
}

function eventTypeFor(to: ClaimStatus): ClaimEventType {
  if (to === "approved") return "claim.approved";
  if (to === "rejected") return "claim.rejected";
  return "claim.advanced";
}

export class ApprovalManager {
  private readonly claims: ClaimStorage;
  private readonly audit: AuditTrail;
  private readonly events: ClaimEventEmitter;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: ApprovalManagerOptions) {
    this.claims = options.claims;
    this.audit = options.audit;
    this.events = options.events;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  approve(request: DecisionRequest): Promise<DecisionResult> {
    return this.decide(request, "approve");
  }

  /** A non-empty comment (the rejection reason) is required */
  reject(request: DecisionRequest): Promise<DecisionResult> {
    return this.decide(request, "reject");
  }

  /**
   * Claims waiting on the actor's role, oldest first. Claims the actor owns
   * are left out since they can't act on them.
   */
  async listPending(actor: Actor, pagination?: PaginationOptions): Promise<PaginatedResult<Claim>> {
    const statuses = statusesActionableBy(actor.role);
    return this.claims.list(
      { status: statuses, excludeOwnerId: actor.id },
      { sortBy: "createdAt", sortOrder: "asc", offset: pagination?.offset, limit: pagination?.limit }
    );
  }

  private async decide(request: DecisionRequest, outcome: DecisionOutcome): Promise<DecisionResult> {
    const { claimId, actor } = request;
    const comment = request.comment?.trim() || null;
    const action = outcome === "approve" ? "claim.approve" : "claim.reject";

    const claim = await this.claims.get(claimId);
    if (!claim) {
      const error = new NotFoundError("Claim", claimId);
      await this.audit.failure(
        { actor, action, claimId, beforeStatus: null, afterStatus: null, comment },
        error
      );
      throw error;
    }

    const { updated, decision } = await this.commit(claim, actor, outcome, comment).catch(
      async (error: unknown): Promise<never> => {
        await this.audit.failure(
          { actor, action, claimId, beforeStatus: claim.status, afterStatus: claim.status, comment },
          error
        );
        throw error;
      }
    );

    this.logger?.info(
      { claimId, actorId: actor.id, role: actor.role, from: decision.fromStatus, to: decision.toStatus },
      `Claim ${outcome === "approve" ? "approved" : "rejected"}`
    );

    await this.events.emit({
      eventId: EventId(`evt_${randomUUID()}`),
      type: eventTypeFor(decision.toStatus),
      claimId,
      actor,
      fromStatus: decision.fromStatus,
      toStatus: decision.toStatus,
      ts: decision.timestamp,
      claim: updated,
    });

    return { ok: true, claim: updated, decision };
  }

  /** The transition and its audit entry are written together */
  private async commit(
    claim: Claim,
    actor: Actor,
    outcome: DecisionOutcome,
    comment: string | null
  ): Promise<{ updated: Claim; decision: Decision }> {
    const to = resolveTransition(claim, actor, outcome);
    if (outcome === "reject" && !comment) {
      throw new ValidationError("A comment is required to reject a claim", [
        { field: "comments", message: "Rejection reason is required" },
      ]);
    }

    const now = this.now().toISOString();
    const decision: Decision = {
      actorId: actor.id,
      actorRole: actor.role,
      outcome,
      comment,
      fromStatus: claim.status,
      toStatus: to,
      timestamp: now,
    };
    const updated: Claim = {
      ...claim,
      status: to,
      decisions: [...claim.decisions, decision],
      updatedAt: now,
      resolvedAt: isTerminal(to) ? now : null,
    };

    const action = outcome === "approve" ? "claim.approve" : "claim.reject";
    const applied = await this.claims.transition(
      claim.id,
      claim.status,
      updated,
      this.audit.draft({ actor, action, claimId: claim.id, beforeStatus: claim.status, afterStatus: to, comment })
    );
    if (!applied) {
      throw new InvalidStateError(
        `Claim ${claim.id} was changed by another request while in '${claim.status}'`,
        claim.status
      );
    }
    return { updated, decision };
  }
}
