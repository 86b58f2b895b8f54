/**
 * State Machine - Claim approval chain
 *
 * The chain is an explicit table of (status × role × outcome → next status).
 * Any combination missing from the table is rejected.
 *
 *   submitted ──manager──► hr_review ──hr──► finance_review ──finance──► approved
 *       │                     │                    │
 *       └──────── reject ─────┴────── reject ──────┴──► rejected
 *
 * Terminal states: approved, rejected
 */

import type {
  Actor,
  Claim,
  ClaimStatus,
  DecisionOutcome,
  Role,
} from "../types/claim-contract.js";
import {
  ForbiddenError,
  InvalidStateError,
  SelfApprovalError,
  roleLabel,
} from "./errors.js";

export interface Transition {
  readonly from: ClaimStatus;
  readonly role: Role;
  readonly outcome: DecisionOutcome;
  readonly to: ClaimStatus;
}

export const TRANSITIONS: ReadonlyArray<Transition> = Object.freeze([
  { from: "submitted", role: "manager", outcome: "approve", to: "hr_review" },
  { from: "submitted", role: "manager", outcome: "reject", to: "rejected" },
  { from: "hr_review", role: "hr", outcome: "approve", to: "finance_review" },
  { from: "hr_review", role: "hr", outcome: "reject", to: "rejected" },
  { from: "finance_review", role: "finance", outcome: "approve", to: "approved" },
  { from: "finance_review", role: "finance", outcome: "reject", to: "rejected" },
] as const satisfies ReadonlyArray<Transition>);

export const TERMINAL_STATUSES: ReadonlySet<ClaimStatus> = new Set<ClaimStatus>([
  "approved",
  "rejected",
]);

function transitionKey(from: ClaimStatus, role: Role, outcome: DecisionOutcome): string {
  return `${from}|${role}|${outcome}`;
}

const TRANSITION_INDEX: ReadonlyMap<string, ClaimStatus> = new Map(
  TRANSITIONS.map((t) => [transitionKey(t.from, t.role, t.outcome), t.to])
);

/**
 * Role that owns each non-terminal stage, derived from the table.
 */
export const STAGE_ROLES: ReadonlyMap<ClaimStatus, Role> = new Map(
  TRANSITIONS.map((t) => [t.from, t.role])
);

export function isTerminal(status: ClaimStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function stageRole(status: ClaimStatus): Role | null {
  return STAGE_ROLES.get(status) ?? null;
}

/**
 * Statuses a role is allowed to act on. Empty for roles outside the chain.
 */
export function statusesActionableBy(role: Role): ClaimStatus[] {
  const statuses: ClaimStatus[] = [];
  for (const [status, owner] of STAGE_ROLES) {
    if (owner === role) statuses.push(status);
  }
  return statuses;
}

/**
 * Look up the next status without any actor checks.
 * Returns null for combinations outside the table.
 */
export function nextStatus(
  from: ClaimStatus,
  role: Role,
  outcome: DecisionOutcome
): ClaimStatus | null {
  return TRANSITION_INDEX.get(transitionKey(from, role, outcome)) ?? null;
}

/**
 * Resolve the status a decision moves a claim to.
 *
 * Checks run in order: terminal status, self-approval, role/stage match.
 *
 * @throws {InvalidStateError} claim is already approved or rejected
 * @throws {SelfApprovalError} actor owns the claim
 * @throws {ForbiddenError} actor's role does not own the claim's stage
 */
export function resolveTransition(
  claim: Pick<Claim, "id" | "ownerId" | "status">,
  actor: Actor,
  outcome: DecisionOutcome
): ClaimStatus {
  if (isTerminal(claim.status)) {
    throw InvalidStateError.terminal(claim.id, claim.status, outcome);
  }
  if (claim.ownerId === actor.id) {
    throw new SelfApprovalError(claim.id);
  }
  const to = nextStatus(claim.status, actor.role, outcome);
  if (!to) {
    const required = stageRole(claim.status);
    throw new ForbiddenError(
      required
        ? `Claim ${claim.id} is in '${claim.status}', only ${roleLabel(required)} can ${outcome} it`
        : `No ${outcome} transition from '${claim.status}' for role ${roleLabel(actor.role)}`
    );
  }
  return to;
}
