/**
 * ClaimManager - submission, update, retrieval and deletion of expense claims.
 *
 * Submission pipeline:
 *   validate input → check/store bill → AI analysis → limit check
 *   → duplicate flag → insert as `submitted` with its audit entry
 *   → claim.submitted
 *
 * AI failures never fail a submission: the claim is stored with
 * `analysis: null` and the reason in `analysisError`. Any other failure
 * after the bill was stored removes it again.
 *
 * Submissions and updates of one owner run one at a time, so the monthly
 * self-declaration quota is checked against committed claims. The queue is
 * per process; the storage's unique bill index still holds across processes.
 */

import { randomBytes, randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { z } from "zod";
import type { BillAnalyzer } from "../analysis/bill-analyzer.js";
import { employeeHasPermission, hasPermission } from "../auth/rbac.js";
import type { ExpensePolicy } from "../policy/expense-policy.js";
import {
  checkExpenseLimits,
  fromMinorUnits,
  hasAtMostTwoDecimals,
  toMinorUnits,
} from "../policy/limit-validator.js";
import { assertSelfDeclarationAllowed, expenseMonth } from "../policy/self-declaration.js";
import { billStorageKey, type BillStore } from "../storage/bill-store.js";
import type { ClaimStorage, PaginatedResult } from "../storage/storage-interface.js";
import { ClaimId, EventId, type EmployeeId } from "../types/branded.js";
import {
  EXPENSE_CATEGORIES,
  TRAVEL_MODES,
  type Actor,
  type BillAnalysis,
  type BillReference,
  type Claim,
  type ClaimEventType,
  type ClaimStatus,
  type Employee,
  type ExpenseCategory,
  type TravelMode,
} from "../types/claim-contract.js";
import type { AuditTrail } from "./audit-trail.js";
import { checkBill, type BillConstraints, type CheckedBill, type IncomingBill } from "./bill-intake.js";
import { DuplicateDetector } from "./duplicate-detector.js";
import {
  AnalysisUnavailableError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import type { ClaimEventEmitter } from "./event-bus.js";

// =============================================================================
// § Input
// =============================================================================

export interface SubmitClaimInput {
  category: string;
  amount: string | number;
  expenseDate: string;
  description: string;
  travelMode?: string | null;
  travelFrom?: string | null;
  travelTo?: string | null;
  selfDeclared?: boolean;
  noBillReason?: string | null;
  bill?: IncomingBill | null;
}

/** Fields left out keep their current value; the bill can't be replaced */
export type UpdateClaimInput = Partial<SubmitClaimInput>;

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullable()
    .optional()
    .transform((v) => v || null);

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

const submitSchema = z.object({
  category: z.enum(EXPENSE_CATEGORIES, {
    errorMap: () => ({ message: `Category must be one of: ${EXPENSE_CATEGORIES.join(", ")}` }),
  }),
  amount: z.coerce
    .number({ invalid_type_error: "Amount must be a number" })
    .positive("Amount must be greater than zero")
    .max(10_000_000, "Amount is too large")
    .refine(hasAtMostTwoDecimals, "Amount can have at most 2 decimal places")
    .transform((v) => fromMinorUnits(toMinorUnits(v))),
  expenseDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD")
    .refine(isCalendarDate, "Date is not a valid calendar date"),
  description: z.string().trim().min(3, "Description is too short").max(1000, "Description is too long"),
  travelMode: z
    .enum(TRAVEL_MODES, {
      errorMap: () => ({ message: `Travel mode must be one of: ${TRAVEL_MODES.join(", ")}` }),
    })
    .nullable()
    .optional()
    .transform((v) => v ?? null),
  travelFrom: optionalText(200),
  travelTo: optionalText(200),
  selfDeclared: z.boolean().optional().transform((v) => v ?? false),
  noBillReason: optionalText(500),
});

type ValidClaimInput = z.infer<typeof submitSchema>;

function toFieldName(path: (string | number)[]): string {
  const key = String(path[0] ?? "input");
  return key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
}

export function parseSubmitInput(input: SubmitClaimInput): ValidClaimInput {
  const result = submitSchema.safeParse({
    ...input,
    travelMode: input.travelMode || null,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: toFieldName(issue.path),
      message: issue.message,
    }));
    throw new ValidationError(issues[0]?.message ?? "Invalid claim", issues);
  }
  return result.data;
}

/** `EXP-YYYYMMDD-XXXXXX`, the suffix being 6 random upper-case hex digits */
export function generateClaimId(now: Date): ClaimId {
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  return ClaimId(`EXP-${date}-${randomBytes(3).toString("hex").toUpperCase()}`);
}

function asTravelMode(value: string | null | undefined): TravelMode | null {
  const normalized = value?.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return TRAVEL_MODES.find((mode) => mode === normalized) ?? null;
}

const LIVE_STATUSES: ClaimStatus[] = ["submitted", "hr_review", "finance_review", "approved"];

function keep<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

// =============================================================================
// § Manager
// =============================================================================

export interface ListOwnClaimsOptions {
  status?: ClaimStatus;
  category?: ExpenseCategory;
  offset?: number;
  limit?: number;
}

export interface ClaimManagerOptions {
  claims: ClaimStorage;
  billStore: BillStore;
  analyzer: BillAnalyzer;
  policy: ExpensePolicy;
  audit: AuditTrail;
  events: ClaimEventEmitter;
  currency: string;
  billConstraints: BillConstraints;
  logger?: Logger;
  now?: () => Date;
  generateId?: (now: Date) => ClaimId;
}

export class ClaimManager {
  private readonly claims: ClaimStorage;
  private readonly billStore: BillStore;
  private readonly analyzer: BillAnalyzer;
  private readonly policy: ExpensePolicy;
  private readonly audit: AuditTrail;
  private readonly events: ClaimEventEmitter;
  private readonly duplicates: DuplicateDetector;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly generateId: (now: Date) => ClaimId;
  private readonly ownerQueues = new Map<EmployeeId, Promise<void>>();

  constructor(private readonly options: ClaimManagerOptions) {
    this.claims = options.claims;
    this.billStore = options.billStore;
    this.analyzer = options.analyzer;
    this.policy = options.policy;
    this.audit = options.audit;
    this.events = options.events;
    this.duplicates = new DuplicateDetector(options.claims);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateClaimId;
  }

  /**
   * Run the submission pipeline for `owner`.
   *
   * @throws {ForbiddenError} owner may not claim expenses
   * @throws {ValidationError} malformed input, bad file, self-declaration rules
   * @throws {DuplicateBillError} same file already claimed by the owner
   */
  submit(owner: Employee, input: SubmitClaimInput): Promise<Claim> {
    return this.serialized(owner.id, () => this.submitNow(owner, input));
  }

  /**
   * Owners always see their claims; others need `claim:read_all`. A claim
   * the viewer can't see is reported as not found.
   */
  async get(viewer: Actor, id: ClaimId): Promise<Claim> {
    const claim = await this.claims.get(id);
    if (!claim || (claim.ownerId !== viewer.id && !hasPermission(viewer.role, "claim:read_all"))) {
      throw new NotFoundError("Claim", id);
    }
    return claim;
  }

  listOwn(owner: Actor, options: ListOwnClaimsOptions = {}): Promise<PaginatedResult<Claim>> {
    return this.claims.list(
      { ownerId: owner.id, status: options.status, category: options.category },
      { sortBy: "createdAt", sortOrder: "desc", offset: options.offset, limit: options.limit }
    );
  }

  async getBill(viewer: Actor, id: ClaimId): Promise<{ bill: BillReference; data: Uint8Array }> {
    const claim = await this.get(viewer, id);
    if (!claim.bill) {
      throw new NotFoundError("Bill for claim", id);
    }
    const data = await this.billStore.get(claim.bill.storageKey);
    if (!data) {
      throw new NotFoundError("Bill file", claim.bill.storageKey);
    }
    return { bill: claim.bill, data };
  }

  /**
   * Owner edit, under the same conditions as deletion. The limit check and
   * self-declaration rules run again; the stored analysis is kept.
   *
   * @throws {InvalidStateError} the claim already has a decision
   * @throws {ValidationError} invalid fields, a new bill, or a changed self_declared flag
   */
  update(owner: Employee, id: ClaimId, input: UpdateClaimInput): Promise<Claim> {
    return this.serialized(owner.id, () => this.updateNow(owner, id, input));
  }

  /**
   * Owner-initiated deletion, only while `submitted` with no decisions.
   */
  async delete(actor: Actor, id: ClaimId): Promise<void> {
    const claim = await this.claims.get(id);
    const auditBase = {
      actor,
      action: "claim.delete" as const,
      claimId: id,
      beforeStatus: claim?.status ?? null,
      afterStatus: claim?.status ?? null,
    };

    let removed: Claim;
    try {
      removed = this.assertEditable(actor, id, claim, "delete");
      const deleted = await this.claims.delete(
        id,
        "submitted",
        this.audit.draft({ ...auditBase, afterStatus: null })
      );
      if (!deleted) {
        throw new InvalidStateError(`Claim ${id} was changed by another request`, removed.status);
      }
    } catch (error) {
      await this.audit.failure(auditBase, error);
      throw error;
    }

    if (removed.bill) {
      await this.billStore.delete(removed.bill.storageKey);
    }
    await this.emit("claim.deleted", removed, actor, removed.status, null);
  }

  // ===========================================================================
  // § Submission
  // ===========================================================================

  private async submitNow(owner: Employee, input: SubmitClaimInput): Promise<Claim> {
    const actor: Actor = { id: owner.id, role: owner.role };
    const claimId = this.generateId(this.now());
    try {
      const claim = await this.createClaim(owner, actor, input, claimId);
      this.logger?.info(
        {
          claimId: claim.id,
          ownerId: owner.id,
          category: claim.category,
          amount: claim.amount,
          withinLimits: claim.limitCheck.withinLimits,
          analysisPresent: claim.analysis !== null,
        },
        "Claim submitted"
      );
      await this.emit("claim.submitted", claim, actor, null, claim.status);
      return claim;
    } catch (error) {
      await this.audit.failure(
        { actor, action: "claim.submit", claimId, beforeStatus: null, afterStatus: null },
        error
      );
      throw error;
    }
  }

  private async createClaim(
    owner: Employee,
    actor: Actor,
    input: SubmitClaimInput,
    id: ClaimId
  ): Promise<Claim> {
    if (!employeeHasPermission(owner, "claim:create")) {
      throw new ForbiddenError("You are not allowed to submit expense claims");
    }

    const valid = parseSubmitInput(input);
    const bill = input.bill ?? null;

    if (bill && valid.selfDeclared) {
      throw new ValidationError("A self-declared claim cannot have a bill attached", [
        { field: "self_declared", message: "Remove the bill or unset self_declared" },
      ]);
    }
    if (!bill && !valid.selfDeclared) {
      throw new ValidationError("A bill file is required unless the claim is self-declared", [
        { field: "bill_file", message: "Bill file is required" },
      ]);
    }

    const insert = async (claim: Claim): Promise<Claim> => {
      await this.claims.insert(
        claim,
        this.audit.draft({ actor, action: "claim.submit", claimId: id, beforeStatus: null, afterStatus: claim.status })
      );
      return claim;
    };

    if (!bill) {
      await this.assertSelfDeclaration(owner, valid, null);
      return insert(this.assemble(owner, id, valid, { bill: null, analysis: null, analysisError: null }, null));
    }

    const checked = checkBill(bill, this.options.billConstraints);
    await this.duplicates.assertNewBill(owner.id, checked.sha256);

    const storageKey = billStorageKey(owner.id, id, checked.filename);
    const billRef: BillReference = {
      storageKey,
      filename: checked.filename,
      mimeType: checked.mimeType,
      size: checked.data.byteLength,
      sha256: checked.sha256,
    };
    await this.billStore.put(storageKey, checked.data);

    try {
      const { analysis, analysisError } = await this.analyzeBill(owner, id, valid, checked);
      const suspected = await this.duplicates.findSuspectedDuplicate(owner.id, analysis);
      return await insert(this.assemble(owner, id, valid, { bill: billRef, analysis, analysisError }, suspected));
    } catch (error) {
      await this.billStore.delete(storageKey);
      throw error;
    }
  }

  private async analyzeBill(
    owner: Employee,
    id: ClaimId,
    valid: ValidClaimInput,
    checked: CheckedBill
  ): Promise<{ analysis: BillAnalysis | null; analysisError: string | null }> {
    try {
      const analysis = await this.analyzer.analyze(
        { filename: checked.filename, mimeType: checked.mimeType, data: checked.data },
        {
          category: valid.category,
          amount: valid.amount,
          currency: this.options.currency,
          expenseDate: valid.expenseDate,
          description: valid.description,
          grade: owner.grade,
          travelMode: valid.travelMode,
          ceiling: this.policy.limits[owner.grade]?.[valid.category] ?? null,
          allowedTravelModes: this.policy.travelModes[owner.grade] ?? [],
        }
      );
      return { analysis, analysisError: null };
    } catch (error) {
      if (!(error instanceof AnalysisUnavailableError)) throw error;
      this.logger?.warn({ claimId: id, err: error }, "Bill analysis unavailable, continuing without it");
      return { analysis: null, analysisError: error.message };
    }
  }

  // ===========================================================================
  // § Update
  // ===========================================================================

  private async updateNow(owner: Employee, id: ClaimId, input: UpdateClaimInput): Promise<Claim> {
    const actor: Actor = { id: owner.id, role: owner.role };
    const claim = await this.claims.get(id);
    const auditBase = {
      actor,
      action: "claim.update" as const,
      claimId: id,
      beforeStatus: claim?.status ?? null,
      afterStatus: claim?.status ?? null,
    };

    let next: Claim;
    try {
      const current = this.assertEditable(actor, id, claim, "update");
      if (input.bill) {
        throw new ValidationError("The bill of a claim cannot be replaced", [
          { field: "bill_file", message: "Delete the claim and submit it again with the new bill" },
        ]);
      }
      if (input.selfDeclared !== undefined && input.selfDeclared !== current.selfDeclared) {
        throw new ValidationError("A claim cannot switch between billed and self-declared", [
          { field: "self_declared", message: "Delete the claim and submit it again" },
        ]);
      }

      const valid = parseSubmitInput({
        category: keep<string>(input.category, current.category),
        amount: keep<string | number>(input.amount, current.amount),
        expenseDate: keep(input.expenseDate, current.expenseDate),
        description: keep(input.description, current.description),
        travelMode: keep(input.travelMode, current.travel?.mode ?? null),
        travelFrom: keep(input.travelFrom, current.travel?.from ?? null),
        travelTo: keep(input.travelTo, current.travel?.to ?? null),
        selfDeclared: current.selfDeclared,
        noBillReason: keep(input.noBillReason, current.noBillReason),
      });
      if (current.selfDeclared) {
        await this.assertSelfDeclaration(owner, valid, current);
      }

      next = {
        ...this.assemble(
          owner,
          id,
          valid,
          { bill: current.bill, analysis: current.analysis, analysisError: current.analysisError },
          current.suspectedDuplicateOf
        ),
        createdAt: current.createdAt,
      };
      const updated = await this.claims.transition(
        id,
        "submitted",
        next,
        this.audit.draft({ ...auditBase, afterStatus: next.status })
      );
      if (!updated) {
        throw new InvalidStateError(`Claim ${id} was changed by another request`, current.status);
      }
    } catch (error) {
      await this.audit.failure(auditBase, error);
      throw error;
    }

    this.logger?.info(
      { claimId: id, ownerId: owner.id, amount: next.amount, withinLimits: next.limitCheck.withinLimits },
      "Claim updated"
    );
    await this.emit("claim.updated", next, actor, next.status, next.status);
    return next;
  }

  // ===========================================================================
  // § Shared steps
  // ===========================================================================

  /** Visible to the actor, owned by them, `submitted` and undecided */
  private assertEditable(actor: Actor, id: ClaimId, claim: Claim | null, verb: "update" | "delete"): Claim {
    if (!claim || (claim.ownerId !== actor.id && !hasPermission(actor.role, "claim:read_all"))) {
      throw new NotFoundError("Claim", id);
    }
    if (claim.ownerId !== actor.id) {
      throw new ForbiddenError(`Only the owner can ${verb} a claim`);
    }
    if (claim.status !== "submitted" || claim.decisions.length > 0) {
      throw new InvalidStateError(
        `Claim ${id} is '${claim.status}' and can no longer be ${verb}d`,
        claim.status
      );
    }
    return claim;
  }

  /**
   * Monthly quota against the owner's live self-declared claims. `replacing`
   * is an existing claim being edited; its own share is left out.
   */
  private async assertSelfDeclaration(
    owner: Employee,
    valid: ValidClaimInput,
    replacing: Claim | null
  ): Promise<void> {
    const month = expenseMonth(valid.expenseDate);
    const usage = await this.claims.aggregate({
      ownerId: owner.id,
      selfDeclared: true,
      status: LIVE_STATUSES,
      fromDate: `${month}-01`,
      toDate: `${month}-31`,
    });
    let count = usage.count;
    let totalMinor = toMinorUnits(usage.totalAmount);
    if (replacing && expenseMonth(replacing.expenseDate) === month) {
      count -= 1;
      totalMinor -= toMinorUnits(replacing.amount);
    }
    assertSelfDeclarationAllowed(
      this.policy,
      {
        grade: owner.grade,
        category: valid.category,
        amount: valid.amount,
        description: valid.description,
        noBillReason: valid.noBillReason,
      },
      { count, total: fromMinorUnits(totalMinor) }
    );
  }

  private assemble(
    owner: Employee,
    id: ClaimId,
    valid: ValidClaimInput,
    attached: Pick<Claim, "bill" | "analysis" | "analysisError">,
    suspectedDuplicateOf: ClaimId | null
  ): Claim {
    let travelMode = valid.travelMode;
    if (valid.category === "travel" && !travelMode) {
      travelMode = asTravelMode(attached.analysis?.extracted.travelMode);
    }

    const limitCheck = checkExpenseLimits(this.policy, {
      grade: owner.grade,
      category: valid.category,
      amount: valid.amount,
      travelMode,
    });

    const timestamp = this.now().toISOString();
    return {
      id,
      ownerId: owner.id,
      category: valid.category,
      amount: valid.amount,
      currency: this.options.currency,
      expenseDate: valid.expenseDate,
      description: valid.description,
      travel:
        valid.category === "travel"
          ? { mode: travelMode, from: valid.travelFrom, to: valid.travelTo }
          : null,
      bill: attached.bill,
      selfDeclared: valid.selfDeclared,
      noBillReason: valid.selfDeclared ? valid.noBillReason : null,
      status: "submitted",
      limitCheck,
      analysis: attached.analysis,
      analysisError: attached.analysisError,
      suspectedDuplicateOf,
      decisions: [],
      createdAt: timestamp,
      updatedAt: timestamp,
      resolvedAt: null,
    };
  }

  /** Runs `work` after every earlier call queued for the same owner has settled */
  private serialized<T>(ownerId: EmployeeId, work: () => Promise<T>): Promise<T> {
    const previous = this.ownerQueues.get(ownerId) ?? Promise.resolve();
    const run = previous.then(() => work());
    const settled: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.ownerQueues.get(ownerId) === settled) this.ownerQueues.delete(ownerId);
      });
    this.ownerQueues.set(ownerId, settled);
    return run;
  }

  private emit(
    type: ClaimEventType,
    claim: Claim,
    actor: Actor,
    fromStatus: ClaimStatus | null,
    toStatus: ClaimStatus | null
  ): Promise<void> {
    return this.events.emit({
      eventId: EventId(`evt_${randomUUID()}`),
      type,
      claimId: claim.id,
      actor,
      fromStatus,
      toStatus,
      ts: this.now().toISOString(),
      claim,
    });
  }
}
