/**
 * ClaimReports - reviewer-facing search, summary and audit lookups.
 */

import type {
  ClaimSortField,
  ClaimStorage,
  EmployeeStorage,
  PaginatedResult,
  PaginationOptions,
  ClaimFilter,
} from "../storage/storage-interface.js";
import type { ClaimId, EmployeeId } from "../types/branded.js";
import {
  CLAIM_STATUSES,
  EXPENSE_CATEGORIES,
  type AuditEntry,
  type Claim,
  type ClaimStatus,
  type ExpenseCategory,
  type Grade,
  type Recommendation,
} from "../types/claim-contract.js";
import type { AuditTrail } from "./audit-trail.js";
import { NotFoundError } from "./errors.js";

export interface ClaimSearchQuery {
  q?: string;
  category?: ExpenseCategory;
  status?: ClaimStatus;
  employeeId?: EmployeeId;
  grade?: Grade;
  minAmount?: number;
  maxAmount?: number;
  fromDate?: string;
  toDate?: string;
  recommendation?: Recommendation;
  withinLimits?: boolean;
  sortBy?: ClaimSortField;
  sortOrder?: "asc" | "desc";
  offset?: number;
  limit?: number;
}

export interface Bucket {
  count: number;
  totalAmount: number;
}

export interface ClaimSummary {
  total: Bucket;
  byStatus: Array<Bucket & { status: ClaimStatus }>;
  byCategory: Array<Bucket & { category: ExpenseCategory }>;
}

const EMPTY: Bucket = { count: 0, totalAmount: 0 };

export class ClaimReports {
  constructor(
    private readonly claims: ClaimStorage,
    private readonly employees: EmployeeStorage,
    private readonly audit: AuditTrail
  ) {}

  async search(query: ClaimSearchQuery): Promise<PaginatedResult<Claim>> {
    const filter: ClaimFilter = {
      category: query.category,
      status: query.status,
      ownerId: query.employeeId,
      minAmount: query.minAmount,
      maxAmount: query.maxAmount,
      fromDate: query.fromDate,
      toDate: query.toDate,
      recommendation: query.recommendation,
      withinLimits: query.withinLimits,
    };

    const q = query.q?.trim();
    if (q || query.grade) {
      const everyone = await this.employees.list();
      if (query.grade) {
        filter.ownerIds = everyone.filter((e) => e.grade === query.grade).map((e) => e.id);
      }
      if (q) {
        const needle = q.toLowerCase();
        filter.text = {
          query: q,
          ownerIds: everyone
            .filter(
              (e) =>
                e.fullName.toLowerCase().includes(needle) || e.username.toLowerCase().includes(needle)
            )
            .map((e) => e.id),
        };
      }
    }

    return this.claims.list(filter, {
      sortBy: query.sortBy ?? "createdAt",
      sortOrder: query.sortOrder ?? "desc",
      offset: query.offset,
      limit: query.limit,
    });
  }

  async summary(): Promise<ClaimSummary> {
    const [total, statuses, categories] = await Promise.all([
      this.claims.aggregate({}),
      Promise.all(CLAIM_STATUSES.map((status) => this.claims.aggregate({ status }))),
      Promise.all(EXPENSE_CATEGORIES.map((category) => this.claims.aggregate({ category }))),
    ]);

    return {
      total: { count: total.count, totalAmount: total.totalAmount },
      byStatus: CLAIM_STATUSES.map((status, i) => ({ status, ...(statuses[i] ?? EMPTY) })),
      byCategory: EXPENSE_CATEGORIES.map((category, i) => ({ category, ...(categories[i] ?? EMPTY) })),
    };
  }

  /** Entries oldest first. Unknown claims are NotFound. */
  async auditTrail(claimId: ClaimId, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>> {
    const entries = await this.audit.forClaim(claimId, pagination);
    if (entries.total === 0 && !(await this.claims.get(claimId))) {
      throw new NotFoundError("Claim", claimId);
    }
    return entries;
  }
}
