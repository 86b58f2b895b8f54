/**
 * ClaimFlowStorage: pluggable storage for claims, employees,
 * notifications and the audit log.
 *
 * Implementations:
 * - MemoryStorage: in-process maps, for dev and tests
 * - SqliteStorage: single-node persistence via better-sqlite3
 */

import type { ClaimId, EmployeeId, NotificationId } from "../types/branded.js";
import type {
  AuditEntry,
  Claim,
  ClaimStatus,
  Employee,
  ExpenseCategory,
  Notification,
  Recommendation,
  Role,
} from "../types/claim-contract.js";

// =============================================================================
// § Filter & Pagination
// =============================================================================

export interface ClaimFilter {
  ownerId?: EmployeeId;
  /** Restrict to these owners (e.g. everyone of one grade) */
  ownerIds?: EmployeeId[];
  excludeOwnerId?: EmployeeId;
  status?: ClaimStatus | ClaimStatus[];
  category?: ExpenseCategory;
  minAmount?: number;
  maxAmount?: number;
  /** Inclusive bounds on expenseDate (YYYY-MM-DD) */
  fromDate?: string;
  toDate?: string;
  recommendation?: Recommendation;
  withinLimits?: boolean;
  selfDeclared?: boolean;
  billSha256?: string;
  /** Case-insensitive, matched against extracted bill number and vendor */
  billNumber?: string;
  vendorName?: string;
  /**
   * Free text matched against claim id, description and vendor; claims of
   * `ownerIds` (employees whose name matched) count as matches too.
   */
  text?: { query: string; ownerIds: EmployeeId[] };
}

export type ClaimSortField = "createdAt" | "amount" | "expenseDate";

export interface ClaimListOptions {
  sortBy?: ClaimSortField;
  sortOrder?: "asc" | "desc";
  offset?: number;
  limit?: number;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

export interface PaginationOptions {
  offset?: number;
  limit?: number;
}

export interface ClaimAggregate {
  count: number;
  totalAmount: number;
}

export const DEFAULT_PAGE_SIZE = 50;

// =============================================================================
// § Claim Storage
// =============================================================================

/**
 * Writes take an optional audit entry, appended in the same transaction
 * as the change: if either fails, neither is kept.
 */
export interface ClaimStorage {
  get(id: ClaimId): Promise<Claim | null>;
  /**
   * @throws {DuplicateBillError} the owner has a non-rejected claim with
   *   the same bill hash
   * @throws when a claim with the same id exists
   */
  insert(claim: Claim, audit?: AuditEntry): Promise<void>;
  /**
   * Replace the claim only if its stored status still equals
   * `expectedStatus`. Returns false when nothing was written.
   */
  transition(id: ClaimId, expectedStatus: ClaimStatus, next: Claim, audit?: AuditEntry): Promise<boolean>;
  /** Delete only if the stored status equals `expectedStatus` */
  delete(id: ClaimId, expectedStatus: ClaimStatus, audit?: AuditEntry): Promise<boolean>;
  list(filter: ClaimFilter, options?: ClaimListOptions): Promise<PaginatedResult<Claim>>;
  aggregate(filter: ClaimFilter): Promise<ClaimAggregate>;
}

// =============================================================================
// § Employee Directory
// =============================================================================

export interface EmployeeStorage {
  get(id: EmployeeId): Promise<Employee | null>;
  /** Lookup by username or email, case-insensitive */
  getByLogin(login: string): Promise<Employee | null>;
  /** Active employees holding `role` */
  listByRole(role: Role): Promise<Employee[]>;
  list(): Promise<Employee[]>;
  save(employee: Employee, audit?: AuditEntry): Promise<void>;
  delete(id: EmployeeId, audit?: AuditEntry): Promise<boolean>;
}

// =============================================================================
// § Notifications
// =============================================================================

export interface NotificationListOptions extends PaginationOptions {
  unreadOnly?: boolean;
}

export interface NotificationStorage {
  create(notification: Notification): Promise<void>;
  listForRecipient(
    recipientId: EmployeeId,
    options?: NotificationListOptions
  ): Promise<PaginatedResult<Notification>>;
  countUnread(recipientId: EmployeeId): Promise<number>;
  /** Returns null when the notification doesn't exist or isn't the recipient's */
  markRead(id: NotificationId, recipientId: EmployeeId, readAt: string): Promise<Notification | null>;
  markAllRead(recipientId: EmployeeId, readAt: string): Promise<number>;
  delete(id: NotificationId, recipientId: EmployeeId): Promise<boolean>;
  /** Returns how many were removed */
  deleteAll(recipientId: EmployeeId): Promise<number>;
}

// =============================================================================
// § Audit Log
// =============================================================================

export interface AuditFilter {
  claimId?: ClaimId;
  actorId?: EmployeeId;
  subjectId?: EmployeeId;
}

/** Append-only: no update or delete */
export interface AuditStorage {
  append(entry: AuditEntry): Promise<void>;
  /** Oldest first */
  list(filter: AuditFilter, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>>;
}

// =============================================================================
// § Unified Storage Interface
// =============================================================================

export interface ClaimFlowStorage {
  claims: ClaimStorage;
  employees: EmployeeStorage;
  notifications: NotificationStorage;
  audit: AuditStorage;
  initialize(): Promise<void>;
  close(): Promise<void>;
  healthCheck(): Promise<{ ok: boolean; latencyMs: number }>;
}

export function paginate<T>(all: T[], pagination: PaginationOptions | undefined): PaginatedResult<T> {
  const offset = pagination?.offset ?? 0;
  const limit = pagination?.limit ?? DEFAULT_PAGE_SIZE;
  return {
    items: all.slice(offset, offset + limit),
    total: all.length,
    offset,
    limit,
    hasMore: offset + limit < all.length,
  };
}
