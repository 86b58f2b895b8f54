/**
 * MemoryStorage: in-memory implementation of ClaimFlowStorage.
 *
 * Records are cloned on the way in and out so callers never share
 * mutable state with the store; `transition` is a compare-and-set on the
 * stored status. Each write runs without awaiting, so its checks and the
 * audit entry that goes with it can't interleave with another request.
 */

import { DuplicateBillError } from "../core/errors.js";
import { fromMinorUnits, toMinorUnits } from "../policy/limit-validator.js";
import type { ClaimId, EmployeeId, NotificationId } from "../types/branded.js";
import type {
  AuditEntry,
  Claim,
  ClaimStatus,
  Employee,
  Notification,
  Role,
} from "../types/claim-contract.js";
import {
  DEFAULT_PAGE_SIZE,
  paginate,
  type AuditFilter,
  type AuditStorage,
  type ClaimAggregate,
  type ClaimFilter,
  type ClaimFlowStorage,
  type ClaimListOptions,
  type ClaimStorage,
  type EmployeeStorage,
  type NotificationListOptions,
  type NotificationStorage,
  type PaginatedResult,
  type PaginationOptions,
} from "./storage-interface.js";

// =============================================================================
// § Claim Filtering
// =============================================================================

function includesFolded(haystack: string | null | undefined, needle: string): boolean {
  return haystack != null && haystack.toLowerCase().includes(needle);
}

export function matchesClaimFilter(claim: Claim, filter: ClaimFilter): boolean {
  if (filter.ownerId && claim.ownerId !== filter.ownerId) return false;
  if (filter.ownerIds && !filter.ownerIds.includes(claim.ownerId)) return false;
  if (filter.excludeOwnerId && claim.ownerId === filter.excludeOwnerId) return false;
  if (filter.status !== undefined) {
    const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
    if (!statuses.includes(claim.status)) return false;
  }
  if (filter.category && claim.category !== filter.category) return false;
  if (filter.minAmount !== undefined && claim.amount < filter.minAmount) return false;
  if (filter.maxAmount !== undefined && claim.amount > filter.maxAmount) return false;
  if (filter.fromDate && claim.expenseDate < filter.fromDate) return false;
  if (filter.toDate && claim.expenseDate > filter.toDate) return false;
  if (filter.recommendation && claim.analysis?.recommendation !== filter.recommendation) return false;
  if (filter.withinLimits !== undefined && claim.limitCheck.withinLimits !== filter.withinLimits) return false;
  if (filter.selfDeclared !== undefined && claim.selfDeclared !== filter.selfDeclared) return false;
  if (filter.billSha256 && claim.bill?.sha256 !== filter.billSha256) return false;

  const extracted = claim.analysis?.extracted;
  if (filter.billNumber && extracted?.billNumber?.toLowerCase() !== filter.billNumber.toLowerCase()) {
    return false;
  }
  if (filter.vendorName && extracted?.vendorName?.toLowerCase() !== filter.vendorName.toLowerCase()) {
    return false;
  }

  if (filter.text) {
    const query = filter.text.query.toLowerCase();
    const matched =
      includesFolded(claim.id, query) ||
      includesFolded(claim.description, query) ||
      includesFolded(extracted?.vendorName, query) ||
      filter.text.ownerIds.includes(claim.ownerId);
    if (!matched) return false;
  }
  return true;
}

function compareClaims(a: Claim, b: Claim, options: ClaimListOptions): number {
  const field = options.sortBy ?? "createdAt";
  const direction = options.sortOrder === "asc" ? 1 : -1;
  const diff = field === "amount" ? a.amount - b.amount : a[field].localeCompare(b[field]);
  return diff * direction;
}

// =============================================================================
// § In-Memory Claim Storage
// =============================================================================

export class InMemoryClaimStorage implements ClaimStorage {
  private claims = new Map<ClaimId, Claim>();

  constructor(private readonly auditLog: InMemoryAuditStorage = new InMemoryAuditStorage()) {}

  async get(id: ClaimId): Promise<Claim | null> {
    const claim = this.claims.get(id);
    return claim ? structuredClone(claim) : null;
  }

  async insert(claim: Claim, audit?: AuditEntry): Promise<void> {
    if (this.claims.has(claim.id)) {
      throw new Error(`Claim already exists: ${claim.id}`);
    }
    const sha256 = claim.bill?.sha256;
    if (sha256 && claim.status !== "rejected") {
      for (const existing of this.claims.values()) {
        if (
          existing.ownerId === claim.ownerId &&
          existing.status !== "rejected" &&
          existing.bill?.sha256 === sha256
        ) {
          throw new DuplicateBillError(existing.id);
        }
      }
    }
    if (audit) this.auditLog.record(audit);
    this.claims.set(claim.id, structuredClone(claim));
  }

  async transition(id: ClaimId, expectedStatus: ClaimStatus, next: Claim, audit?: AuditEntry): Promise<boolean> {
    const current = this.claims.get(id);
    if (!current || current.status !== expectedStatus) return false;
    if (audit) this.auditLog.record(audit);
    this.claims.set(id, structuredClone(next));
    return true;
  }

  async delete(id: ClaimId, expectedStatus: ClaimStatus, audit?: AuditEntry): Promise<boolean> {
    const current = this.claims.get(id);
    if (!current || current.status !== expectedStatus) return false;
    if (audit) this.auditLog.record(audit);
    return this.claims.delete(id);
  }

  async list(filter: ClaimFilter, options: ClaimListOptions = {}): Promise<PaginatedResult<Claim>> {
    const matched = Array.from(this.claims.values())
      .filter((claim) => matchesClaimFilter(claim, filter))
      .sort((a, b) => compareClaims(a, b, options))
      .map((claim) => structuredClone(claim));
    return paginate(matched, options);
  }

  async aggregate(filter: ClaimFilter): Promise<ClaimAggregate> {
    let count = 0;
    let totalMinor = 0;
    for (const claim of this.claims.values()) {
      if (matchesClaimFilter(claim, filter)) {
        count++;
        totalMinor += toMinorUnits(claim.amount);
      }
    }
    return { count, totalAmount: fromMinorUnits(totalMinor) };
  }
}

// =============================================================================
// § In-Memory Employee Directory
// =============================================================================

export class InMemoryEmployeeStorage implements EmployeeStorage {
  private employees = new Map<EmployeeId, Employee>();

  constructor(private readonly auditLog: InMemoryAuditStorage = new InMemoryAuditStorage()) {}

  async get(id: EmployeeId): Promise<Employee | null> {
    const employee = this.employees.get(id);
    return employee ? { ...employee } : null;
  }

  async getByLogin(login: string): Promise<Employee | null> {
    const needle = login.toLowerCase();
    for (const employee of this.employees.values()) {
      if (employee.username.toLowerCase() === needle || employee.email.toLowerCase() === needle) {
        return { ...employee };
      }
    }
    return null;
  }

  async listByRole(role: Role): Promise<Employee[]> {
    return Array.from(this.employees.values())
      .filter((e) => e.role === role && e.active)
      .map((e) => ({ ...e }));
  }

  async list(): Promise<Employee[]> {
    return Array.from(this.employees.values()).map((e) => ({ ...e }));
  }

  async save(employee: Employee, audit?: AuditEntry): Promise<void> {
    if (audit) this.auditLog.record(audit);
    this.employees.set(employee.id, { ...employee });
  }

  async delete(id: EmployeeId, audit?: AuditEntry): Promise<boolean> {
    if (!this.employees.has(id)) return false;
    if (audit) this.auditLog.record(audit);
    return this.employees.delete(id);
  }
}

// =============================================================================
// § In-Memory Notifications
// =============================================================================

export class InMemoryNotificationStorage implements NotificationStorage {
  private notifications = new Map<NotificationId, Notification>();

  async create(notification: Notification): Promise<void> {
    this.notifications.set(notification.id, { ...notification });
  }

  async listForRecipient(
    recipientId: EmployeeId,
    options: NotificationListOptions = {}
  ): Promise<PaginatedResult<Notification>> {
    const matched = Array.from(this.notifications.values())
      .filter((n) => n.recipientId === recipientId && (!options.unreadOnly || !n.isRead))
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
      .map((n) => ({ ...n }));
    return paginate(matched, { offset: options.offset, limit: options.limit ?? DEFAULT_PAGE_SIZE });
  }

  async countUnread(recipientId: EmployeeId): Promise<number> {
    let count = 0;
    for (const n of this.notifications.values()) {
      if (n.recipientId === recipientId && !n.isRead) count++;
    }
    return count;
  }

  async markRead(id: NotificationId, recipientId: EmployeeId, readAt: string): Promise<Notification | null> {
    const current = this.notifications.get(id);
    if (!current || current.recipientId !== recipientId) return null;
    if (!current.isRead) {
      current.isRead = true;
      current.readAt = readAt;
    }
    return { ...current };
  }

  async markAllRead(recipientId: EmployeeId, readAt: string): Promise<number> {
    let updated = 0;
    for (const n of this.notifications.values()) {
      if (n.recipientId === recipientId && !n.isRead) {
        n.isRead = true;
        n.readAt = readAt;
        updated++;
      }
    }
    return updated;
  }

  async delete(id: NotificationId, recipientId: EmployeeId): Promise<boolean> {
    const current = this.notifications.get(id);
    if (!current || current.recipientId !== recipientId) return false;
    return this.notifications.delete(id);
  }

  async deleteAll(recipientId: EmployeeId): Promise<number> {
    let removed = 0;
    for (const [id, n] of this.notifications) {
      if (n.recipientId === recipientId) {
        this.notifications.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

// =============================================================================
// § In-Memory Audit Log
// =============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.record(entry);
  }

  /** Synchronous append, used by the other in-memory stores inside their writes */
  record(entry: AuditEntry): void {
    this.entries.push(structuredClone(entry));
  }

  async list(filter: AuditFilter, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>> {
    const matched = this.entries
      .filter(
        (e) =>
          (!filter.claimId || e.claimId === filter.claimId) &&
          (!filter.actorId || e.actorId === filter.actorId) &&
          (!filter.subjectId || e.subjectId === filter.subjectId)
      )
      .map((e) => structuredClone(e));
    return paginate(matched, pagination);
  }
}

// =============================================================================
// § Memory Storage
// =============================================================================

export class MemoryStorage implements ClaimFlowStorage {
  readonly audit: InMemoryAuditStorage;
  readonly claims: InMemoryClaimStorage;
  readonly employees: InMemoryEmployeeStorage;
  readonly notifications = new InMemoryNotificationStorage();

  constructor(audit: InMemoryAuditStorage = new InMemoryAuditStorage()) {
    this.audit = audit;
    this.claims = new InMemoryClaimStorage(audit);
    this.employees = new InMemoryEmployeeStorage(audit);
  }

  async initialize(): Promise<void> {
    // Nothing to set up
  }

  async close(): Promise<void> {
    // Nothing to tear down
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    return { ok: true, latencyMs: 0 };
  }
}
