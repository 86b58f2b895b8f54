/**
 * SqliteStorage: SQLite implementation of ClaimFlowStorage (better-sqlite3).
 *
 * Each record is kept whole in a JSON `data` column; the columns next to it
 * exist for filtering, sorting and the conditional status update. A write
 * that carries an audit entry inserts it in the same transaction.
 *
 * Tables:
 * - claims: id, ownerId, category, status, amount, expenseDate, ... data
 * - employees: id, username, email, role, active, data
 * - notifications: id, recipientId, isRead, createdAt, data
 * - audit_log: seq, id, claimId, actorId, subjectId, timestamp, data (append-only)
 */

import Database from "better-sqlite3";
import { DuplicateBillError } from "../core/errors.js";
import { fromMinorUnits } from "../policy/limit-validator.js";
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
  type AuditFilter,
  type AuditStorage,
  type ClaimAggregate,
  type ClaimFilter,
  type ClaimFlowStorage,
  type ClaimListOptions,
  type ClaimSortField,
  type ClaimStorage,
  type EmployeeStorage,
  type NotificationListOptions,
  type NotificationStorage,
  type PaginatedResult,
  type PaginationOptions,
} from "./storage-interface.js";

type SqlValue = string | number | null;

interface DataRow {
  data: string;
}

interface CountRow {
  count: number;
}

// =============================================================================
// § Schema
// =============================================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS claims (
    id TEXT PRIMARY KEY,
    ownerId TEXT NOT NULL,
    category TEXT NOT NULL,
    status TEXT NOT NULL,
    amount REAL NOT NULL,
    expenseDate TEXT NOT NULL,
    description TEXT NOT NULL,
    selfDeclared INTEGER NOT NULL,
    withinLimits INTEGER NOT NULL,
    recommendation TEXT,
    billSha256 TEXT,
    billNumber TEXT,
    vendorName TEXT,
    createdAt TEXT NOT NULL,
    updatedAt TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_claims_ownerId ON claims(ownerId);
  CREATE INDEX IF NOT EXISTS idx_claims_status ON claims(status);
  CREATE INDEX IF NOT EXISTS idx_claims_createdAt ON claims(createdAt);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_claims_owner_bill ON claims(ownerId, billSha256)
    WHERE billSha256 IS NOT NULL AND status != 'rejected';

  CREATE TABLE IF NOT EXISTS employees (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE COLLATE NOCASE,
    email TEXT NOT NULL UNIQUE COLLATE NOCASE,
    role TEXT NOT NULL,
    active INTEGER NOT NULL,
    data TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    recipientId TEXT NOT NULL,
    isRead INTEGER NOT NULL,
    createdAt TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_notifications_recipient ON notifications(recipientId, isRead);

  CREATE TABLE IF NOT EXISTS audit_log (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    claimId TEXT,
    actorId TEXT NOT NULL,
    subjectId TEXT,
    timestamp TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_audit_claimId ON audit_log(claimId);
  CREATE INDEX IF NOT EXISTS idx_audit_subjectId ON audit_log(subjectId);

  CREATE TRIGGER IF NOT EXISTS audit_log_no_update BEFORE UPDATE ON audit_log
  BEGIN SELECT RAISE(ABORT, 'audit_log is append-only'); END;

  CREATE TRIGGER IF NOT EXISTS audit_log_no_delete BEFORE DELETE ON audit_log
  BEGIN SELECT RAISE(ABORT, 'audit_log is append-only'); END;
`;

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function likePattern(query: string): string {
  return `%${query.toLowerCase().replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

function placeholders(count: number): string {
  return new Array(count).fill("?").join(", ");
}

function appendAudit(db: Database.Database, entry: AuditEntry): void {
  db.prepare(
    "INSERT INTO audit_log (id, claimId, actorId, subjectId, timestamp, data) VALUES (?, ?, ?, ?, ?, ?)"
  ).run(entry.id, entry.claimId, entry.actorId, entry.subjectId, entry.timestamp, JSON.stringify(entry));
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}

// =============================================================================
// § SQLite Claim Storage
// =============================================================================

const SORT_COLUMNS: Readonly<Record<ClaimSortField, string>> = {
  createdAt: "createdAt",
  amount: "amount",
  expenseDate: "expenseDate",
};

function claimColumns(claim: Claim): SqlValue[] {
  return [
    claim.ownerId,
    claim.category,
    claim.status,
    claim.amount,
    claim.expenseDate,
    claim.description,
    flag(claim.selfDeclared),
    flag(claim.limitCheck.withinLimits),
    claim.analysis?.recommendation ?? null,
    claim.bill?.sha256 ?? null,
    claim.analysis?.extracted.billNumber ?? null,
    claim.analysis?.extracted.vendorName ?? null,
    claim.createdAt,
    claim.updatedAt,
    JSON.stringify(claim),
  ];
}

function buildClaimWhere(filter: ClaimFilter): { where: string; params: SqlValue[] } {
  const clauses: string[] = [];
  const params: SqlValue[] = [];

  const inList = (column: string, values: readonly string[]): void => {
    if (values.length === 0) {
      clauses.push("0 = 1");
      return;
    }
    clauses.push(`${column} IN (${placeholders(values.length)})`);
    params.push(...values);
  };

  if (filter.ownerId) {
    clauses.push("ownerId = ?");
    params.push(filter.ownerId);
  }
  if (filter.ownerIds) inList("ownerId", filter.ownerIds);
  if (filter.excludeOwnerId) {
    clauses.push("ownerId != ?");
    params.push(filter.excludeOwnerId);
  }
  if (filter.status !== undefined) {
    inList("status", Array.isArray(filter.status) ? filter.status : [filter.status]);
  }
  if (filter.category) {
    clauses.push("category = ?");
    params.push(filter.category);
  }
  if (filter.minAmount !== undefined) {
    clauses.push("amount >= ?");
    params.push(filter.minAmount);
  }
  if (filter.maxAmount !== undefined) {
    clauses.push("amount <= ?");
    params.push(filter.maxAmount);
  }
  if (filter.fromDate) {
    clauses.push("expenseDate >= ?");
    params.push(filter.fromDate);
  }
  if (filter.toDate) {
    clauses.push("expenseDate <= ?");
    params.push(filter.toDate);
  }
  if (filter.recommendation) {
    clauses.push("recommendation = ?");
    params.push(filter.recommendation);
  }
  if (filter.withinLimits !== undefined) {
    clauses.push("withinLimits = ?");
    params.push(flag(filter.withinLimits));
  }
  if (filter.selfDeclared !== undefined) {
    clauses.push("selfDeclared = ?");
    params.push(flag(filter.selfDeclared));
  }
  if (filter.billSha256) {
    clauses.push("billSha256 = ?");
    params.push(filter.billSha256);
  }
  if (filter.billNumber) {
    clauses.push("lower(billNumber) = lower(?)");
    params.push(filter.billNumber);
  }
  if (filter.vendorName) {
    clauses.push("lower(vendorName) = lower(?)");
    params.push(filter.vendorName);
  }
  if (filter.text) {
    const pattern = likePattern(filter.text.query);
    const textClauses = [
      "lower(id) LIKE ? ESCAPE '\\'",
      "lower(description) LIKE ? ESCAPE '\\'",
      "lower(vendorName) LIKE ? ESCAPE '\\'",
    ];
    params.push(pattern, pattern, pattern);
    if (filter.text.ownerIds.length > 0) {
      textClauses.push(`ownerId IN (${placeholders(filter.text.ownerIds.length)})`);
      params.push(...filter.text.ownerIds);
    }
    clauses.push(`(${textClauses.join(" OR ")})`);
  }

  return { where: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "", params };
}

class SqliteClaimStorage implements ClaimStorage {
  constructor(private db: Database.Database) {}

  async get(id: ClaimId): Promise<Claim | null> {
    const row = this.db.prepare<[string], DataRow>("SELECT data FROM claims WHERE id = ?").get(id);
    if (!row) return null;
    const claim: Claim = JSON.parse(row.data);
    return claim;
  }

  async insert(claim: Claim, audit?: AuditEntry): Promise<void> {
    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO claims (id, ownerId, category, status, amount, expenseDate, description, selfDeclared,
             withinLimits, recommendation, billSha256, billNumber, vendorName, createdAt, updatedAt, data)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(claim.id, ...claimColumns(claim));
      if (audit) appendAudit(this.db, audit);
    });
    try {
      insert();
    } catch (error) {
      const existing = isUniqueViolation(error) ? this.findLiveBill(claim) : undefined;
      if (existing) throw new DuplicateBillError(existing.id);
      throw error;
    }
  }

  private findLiveBill(claim: Claim): { id: string } | undefined {
    if (!claim.bill) return undefined;
    return this.db
      .prepare<[string, string], { id: string }>(
        "SELECT id FROM claims WHERE ownerId = ? AND billSha256 = ? AND status != 'rejected'"
      )
      .get(claim.ownerId, claim.bill.sha256);
  }

  async transition(id: ClaimId, expectedStatus: ClaimStatus, next: Claim, audit?: AuditEntry): Promise<boolean> {
    const update = this.db.transaction((): boolean => {
      const result = this.db
        .prepare(
          `UPDATE claims SET ownerId = ?, category = ?, status = ?, amount = ?, expenseDate = ?, description = ?,
             selfDeclared = ?, withinLimits = ?, recommendation = ?, billSha256 = ?, billNumber = ?, vendorName = ?,
             createdAt = ?, updatedAt = ?, data = ?
           WHERE id = ? AND status = ?`
        )
        .run(...claimColumns(next), id, expectedStatus);
      if (result.changes !== 1) return false;
      if (audit) appendAudit(this.db, audit);
      return true;
    });
    return update();
  }

  async delete(id: ClaimId, expectedStatus: ClaimStatus, audit?: AuditEntry): Promise<boolean> {
    const remove = this.db.transaction((): boolean => {
      const result = this.db
        .prepare("DELETE FROM claims WHERE id = ? AND status = ?")
        .run(id, expectedStatus);
      if (result.changes === 0) return false;
      if (audit) appendAudit(this.db, audit);
      return true;
    });
    return remove();
  }

  async list(filter: ClaimFilter, options: ClaimListOptions = {}): Promise<PaginatedResult<Claim>> {
    const { where, params } = buildClaimWhere(filter);
    const offset = options.offset ?? 0;
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    const column = SORT_COLUMNS[options.sortBy ?? "createdAt"];
    const direction = options.sortOrder === "asc" ? "ASC" : "DESC";

    const countRow = this.db
      .prepare<SqlValue[], CountRow>(`SELECT COUNT(*) AS count FROM claims ${where}`)
      .get(...params);
    const total = countRow?.count ?? 0;

    const rows = this.db
      .prepare<SqlValue[], DataRow>(
        `SELECT data FROM claims ${where} ORDER BY ${column} ${direction} LIMIT ? OFFSET ?`
      )
      .all(...params, limit, offset);

    const items = rows.map((row): Claim => JSON.parse(row.data));
    return { items, total, offset, limit, hasMore: offset + limit < total };
  }

  async aggregate(filter: ClaimFilter): Promise<ClaimAggregate> {
    const { where, params } = buildClaimWhere(filter);
    const row = this.db
      .prepare<SqlValue[], { count: number; totalMinor: number | null }>(
        `SELECT COUNT(*) AS count, SUM(CAST(ROUND(amount * 100) AS INTEGER)) AS totalMinor FROM claims ${where}`
      )
      .get(...params);
    return { count: row?.count ?? 0, totalAmount: fromMinorUnits(row?.totalMinor ?? 0) };
  }
}

// =============================================================================
// § SQLite Employee Directory
// =============================================================================

class SqliteEmployeeStorage implements EmployeeStorage {
  constructor(private db: Database.Database) {}

  private parse(rows: DataRow[]): Employee[] {
    return rows.map((row): Employee => JSON.parse(row.data));
  }

  async get(id: EmployeeId): Promise<Employee | null> {
    const row = this.db.prepare<[string], DataRow>("SELECT data FROM employees WHERE id = ?").get(id);
    return row ? this.parse([row])[0] ?? null : null;
  }

  async getByLogin(login: string): Promise<Employee | null> {
    const row = this.db
      .prepare<[string, string], DataRow>("SELECT data FROM employees WHERE username = ? OR email = ?")
      .get(login, login);
    return row ? this.parse([row])[0] ?? null : null;
  }

  async listByRole(role: Role): Promise<Employee[]> {
    const rows = this.db
      .prepare<[string], DataRow>("SELECT data FROM employees WHERE role = ? AND active = 1 ORDER BY id")
      .all(role);
    return this.parse(rows);
  }

  async list(): Promise<Employee[]> {
    return this.parse(this.db.prepare<[], DataRow>("SELECT data FROM employees ORDER BY id").all());
  }

  async save(employee: Employee, audit?: AuditEntry): Promise<void> {
    const save = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO employees (id, username, email, role, active, data) VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET username = excluded.username, email = excluded.email,
             role = excluded.role, active = excluded.active, data = excluded.data`
        )
        .run(
          employee.id,
          employee.username,
          employee.email,
          employee.role,
          flag(employee.active),
          JSON.stringify(employee)
        );
      if (audit) appendAudit(this.db, audit);
    });
    save();
  }

  async delete(id: EmployeeId, audit?: AuditEntry): Promise<boolean> {
    const remove = this.db.transaction((): boolean => {
      const result = this.db.prepare("DELETE FROM employees WHERE id = ?").run(id);
      if (result.changes === 0) return false;
      if (audit) appendAudit(this.db, audit);
      return true;
    });
    return remove();
  }
}

// =============================================================================
// § SQLite Notifications
// =============================================================================

class SqliteNotificationStorage implements NotificationStorage {
  constructor(private db: Database.Database) {}

  private write(notification: Notification): void {
    this.db
      .prepare("UPDATE notifications SET isRead = ?, data = ? WHERE id = ?")
      .run(flag(notification.isRead), JSON.stringify(notification), notification.id);
  }

  async create(notification: Notification): Promise<void> {
    this.db
      .prepare("INSERT INTO notifications (id, recipientId, isRead, createdAt, data) VALUES (?, ?, ?, ?, ?)")
      .run(
        notification.id,
        notification.recipientId,
        flag(notification.isRead),
        notification.createdAt,
        JSON.stringify(notification)
      );
  }

  async listForRecipient(
    recipientId: EmployeeId,
    options: NotificationListOptions = {}
  ): Promise<PaginatedResult<Notification>> {
    const where = options.unreadOnly ? "WHERE recipientId = ? AND isRead = 0" : "WHERE recipientId = ?";
    const offset = options.offset ?? 0;
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    const countRow = this.db
      .prepare<[string], CountRow>(`SELECT COUNT(*) AS count FROM notifications ${where}`)
      .get(recipientId);
    const total = countRow?.count ?? 0;
    const rows = this.db
      .prepare<[string, number, number], DataRow>(
        `SELECT data FROM notifications ${where} ORDER BY createdAt DESC LIMIT ? OFFSET ?`
      )
      .all(recipientId, limit, offset);
    const items = rows.map((row): Notification => JSON.parse(row.data));
    return { items, total, offset, limit, hasMore: offset + limit < total };
  }

  async countUnread(recipientId: EmployeeId): Promise<number> {
    const row = this.db
      .prepare<[string], CountRow>("SELECT COUNT(*) AS count FROM notifications WHERE recipientId = ? AND isRead = 0")
      .get(recipientId);
    return row?.count ?? 0;
  }

  async markRead(id: NotificationId, recipientId: EmployeeId, readAt: string): Promise<Notification | null> {
    const row = this.db
      .prepare<[string, string], DataRow>("SELECT data FROM notifications WHERE id = ? AND recipientId = ?")
      .get(id, recipientId);
    if (!row) return null;
    const notification: Notification = JSON.parse(row.data);
    if (!notification.isRead) {
      notification.isRead = true;
      notification.readAt = readAt;
      this.write(notification);
    }
    return notification;
  }

  async markAllRead(recipientId: EmployeeId, readAt: string): Promise<number> {
    const rows = this.db
      .prepare<[string], DataRow>("SELECT data FROM notifications WHERE recipientId = ? AND isRead = 0")
      .all(recipientId);
    const markAll = this.db.transaction((unread: Notification[]) => {
      for (const notification of unread) {
        this.write({ ...notification, isRead: true, readAt });
      }
    });
    markAll(rows.map((row): Notification => JSON.parse(row.data)));
    return rows.length;
  }

  async delete(id: NotificationId, recipientId: EmployeeId): Promise<boolean> {
    const result = this.db
      .prepare("DELETE FROM notifications WHERE id = ? AND recipientId = ?")
      .run(id, recipientId);
    return result.changes > 0;
  }

  async deleteAll(recipientId: EmployeeId): Promise<number> {
    return this.db.prepare("DELETE FROM notifications WHERE recipientId = ?").run(recipientId).changes;
  }
}

// =============================================================================
// § SQLite Audit Log
// =============================================================================

class SqliteAuditStorage implements AuditStorage {
  constructor(private db: Database.Database) {}

  async append(entry: AuditEntry): Promise<void> {
    appendAudit(this.db, entry);
  }

  async list(filter: AuditFilter, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>> {
    const clauses: string[] = [];
    const params: SqlValue[] = [];
    if (filter.claimId) {
      clauses.push("claimId = ?");
      params.push(filter.claimId);
    }
    if (filter.actorId) {
      clauses.push("actorId = ?");
      params.push(filter.actorId);
    }
    if (filter.subjectId) {
      clauses.push("subjectId = ?");
      params.push(filter.subjectId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const offset = pagination?.offset ?? 0;
    const limit = pagination?.limit ?? DEFAULT_PAGE_SIZE;

    const countRow = this.db
      .prepare<SqlValue[], CountRow>(`SELECT COUNT(*) AS count FROM audit_log ${where}`)
      .get(...params);
    const total = countRow?.count ?? 0;
    const rows = this.db
      .prepare<SqlValue[], DataRow>(`SELECT data FROM audit_log ${where} ORDER BY seq ASC LIMIT ? OFFSET ?`)
      .all(...params, limit, offset);
    const items = rows.map((row): AuditEntry => JSON.parse(row.data));
    return { items, total, offset, limit, hasMore: offset + limit < total };
  }
}

// =============================================================================
// § SqliteStorage: Unified SQLite Storage
// =============================================================================

export interface SqliteStorageOptions {
  /** Path to the database file, or :memory: */
  dbPath: string;
}

export class SqliteStorage implements ClaimFlowStorage {
  readonly claims: ClaimStorage;
  readonly employees: EmployeeStorage;
  readonly notifications: NotificationStorage;
  readonly audit: AuditStorage;
  private readonly db: Database.Database;
  private closed = false;

  constructor(options: SqliteStorageOptions) {
    this.db = new Database(options.dbPath);
    this.claims = new SqliteClaimStorage(this.db);
    this.employees = new SqliteEmployeeStorage(this.db);
    this.notifications = new SqliteNotificationStorage(this.db);
    this.audit = new SqliteAuditStorage(this.db);
  }

  async initialize(): Promise<void> {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    const start = Date.now();
    if (this.closed) {
      return { ok: false, latencyMs: 0 };
    }
    try {
      this.db.prepare("SELECT 1").get();
      return { ok: true, latencyMs: Date.now() - start };
    } catch {
      return { ok: false, latencyMs: Date.now() - start };
    }
  }
}
