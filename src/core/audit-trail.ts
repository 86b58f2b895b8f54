/**
 * AuditTrail: writes append-only audit entries for claim and employee
 * actions, successful or not.
 *
 * Successful state changes don't go through `success()` on their own: the
 * manager builds the entry with `draft()` and hands it to the storage call
 * that commits the change, so both land or neither does.
 */

import { randomUUID } from "node:crypto";
import type { AuditStorage, PaginatedResult, PaginationOptions } from "../storage/storage-interface.js";
import { AuditEntryId, type ClaimId, type EmployeeId } from "../types/branded.js";
import type { Actor, AuditAction, AuditChanges, AuditEntry, ClaimStatus } from "../types/claim-contract.js";
import { errorType } from "./errors.js";

export interface AuditRecord {
  actor: Actor;
  action: AuditAction;
  claimId: ClaimId | null;
  beforeStatus: ClaimStatus | null;
  afterStatus: ClaimStatus | null;
  comment?: string | null;
  subjectId?: EmployeeId | null;
  changes?: AuditChanges | null;
}

export class AuditTrail {
  constructor(
    private readonly storage: AuditStorage,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** A success entry, not yet written */
  draft(record: AuditRecord): AuditEntry {
    return this.build(record, "success", null);
  }

  async success(record: AuditRecord): Promise<AuditEntry> {
    const entry = this.draft(record);
    await this.storage.append(entry);
    return entry;
  }

  /** Before and after status are expected to be equal: nothing changed */
  async failure(record: AuditRecord, error: unknown): Promise<AuditEntry> {
    const entry = this.build(record, "failure", {
      type: errorType(error),
      message: error instanceof Error ? error.message : String(error),
    });
    await this.storage.append(entry);
    return entry;
  }

  forClaim(claimId: ClaimId, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>> {
    return this.storage.list({ claimId }, pagination);
  }

  forEmployee(subjectId: EmployeeId, pagination?: PaginationOptions): Promise<PaginatedResult<AuditEntry>> {
    return this.storage.list({ subjectId }, pagination);
  }

  private build(
    record: AuditRecord,
    outcome: AuditEntry["outcome"],
    error: AuditEntry["error"]
  ): AuditEntry {
    return {
      id: AuditEntryId(`aud_${randomUUID()}`),
      actorId: record.actor.id,
      actorRole: record.actor.role,
      action: record.action,
      claimId: record.claimId,
      subjectId: record.subjectId ?? null,
      outcome,
      beforeStatus: record.beforeStatus,
      afterStatus: record.afterStatus,
      comment: record.comment ?? null,
      error,
      changes: record.changes ?? null,
      timestamp: this.now().toISOString(),
    };
  }
}
