/**
 * Duplicate bill detection against the owner's earlier, non-rejected claims.
 *
 * - identical file (SHA-256): blocked
 * - same extracted bill number and vendor: flagged only
 */

import type { ClaimStorage } from "../storage/storage-interface.js";
import type { ClaimId, EmployeeId } from "../types/branded.js";
import type { BillAnalysis, ClaimStatus } from "../types/claim-contract.js";
import { DuplicateBillError } from "./errors.js";

const LIVE_STATUSES: ClaimStatus[] = ["submitted", "hr_review", "finance_review", "approved"];

export class DuplicateDetector {
  constructor(private readonly claims: ClaimStorage) {}

  /**
   * @throws {DuplicateBillError} when the owner already claimed this exact file
   */
  async assertNewBill(ownerId: EmployeeId, sha256: string): Promise<void> {
    const existing = await this.claims.list(
      { ownerId, billSha256: sha256, status: LIVE_STATUSES },
      { limit: 1 }
    );
    const match = existing.items[0];
    if (match) {
      throw new DuplicateBillError(match.id);
    }
  }

  async findSuspectedDuplicate(ownerId: EmployeeId, analysis: BillAnalysis | null): Promise<ClaimId | null> {
    const billNumber = analysis?.extracted.billNumber;
    const vendorName = analysis?.extracted.vendorName;
    if (!billNumber || !vendorName) return null;
    const existing = await this.claims.list(
      { ownerId, billNumber, vendorName, status: LIVE_STATUSES },
      { limit: 1 }
    );
    return existing.items[0]?.id ?? null;
  }
}
