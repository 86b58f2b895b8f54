/**
 * ClaimFlow Claim Contract - TypeScript Type Definitions
 */

import type {
  AuditEntryId,
  ClaimId,
  EmployeeId,
  EventId,
  NotificationId,
} from "./branded.js";

// =============================================================================
// § Enumerations
// =============================================================================

export const EXPENSE_CATEGORIES = [
  "travel",
  "food",
  "medical",
  "accommodation",
  "communication",
  "other",
] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const TRAVEL_MODES = [
  "bus",
  "train",
  "cab",
  "flight_economy",
  "flight_business",
  "own_vehicle",
] as const;
export type TravelMode = (typeof TRAVEL_MODES)[number];

export const GRADES = ["A", "B", "C", "D"] as const;
export type Grade = (typeof GRADES)[number];

export const ROLES = ["employee", "manager", "hr", "finance", "admin"] as const;
export type Role = (typeof ROLES)[number];

/**
 * Claim lifecycle states. `submitted` is the manager stage of the chain.
 */
export const CLAIM_STATUSES = [
  "submitted",
  "hr_review",
  "finance_review",
  "approved",
  "rejected",
] as const;
export type ClaimStatus = (typeof CLAIM_STATUSES)[number];

export const ClaimStatus = {
  SUBMITTED: "submitted",
  HR_REVIEW: "hr_review",
  FINANCE_REVIEW: "finance_review",
  APPROVED: "approved",
  REJECTED: "rejected",
} as const satisfies Record<string, ClaimStatus>;

export type DecisionOutcome = "approve" | "reject";

export const RECOMMENDATIONS = ["APPROVE", "REJECT", "REVIEW"] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

// =============================================================================
// § Identity
// =============================================================================

/**
 * Who is performing an operation. Recorded on decisions and audit entries.
 */
export interface Actor {
  id: EmployeeId;
  role: Role;
}

export interface Employee {
  id: EmployeeId;
  username: string;
  email: string;
  fullName: string;
  department: string | null;
  role: Role;
  grade: Grade;
  canClaimExpenses: boolean;
  active: boolean;
  /** scrypt hash, see auth/password.ts */
  passwordHash: string;
  createdAt: string;
}

export type PublicEmployee = Omit<Employee, "passwordHash">;

// =============================================================================
// § Claim
// =============================================================================

export interface TravelDetails {
  mode: TravelMode | null;
  from: string | null;
  to: string | null;
}

export interface BillReference {
  storageKey: string;
  filename: string;
  mimeType: string;
  size: number;
  sha256: string;
}

export interface ExtractedBillFields {
  billNumber: string | null;
  billDate: string | null;
  vendorName: string | null;
  amount: number | null;
  hasGst: boolean | null;
  gstNumber: string | null;
  travelMode: string | null;
  travelRoute: string | null;
  paymentMethod: string | null;
}

/**
 * Advisory AI verdict on a bill. Produced once at submission.
 */
export interface BillAnalysis {
  isAuthentic: boolean;
  confidenceScore: number;
  hasRequiredStamps: boolean | null;
  extracted: ExtractedBillFields;
  recommendation: Recommendation;
  recommendationReason: string;
  redFlags: string[];
  missingElements: string[];
  summary: string;
  model: string;
  analyzedAt: string;
}

export interface LimitCheck {
  withinLimits: boolean;
  reason: string;
  /** Ceiling applied, null when the grade/category pair is not configured */
  ceiling: number | null;
}

export interface Decision {
  actorId: EmployeeId;
  actorRole: Role;
  outcome: DecisionOutcome;
  comment: string | null;
  fromStatus: ClaimStatus;
  toStatus: ClaimStatus;
  timestamp: string;
}

export interface Claim {
  id: ClaimId;
  ownerId: EmployeeId;
  category: ExpenseCategory;
  amount: number;
  currency: string;
  expenseDate: string;
  description: string;
  travel: TravelDetails | null;
  bill: BillReference | null;
  selfDeclared: boolean;
  noBillReason: string | null;
  status: ClaimStatus;
  limitCheck: LimitCheck;
  analysis: BillAnalysis | null;
  analysisError: string | null;
  suspectedDuplicateOf: ClaimId | null;
  decisions: Decision[];
  createdAt: string;
  updatedAt: string;
  resolvedAt: string | null;
}

// =============================================================================
// § Notifications
// =============================================================================

export type NotificationType =
  | "claim_submitted"
  | "approval_required"
  | "claim_advanced"
  | "claim_approved"
  | "claim_rejected"
  | "claim_deleted";

export interface Notification {
  id: NotificationId;
  recipientId: EmployeeId;
  claimId: ClaimId | null;
  type: NotificationType;
  title: string;
  message: string;
  isRead: boolean;
  readAt: string | null;
  createdAt: string;
}

// =============================================================================
// § Audit
// =============================================================================

export type AuditAction =
  | "claim.submit"
  | "claim.approve"
  | "claim.reject"
  | "claim.update"
  | "claim.delete"
  | "employee.toggle_active"
  | "employee.toggle_claim_permission"
  | "employee.update_role"
  | "employee.update_grade"
  | "employee.delete";

/** Field changes recorded by employee administration, as `{ field: [before, after] }` */
export type AuditChanges = Record<string, [string | boolean, string | boolean]>;

export interface AuditEntry {
  id: AuditEntryId;
  actorId: EmployeeId;
  actorRole: Role;
  action: AuditAction;
  claimId: ClaimId | null;
  /** Employee an administration action was applied to */
  subjectId: EmployeeId | null;
  outcome: "success" | "failure";
  beforeStatus: ClaimStatus | null;
  afterStatus: ClaimStatus | null;
  comment: string | null;
  error: { type: string; message: string } | null;
  changes: AuditChanges | null;
  timestamp: string;
}

// =============================================================================
// § Events
// =============================================================================

export type ClaimEventType =
  | "claim.submitted"
  | "claim.advanced"
  | "claim.approved"
  | "claim.rejected"
  | "claim.updated"
  | "claim.deleted";

/**
 * Emitted after every committed claim change. `claim` is the state after
 * the change (before it, for deletions).
 */
export interface ClaimEvent {
  eventId: EventId;
  type: ClaimEventType;
  claimId: ClaimId;
  actor: Actor;
  fromStatus: ClaimStatus | null;
  toStatus: ClaimStatus | null;
  ts: string;
  claim: Claim;
}
