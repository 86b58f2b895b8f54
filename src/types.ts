/**
 * Core ClaimFlow types
 */

export type {
  Actor,
  AuditAction,
  AuditEntry,
  BillAnalysis,
  BillReference,
  Claim,
  ClaimEvent,
  ClaimEventType,
  Decision,
  DecisionOutcome,
  Employee,
  ExpenseCategory,
  ExtractedBillFields,
  Grade,
  LimitCheck,
  Notification,
  NotificationType,
  PublicEmployee,
  Recommendation,
  Role,
  TravelDetails,
  TravelMode,
} from "./types/claim-contract.js";

export {
  CLAIM_STATUSES,
  ClaimStatus,
  EXPENSE_CATEGORIES,
  GRADES,
  RECOMMENDATIONS,
  ROLES,
  TRAVEL_MODES,
} from "./types/claim-contract.js";

export * from "./types/branded.js";
