/**
 * ClaimFlow - expense claims with AI bill checks, grade limits and a
 * manager → HR → finance approval chain.
 */

// =============================================================================
// App
// =============================================================================

export {
  createClaimFlowApp,
  createClaimFlowServices,
  DEFAULT_BILL_CONSTRAINTS,
  type ClaimFlowAppOptions,
  type ClaimFlowServices,
} from "./app.js";
export { loadConfig, resolveSecret, type ClaimFlowConfig } from "./config.js";
export { createLogger, getLogger, setLogger, createChildLogger } from "./logging.js";
export { createMetrics, type ClaimFlowMetrics } from "./metrics.js";
export { seedEmployees, seedEmployeesFromFile, type SeedEmployee } from "./seed-users.js";

// =============================================================================
// Core
// =============================================================================

export {
  ClaimManager,
  generateClaimId,
  type SubmitClaimInput,
  type UpdateClaimInput,
} from "./core/claim-manager.js";
export { ApprovalManager, type DecisionRequest, type DecisionResult } from "./core/approval-manager.js";
export { NotificationCenter } from "./core/notification-center.js";
export { ClaimReports, type ClaimSearchQuery, type ClaimSummary } from "./core/claim-reports.js";
export { AuditTrail } from "./core/audit-trail.js";
export { EmployeeAdmin, type EmployeeListQuery, type SystemStats } from "./core/employee-admin.js";
export { ClaimEventBus, type ClaimEventListener } from "./core/event-bus.js";
export { claimViewFor, employeeView, reviewerView, type ClaimView } from "./core/claim-views.js";
export { TRANSITIONS, resolveTransition, nextStatus, isTerminal } from "./core/state-machine.js";
export * from "./core/errors.js";

// =============================================================================
// Policy
// =============================================================================

export { loadExpensePolicy, parseExpensePolicy, gradePolicy, type ExpensePolicy } from "./policy/expense-policy.js";
export { checkExpenseLimits, toMinorUnits, fromMinorUnits } from "./policy/limit-validator.js";
export { checkSelfDeclaration } from "./policy/self-declaration.js";

// =============================================================================
// Analysis, Auth, Storage
// =============================================================================

export { DisabledBillAnalyzer, type BillAnalyzer, type AnalysisContext } from "./analysis/bill-analyzer.js";
export { GeminiBillAnalyzer, createGeminiClient } from "./analysis/gemini-analyzer.js";
export { TokenService, type TokenPair } from "./auth/token-service.js";
export { hashPassword, verifyPassword } from "./auth/password.js";
export { ROLE_PERMISSIONS, hasPermission, type Permission } from "./auth/rbac.js";
export type { ClaimFlowStorage } from "./storage/storage-interface.js";
export { MemoryStorage } from "./storage/memory-storage.js";
export { SqliteStorage } from "./storage/sqlite-storage.js";
export { LocalBillStore, MemoryBillStore, type BillStore } from "./storage/bill-store.js";

export * from "./types.js";
