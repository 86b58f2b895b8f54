/**
 * Role-Based Access Control (RBAC)
 *
 * - employee: submit and read own claims
 * - manager / hr / finance: also review claims at their stage, read reports
 * - admin: oversight and user administration, outside the approval chain
 */

import { ROLES, type Employee, type Role } from "../types/claim-contract.js";

// =============================================================================
// § Types
// =============================================================================

export type Permission =
  | "claim:create"
  | "claim:read_own"
  | "claim:read_all"
  | "approval:act"
  | "reports:read"
  | "audit:read"
  | "user:manage";

// =============================================================================
// § Permission Matrix
// =============================================================================

const REVIEWER: readonly Permission[] = [
  "claim:create",
  "claim:read_own",
  "claim:read_all",
  "approval:act",
  "reports:read",
];

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = Object.freeze({
  employee: Object.freeze<Permission[]>(["claim:create", "claim:read_own"]),
  manager: Object.freeze([...REVIEWER]),
  hr: Object.freeze<Permission[]>([...REVIEWER, "audit:read"]),
  finance: Object.freeze<Permission[]>([...REVIEWER, "audit:read"]),
  admin: Object.freeze<Permission[]>([
    "claim:read_own",
    "claim:read_all",
    "reports:read",
    "audit:read",
    "user:manage",
  ]),
});

// =============================================================================
// § RBAC Functions
// =============================================================================

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

/**
 * Permission check against an employee profile. `claim:create` also needs
 * the claim flag and an active account.
 */
export function employeeHasPermission(
  employee: Pick<Employee, "role" | "canClaimExpenses" | "active">,
  permission: Permission
): boolean {
  if (!employee.active) return false;
  if (permission === "claim:create" && !employee.canClaimExpenses) return false;
  return hasPermission(employee.role, permission);
}

export function getPermissions(role: Role): Permission[] {
  return [...ROLE_PERMISSIONS[role]];
}

export function isValidRole(role: string): role is Role {
  return ROLES.some((r) => r === role);
}
