/**
 * EmployeeAdmin - user administration for admins: listing, account flags,
 * role and grade changes, deletion and system-wide counts.
 *
 * Every change is saved together with its audit entry; the entry's
 * `subjectId` names the employee and `changes` holds `[before, after]`
 * per field. Refused changes are audited as failures.
 */

import type { Logger } from "pino";
import { gradePolicy, type ExpensePolicy, type GradePolicy } from "../policy/expense-policy.js";
import {
  paginate,
  type ClaimStorage,
  type EmployeeStorage,
  type PaginatedResult,
  type PaginationOptions,
} from "../storage/storage-interface.js";
import type { EmployeeId } from "../types/branded.js";
import {
  GRADES,
  ROLES,
  type Actor,
  type AuditAction,
  type AuditChanges,
  type Employee,
  type Grade,
  type Role,
} from "../types/claim-contract.js";
import type { AuditTrail } from "./audit-trail.js";
import { InvalidStateError, NotFoundError, ValidationError } from "./errors.js";

export interface EmployeeListQuery extends PaginationOptions {
  active?: boolean;
  role?: Role;
  grade?: Grade;
}

export interface SystemStats {
  users: {
    total: number;
    active: number;
    inactive: number;
    byRole: Record<string, number>;
    byGrade: Record<string, number>;
  };
  claims: {
    total: number;
    pending: number;
    approved: number;
    rejected: number;
    totalClaimedAmount: number;
    totalApprovedAmount: number;
  };
}

export interface EmployeeAdminOptions {
  employees: EmployeeStorage;
  claims: ClaimStorage;
  policy: ExpensePolicy;
  audit: AuditTrail;
  logger?: Logger;
}

/** Every key is present, zero when unused */
function countBy(keys: readonly string[], values: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const key of keys) counts[key] = 0;
  for (const value of values) counts[value] = (counts[value] ?? 0) + 1;
  return counts;
}

export class EmployeeAdmin {
  private readonly employees: EmployeeStorage;
  private readonly claims: ClaimStorage;
  private readonly policy: ExpensePolicy;
  private readonly audit: AuditTrail;
  private readonly logger?: Logger;

  constructor(options: EmployeeAdminOptions) {
    this.employees = options.employees;
    this.claims = options.claims;
    this.policy = options.policy;
    this.audit = options.audit;
    this.logger = options.logger;
  }

  /** Sorted by username */
  async list(query: EmployeeListQuery = {}): Promise<PaginatedResult<Employee>> {
    const all = await this.employees.list();
    const matched = all
      .filter(
        (e) =>
          (query.active === undefined || e.active === query.active) &&
          (query.role === undefined || e.role === query.role) &&
          (query.grade === undefined || e.grade === query.grade)
      )
      .sort((a, b) => a.username.localeCompare(b.username));
    return paginate(matched, query);
  }

  async get(id: EmployeeId): Promise<Employee> {
    const employee = await this.employees.get(id);
    if (!employee) {
      throw new NotFoundError("Employee", id);
    }
    return employee;
  }

  toggleActive(actor: Actor, id: EmployeeId): Promise<Employee> {
    return this.change(actor, id, "employee.toggle_active", (employee) => {
      if (employee.id === actor.id) {
        throw new ValidationError("Cannot deactivate your own account", [
          { field: "active", message: "Ask another admin" },
        ]);
      }
      return { active: !employee.active };
    });
  }

  toggleClaimPermission(actor: Actor, id: EmployeeId): Promise<Employee> {
    return this.change(actor, id, "employee.toggle_claim_permission", (employee) => ({
      canClaimExpenses: !employee.canClaimExpenses,
    }));
  }

  updateRole(actor: Actor, id: EmployeeId, role: Role): Promise<Employee> {
    return this.change(actor, id, "employee.update_role", (employee) => {
      if (employee.id === actor.id) {
        throw new ValidationError("Cannot change your own role", [{ field: "role", message: "Ask another admin" }]);
      }
      return { role };
    });
  }

  /** The new grade's limits come back with the employee */
  async updateGrade(
    actor: Actor,
    id: EmployeeId,
    grade: Grade
  ): Promise<{ employee: Employee; limits: GradePolicy }> {
    const employee = await this.change(actor, id, "employee.update_grade", () => ({ grade }));
    return { employee, limits: gradePolicy(this.policy, employee.grade) };
  }

  /**
   * Only employees without claims can be deleted; the rest are deactivated
   * so their claims keep an owner.
   */
  async delete(actor: Actor, id: EmployeeId): Promise<void> {
    const base = { actor, action: "employee.delete" as const, subjectId: id };
    try {
      if (id === actor.id) {
        throw new ValidationError("Cannot delete your own account", [{ field: "id", message: "Ask another admin" }]);
      }
      const employee = await this.get(id);
      const owned = await this.claims.aggregate({ ownerId: id });
      if (owned.count > 0) {
        throw new InvalidStateError(
          `Employee ${employee.username} has ${owned.count} claim(s); deactivate the account instead`
        );
      }
      const deleted = await this.employees.delete(id, this.audit.draft(this.record(base, null)));
      if (!deleted) {
        throw new NotFoundError("Employee", id);
      }
    } catch (error) {
      await this.audit.failure(this.record(base, null), error);
      throw error;
    }
    this.logger?.info({ employeeId: id, actorId: actor.id }, "Employee deleted");
  }

  async systemStats(): Promise<SystemStats> {
    const [employees, total, pending, approved, rejected] = await Promise.all([
      this.employees.list(),
      this.claims.aggregate({}),
      this.claims.aggregate({ status: ["submitted", "hr_review", "finance_review"] }),
      this.claims.aggregate({ status: "approved" }),
      this.claims.aggregate({ status: "rejected" }),
    ]);
    const active = employees.filter((e) => e.active).length;

    return {
      users: {
        total: employees.length,
        active,
        inactive: employees.length - active,
        byRole: countBy(ROLES, employees.map((e) => e.role)),
        byGrade: countBy(GRADES, employees.map((e) => e.grade)),
      },
      claims: {
        total: total.count,
        pending: pending.count,
        approved: approved.count,
        rejected: rejected.count,
        totalClaimedAmount: total.totalAmount,
        totalApprovedAmount: approved.totalAmount,
      },
    };
  }

  // ===========================================================================
  // § Helpers
  // ===========================================================================

  private async change(
    actor: Actor,
    id: EmployeeId,
    action: AuditAction,
    patch: (employee: Employee) => Partial<Pick<Employee, "active" | "canClaimExpenses" | "role" | "grade">>
  ): Promise<Employee> {
    const base = { actor, action, subjectId: id };
    let updated: Employee;
    let changes: AuditChanges;
    try {
      const employee = await this.get(id);
      updated = { ...employee, ...patch(employee) };
      changes = {};
      for (const field of ["active", "canClaimExpenses", "role", "grade"] as const) {
        if (updated[field] !== employee[field]) {
          changes[field] = [employee[field], updated[field]];
        }
      }
      await this.employees.save(updated, this.audit.draft(this.record(base, changes)));
    } catch (error) {
      await this.audit.failure(this.record(base, null), error);
      throw error;
    }
    this.logger?.info({ employeeId: id, actorId: actor.id, action, changes }, "Employee updated");
    return updated;
  }

  private record(
    base: { actor: Actor; action: AuditAction; subjectId: EmployeeId },
    changes: AuditChanges | null
  ) {
    return { ...base, claimId: null, beforeStatus: null, afterStatus: null, changes };
  }
}
