/**
 * Rules for claims submitted without a bill.
 */

import { ValidationError, type FieldIssue } from "../core/errors.js";
import type { ExpenseCategory, Grade } from "../types/claim-contract.js";
import type { ExpensePolicy } from "./expense-policy.js";
import { formatAmount, fromMinorUnits, toMinorUnits } from "./limit-validator.js";

export interface SelfDeclarationInput {
  grade: Grade;
  category: ExpenseCategory;
  amount: number;
  description: string;
  noBillReason: string | null;
}

/** The owner's non-rejected self-declared claims in the same month */
export interface SelfDeclaredUsage {
  count: number;
  total: number;
}

/** `YYYY-MM` of an ISO date */
export function expenseMonth(expenseDate: string): string {
  return expenseDate.slice(0, 7);
}

export function checkSelfDeclaration(
  policy: ExpensePolicy,
  input: SelfDeclarationInput,
  usage: SelfDeclaredUsage
): FieldIssue[] {
  const rules = policy.selfDeclaration;
  const issues: FieldIssue[] = [];

  if (!input.noBillReason?.trim()) {
    issues.push({ field: "no_bill_reason", message: "A reason is required when no bill is attached" });
  }
  if (input.description.trim().length < rules.minDescriptionLength) {
    issues.push({
      field: "description",
      message: `Description must be at least ${rules.minDescriptionLength} characters for self-declared claims`,
    });
  }
  if (rules.forbiddenCategories.includes(input.category)) {
    issues.push({
      field: "category",
      message: `Category ${input.category} cannot be self-declared`,
    });
  }

  const perClaim = rules.perClaimLimit[input.grade];
  const monthly = rules.monthlyLimit[input.grade];
  if (perClaim === undefined || monthly === undefined) {
    issues.push({ field: "amount", message: `Self-declaration is not configured for grade ${input.grade}` });
    return issues;
  }
  if (toMinorUnits(input.amount) > toMinorUnits(perClaim)) {
    issues.push({
      field: "amount",
      message: `Self-declared amount cannot exceed ${formatAmount(perClaim)} for grade ${input.grade}`,
    });
  }
  if (usage.count >= rules.maxClaimsPerMonth) {
    issues.push({
      field: "self_declared",
      message: `Monthly limit of ${rules.maxClaimsPerMonth} self-declared claims reached`,
    });
  }
  const used = toMinorUnits(usage.total);
  const cap = toMinorUnits(monthly);
  if (used + toMinorUnits(input.amount) > cap) {
    const remaining = fromMinorUnits(Math.max(0, cap - used));
    issues.push({
      field: "amount",
      message: `Monthly self-declaration total of ${formatAmount(monthly)} exceeded, ${formatAmount(remaining)} remaining`,
    });
  }
  return issues;
}

/**
 * @throws {ValidationError} listing every rule the claim breaks
 */
export function assertSelfDeclarationAllowed(
  policy: ExpensePolicy,
  input: SelfDeclarationInput,
  usage: SelfDeclaredUsage
): void {
  const issues = checkSelfDeclaration(policy, input, usage);
  if (issues.length > 0) {
    throw new ValidationError("Self-declared claim not allowed", issues);
  }
}
