/**
 * Limit Validator - decides whether a claim is within grade policy.
 *
 * Unknown grade/category pairs fail closed.
 */

import type {
  ExpenseCategory,
  Grade,
  LimitCheck,
  TravelMode,
} from "../types/claim-contract.js";
import type { ExpensePolicy } from "./expense-policy.js";

export interface LimitCheckInput {
  grade: Grade;
  category: ExpenseCategory;
  amount: number;
  travelMode?: TravelMode | null;
}

/**
 * Amount in hundredths (paise). Sums and limit comparisons are done on these
 * so that binary fractions like 0.1 can't push a total past a limit.
 */
export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

export function fromMinorUnits(minor: number): number {
  return minor / 100;
}

export function hasAtMostTwoDecimals(amount: number): boolean {
  return Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
}

export function formatAmount(amount: number): string {
  return amount.toLocaleString("en-IN", { maximumFractionDigits: 2 });
}

export function checkExpenseLimits(policy: ExpensePolicy, input: LimitCheckInput): LimitCheck {
  const { grade, category, amount } = input;
  const ceiling = policy.limits[grade]?.[category];

  if (ceiling === undefined) {
    return {
      withinLimits: false,
      reason: `No limit configured for grade ${grade} and category ${category}`,
      ceiling: null,
    };
  }

  if (category === "travel") {
    const mode = input.travelMode ?? null;
    if (!mode) {
      return { withinLimits: false, reason: "Travel mode is required for travel claims", ceiling };
    }
    const allowed = policy.travelModes[grade] ?? [];
    if (!allowed.includes(mode)) {
      return {
        withinLimits: false,
        reason: `Travel mode ${mode} is not allowed for grade ${grade}. Allowed: ${allowed.join(", ") || "none"}`,
        ceiling,
      };
    }
  }

  if (toMinorUnits(amount) > toMinorUnits(ceiling)) {
    return {
      withinLimits: false,
      reason: `Amount ${formatAmount(amount)} exceeds the ${category} limit of ${formatAmount(ceiling)} for grade ${grade}`,
      ceiling,
    };
  }

  return {
    withinLimits: true,
    reason: `Within the ${category} limit of ${formatAmount(ceiling)} for grade ${grade}`,
    ceiling,
  };
}
