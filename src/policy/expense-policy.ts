/**
 * Expense policy tables: amount ceilings per grade and category, travel
 * modes per grade, and self-declaration limits.
 *
 * Loaded once at startup from JSON, validated, then deep-frozen. Pairs
 * missing from the file are "not configured" and fail closed in the
 * limit validator.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import {
  EXPENSE_CATEGORIES,
  GRADES,
  TRAVEL_MODES,
  type ExpenseCategory,
  type Grade,
  type TravelMode,
} from "../types/claim-contract.js";

// =============================================================================
// § Types
// =============================================================================

export type GradeTable<T> = Readonly<Partial<Record<Grade, T>>>;

export interface SelfDeclarationPolicy {
  readonly perClaimLimit: GradeTable<number>;
  readonly monthlyLimit: GradeTable<number>;
  readonly maxClaimsPerMonth: number;
  readonly minDescriptionLength: number;
  readonly forbiddenCategories: readonly ExpenseCategory[];
}

export interface ExpensePolicy {
  readonly limits: GradeTable<Readonly<Partial<Record<ExpenseCategory, number>>>>;
  readonly travelModes: GradeTable<readonly TravelMode[]>;
  readonly selfDeclaration: SelfDeclarationPolicy;
}

/** Limits for a single grade, as returned by GET /expenses/limits */
export interface GradePolicy {
  grade: Grade;
  limits: Partial<Record<ExpenseCategory, number>>;
  travelModes: TravelMode[];
  selfDeclaration: {
    perClaimLimit: number | null;
    monthlyLimit: number | null;
    maxClaimsPerMonth: number;
    forbiddenCategories: ExpenseCategory[];
  };
}

// =============================================================================
// § Schema
// =============================================================================

const ceiling = z.number().positive();
const gradeEnum = z.enum(GRADES);
const categoryEnum = z.enum(EXPENSE_CATEGORIES);

const expensePolicySchema = z.object({
  limits: z.record(gradeEnum, z.record(categoryEnum, ceiling)),
  travelModes: z.record(gradeEnum, z.array(z.enum(TRAVEL_MODES))),
  selfDeclaration: z.object({
    perClaimLimit: z.record(gradeEnum, ceiling),
    monthlyLimit: z.record(gradeEnum, ceiling),
    maxClaimsPerMonth: z.number().int().nonnegative(),
    minDescriptionLength: z.number().int().nonnegative(),
    forbiddenCategories: z.array(categoryEnum),
  }),
});

export const DEFAULT_POLICY_PATH = new URL("../../config/expense-policy.json", import.meta.url);

// =============================================================================
// § Loading
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a raw policy document and return a frozen copy.
 *
 * @throws {ConfigError} when the document does not match the schema
 */
export function parseExpensePolicy(raw: unknown): ExpensePolicy {
  const result = expensePolicySchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid expense policy: ${details}`);
  }
  const policy: ExpensePolicy = result.data;
  return deepFreeze(policy);
}

export function loadExpensePolicy(path: string | URL = DEFAULT_POLICY_PATH): ExpensePolicy {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read expense policy from ${String(path)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Expense policy at ${String(path)} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseExpensePolicy(raw);
}

export function gradePolicy(policy: ExpensePolicy, grade: Grade): GradePolicy {
  const self = policy.selfDeclaration;
  return {
    grade,
    limits: { ...policy.limits[grade] },
    travelModes: [...(policy.travelModes[grade] ?? [])],
    selfDeclaration: {
      perClaimLimit: self.perClaimLimit[grade] ?? null,
      monthlyLimit: self.monthlyLimit[grade] ?? null,
      maxClaimsPerMonth: self.maxClaimsPerMonth,
      forbiddenCategories: [...self.forbiddenCategories],
    },
  };
}
