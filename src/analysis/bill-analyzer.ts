/**
 * BillAnalyzer - capability interface for AI bill checks.
 *
 * Implementations reject with AnalysisUnavailableError when they can't
 * produce a usable result; callers treat that as "no analysis", never as a
 * failed submission.
 */

import { AnalysisUnavailableError } from "../core/errors.js";
import type {
  BillAnalysis,
  ExpenseCategory,
  Grade,
  TravelMode,
} from "../types/claim-contract.js";

export interface BillDocument {
  filename: string;
  mimeType: string;
  data: Uint8Array;
}

export interface AnalysisContext {
  category: ExpenseCategory;
  amount: number;
  currency: string;
  expenseDate: string;
  description: string;
  grade: Grade;
  travelMode: TravelMode | null;
  /** Grade ceiling for the category, null when not configured */
  ceiling: number | null;
  allowedTravelModes: readonly TravelMode[];
}

export interface BillAnalyzer {
  analyze(bill: BillDocument, context: AnalysisContext): Promise<BillAnalysis>;
}

/**
 * Used when no model is configured.
 */
export class DisabledBillAnalyzer implements BillAnalyzer {
  async analyze(): Promise<BillAnalysis> {
    throw new AnalysisUnavailableError("no AI model configured");
  }
}
