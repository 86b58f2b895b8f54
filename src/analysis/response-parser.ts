/**
 * Turns raw model output into a BillAnalysis.
 *
 * Accepts the JSON object wrapped in markdown fences or surrounded by
 * prose; anything that doesn't validate is AnalysisUnavailable.
 */

import { z } from "zod";
import { AnalysisUnavailableError } from "../core/errors.js";
import { RECOMMENDATIONS, type BillAnalysis } from "../types/claim-contract.js";

const nullableString = z.string().nullable().optional().transform((v) => (v?.trim() ? v.trim() : null));
const nullableBoolean = z.boolean().nullable().optional().transform((v) => v ?? null);
const stringList = z.array(z.string()).optional().transform((v) => v ?? []);

export const rawAnalysisSchema = z.object({
  is_authentic: z.boolean(),
  confidence_score: z.number().min(0).max(100),
  bill_number: nullableString,
  bill_date: nullableString,
  vendor_name: nullableString,
  extracted_amount: z.number().nullable().optional().transform((v) => v ?? null),
  has_gst: nullableBoolean,
  gst_number: nullableString,
  has_required_stamps: nullableBoolean,
  travel_mode: nullableString,
  travel_route: nullableString,
  payment_method: nullableString,
  red_flags: stringList,
  missing_elements: stringList,
  recommendation: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
    z.enum(RECOMMENDATIONS)
  ),
  recommendation_reason: z.string(),
  summary: z.string().optional().transform((v) => v ?? ""),
});

/**
 * Strip markdown fences and return the text between the first `{` and the
 * last `}`.
 */
export function extractJsonObject(text: string): string {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new AnalysisUnavailableError("model response contains no JSON object");
  }
  return unfenced.slice(start, end + 1);
}

export function parseAnalysisResponse(
  text: string | undefined,
  meta: { model: string; analyzedAt: string }
): BillAnalysis {
  if (!text?.trim()) {
    throw new AnalysisUnavailableError("model returned an empty response");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonObject(text));
  } catch (error) {
    if (error instanceof AnalysisUnavailableError) throw error;
    throw new AnalysisUnavailableError("model response is not valid JSON", { cause: error });
  }

  const parsed = rawAnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    throw new AnalysisUnavailableError(
      `model response does not match the analysis schema (${[...new Set(fields)].join(", ")})`
    );
  }

  const r = parsed.data;
  return {
    isAuthentic: r.is_authentic,
    confidenceScore: r.confidence_score,
    hasRequiredStamps: r.has_required_stamps,
    extracted: {
      billNumber: r.bill_number,
      billDate: r.bill_date,
      vendorName: r.vendor_name,
      amount: r.extracted_amount,
      hasGst: r.has_gst,
      gstNumber: r.gst_number,
      travelMode: r.travel_mode,
      travelRoute: r.travel_route,
      paymentMethod: r.payment_method,
    },
    recommendation: r.recommendation,
    recommendationReason: r.recommendation_reason,
    redFlags: r.red_flags,
    missingElements: r.missing_elements,
    summary: r.summary,
    model: meta.model,
    analyzedAt: meta.analyzedAt,
  };
}
