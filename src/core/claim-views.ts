/**
 * Response shapes for claims. Reviewers see the full AI analysis; an
 * employee looking at their own claim sees whether one exists and, once
 * rejected, a short summary of it.
 */

import { hasPermission } from "../auth/rbac.js";
import type { Actor, BillAnalysis, Claim, Recommendation } from "../types/claim-contract.js";

export interface AnalysisSummary {
  isAuthentic: boolean;
  confidenceScore: number;
  recommendation: Recommendation;
  redFlags: string[];
  summary: string;
}

export interface ClaimView extends Omit<Claim, "analysis"> {
  analysisPresent: boolean;
  analysis: BillAnalysis | null;
  analysisSummary: AnalysisSummary | null;
  /** Comment on the rejecting decision */
  rejectionReason: string | null;
}

function rejectionReason(claim: Claim): string | null {
  if (claim.status !== "rejected") return null;
  const last = claim.decisions[claim.decisions.length - 1];
  return last?.outcome === "reject" ? last.comment : null;
}

export function reviewerView(claim: Claim): ClaimView {
  return {
    ...claim,
    analysisPresent: claim.analysis !== null,
    analysisSummary: null,
    rejectionReason: rejectionReason(claim),
  };
}

export function employeeView(claim: Claim): ClaimView {
  const { analysis } = claim;
  return {
    ...claim,
    analysis: null,
    analysisPresent: analysis !== null,
    analysisSummary:
      analysis && claim.status === "rejected"
        ? {
            isAuthentic: analysis.isAuthentic,
            confidenceScore: analysis.confidenceScore,
            recommendation: analysis.recommendation,
            redFlags: analysis.redFlags.slice(0, 3),
            summary: analysis.summary,
          }
        : null,
    rejectionReason: rejectionReason(claim),
  };
}

export function claimViewFor(claim: Claim, viewer: Actor): ClaimView {
  return hasPermission(viewer.role, "claim:read_all") ? reviewerView(claim) : employeeView(claim);
}
