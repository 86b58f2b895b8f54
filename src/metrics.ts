/**
 * Prometheus metrics for ClaimFlow
 *
 * Counters are driven by claim events, so instrumenting a new code path
 * means emitting an event rather than touching the metrics.
 */
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { ClaimEvent } from "./types/claim-contract.js";

export interface ClaimFlowMetrics {
  registry: Registry;
  claimsSubmitted: Counter<"category">;
  claimDecisions: Counter<"stage" | "outcome">;
  analysisUnavailable: Counter;
  claimResolutionSeconds: Histogram;
  authAttempts: Counter<"result">;
  /** Claim event listener */
  onClaimEvent(event: ClaimEvent): void;
  text(): Promise<string>;
  contentType: string;
}

/**
 * Metrics on a dedicated registry, so each app instance (and each test)
 * counts on its own.
 */
export function createMetrics(options: { defaultMetrics?: boolean } = {}): ClaimFlowMetrics {
  const registry = new Registry();
  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  const claimsSubmitted = new Counter({
    name: "claimflow_claims_submitted_total",
    help: "Claims submitted, by category",
    labelNames: ["category"] as const,
    registers: [registry],
  });

  const claimDecisions = new Counter({
    name: "claimflow_claim_decisions_total",
    help: "Approval decisions, by the stage decided and outcome",
    labelNames: ["stage", "outcome"] as const,
    registers: [registry],
  });

  const analysisUnavailable = new Counter({
    name: "claimflow_analysis_unavailable_total",
    help: "Submissions stored without an AI analysis",
    registers: [registry],
  });

  const claimResolutionSeconds = new Histogram({
    name: "claimflow_claim_resolution_seconds",
    help: "Time from submission to approval or rejection (seconds)",
    buckets: [60, 300, 900, 3600, 14400, 86400, 259200, 604800],
    registers: [registry],
  });

  const authAttempts = new Counter({
    name: "claimflow_auth_attempts_total",
    help: "Login and refresh attempts, by result",
    labelNames: ["result"] as const,
    registers: [registry],
  });

  function onClaimEvent(event: ClaimEvent): void {
    const { claim } = event;
    switch (event.type) {
      case "claim.submitted":
        claimsSubmitted.inc({ category: claim.category });
        if (claim.analysisError) analysisUnavailable.inc();
        break;

      case "claim.advanced":
      case "claim.approved":
      case "claim.rejected": {
        claimDecisions.inc({
          stage: event.fromStatus ?? "unknown",
          outcome: event.type === "claim.rejected" ? "reject" : "approve",
        });
        if (claim.resolvedAt) {
          const seconds = (Date.parse(claim.resolvedAt) - Date.parse(claim.createdAt)) / 1000;
          claimResolutionSeconds.observe(Math.max(0, seconds));
        }
        break;
      }

      case "claim.updated":
      case "claim.deleted":
        break;
    }
  }

  return {
    registry,
    claimsSubmitted,
    claimDecisions,
    analysisUnavailable,
    claimResolutionSeconds,
    authAttempts,
    onClaimEvent,
    text: () => registry.metrics(),
    contentType: registry.contentType,
  };
}
