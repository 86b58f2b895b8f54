/**
 * Shared error classes for ClaimFlow services.
 *
 * Centralized here so instanceof checks in the HTTP error handler see a
 * single definition of each class.
 */

import type { ClaimStatus, DecisionOutcome, Role } from "../types/claim-contract.js";

/**
 * Missing or invalid bearer token, or bad login credentials.
 */
export class UnauthorizedError extends Error {
  constructor(message = "Authentication required") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

/**
 * The actor's role or permissions don't allow the operation.
 */
export class ForbiddenError extends Error {
  constructor(message = "Insufficient permissions") {
    super(message);
    this.name = "ForbiddenError";
  }
}

export class SelfApprovalError extends Error {
  constructor(claimId: string) {
    super(`Cannot act on your own claim: ${claimId}`);
    this.name = "SelfApprovalError";
  }
}

export class InvalidStateError extends Error {
  public readonly status: ClaimStatus | null;

  constructor(message: string, status: ClaimStatus | null = null) {
    super(message);
    this.name = "InvalidStateError";
    this.status = status;
  }

  static terminal(claimId: string, status: ClaimStatus, outcome: DecisionOutcome): InvalidStateError {
    return new InvalidStateError(
      `Claim ${claimId} is already '${status}', cannot ${outcome}`,
      status
    );
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  public readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class DuplicateBillError extends Error {
  public readonly existingClaimId: string;

  constructor(existingClaimId: string) {
    super(`This bill was already submitted with claim ${existingClaimId}`);
    this.name = "DuplicateBillError";
    this.existingClaimId = existingClaimId;
  }
}

export class NotFoundError extends Error {
  constructor(entity: string, identifier: string) {
    super(`${entity} not found: ${identifier}`);
    this.name = "NotFoundError";
  }
}

/**
 * The AI bill analysis could not produce a usable result. Non-fatal during
 * submission: the claim is stored without analysis.
 */
export class AnalysisUnavailableError extends Error {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Bill analysis unavailable: ${reason}`, options);
    this.name = "AnalysisUnavailableError";
  }
}

export class RateLimitedError extends Error {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super("Too many requests");
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Stable wire type for an error, used in HTTP responses and audit entries.
 */
export function errorType(error: unknown): string {
  if (error instanceof UnauthorizedError) return "unauthorized";
  if (error instanceof SelfApprovalError) return "self_approval";
  if (error instanceof ForbiddenError) return "forbidden";
  if (error instanceof InvalidStateError) return "invalid_state";
  if (error instanceof DuplicateBillError) return "duplicate_bill";
  if (error instanceof ValidationError) return "validation_error";
  if (error instanceof NotFoundError) return "not_found";
  if (error instanceof AnalysisUnavailableError) return "analysis_unavailable";
  if (error instanceof RateLimitedError) return "rate_limited";
  return "internal_error";
}

export function roleLabel(role: Role): string {
  return role === "hr" ? "HR" : role;
}
