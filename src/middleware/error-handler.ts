/**
 * Error Handler
 *
 * Maps ClaimFlow error classes to HTTP status codes and the
 * `{ ok: false, error: { type, message } }` response body. Anything
 * unrecognised is a 500 whose message is hidden and whose error is logged.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import {
  AnalysisUnavailableError,
  DuplicateBillError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  RateLimitedError,
  SelfApprovalError,
  UnauthorizedError,
  ValidationError,
  errorType,
  type FieldIssue,
} from "../core/errors.js";
import type { AppEnv } from "./context.js";

export interface ErrorResponse {
  ok: false;
  error: {
    type: string;
    message: string;
    issues?: FieldIssue[];
    existingClaimId?: string;
  };
}

/**
 * Maps error types to HTTP status codes
 */
export function statusForError(error: unknown): ContentfulStatusCode {
  if (error instanceof UnauthorizedError) return 401;
  if (error instanceof SelfApprovalError) return 403;
  if (error instanceof ForbiddenError) return 403;
  if (error instanceof InvalidStateError) return 409;
  if (error instanceof DuplicateBillError) return 409;
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof AnalysisUnavailableError) return 502;
  if (error instanceof RateLimitedError) return 429;
  return 500;
}

function isInternal(status: number): boolean {
  return status >= 500 && status !== 502;
}

export function formatError(error: unknown, status: number): ErrorResponse {
  if (isInternal(status)) {
    return { ok: false, error: { type: "internal_error", message: "An internal error occurred" } };
  }
  const body: ErrorResponse = {
    ok: false,
    error: { type: errorType(error), message: error instanceof Error ? error.message : String(error) },
  };
  if (error instanceof ValidationError && error.issues.length > 0) {
    body.error.issues = error.issues;
  }
  if (error instanceof DuplicateBillError) {
    body.error.existingClaimId = error.existingClaimId;
  }
  return body;
}

/**
 * Error handler factory for `app.onError`.
 */
export function createErrorHandler(
  logger: Logger
): (err: Error, c: Context<AppEnv>) => Response | Promise<Response> {
  return (err, c) => {
    // Hono's own exceptions (malformed body and the like) carry their status
    if (err instanceof HTTPException && err.status < 500) {
      const body: ErrorResponse = { ok: false, error: { type: "validation_error", message: err.message } };
      return c.json(body, err.status);
    }

    const status = statusForError(err);
    const requestLogger = c.get("logger") ?? logger;
    if (isInternal(status)) {
      requestLogger.error({ err, path: c.req.path }, "Unhandled error");
    } else {
      requestLogger.debug({ errorType: errorType(err), path: c.req.path }, err.message);
    }

    if (err instanceof RateLimitedError) {
      c.header("Retry-After", String(err.retryAfterSeconds));
    }
    return c.json(formatError(err, status), status);
  };
}
