/**
 * Request ID Middleware
 *
 * Generates or passes through X-Request-Id header.
 * Attaches requestId to Hono context for use in logging.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "./context.js";

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Middleware that ensures every request has a unique request ID.
 * - Reads existing X-Request-Id header (pass-through from upstream proxy)
 * - Generates a UUID v4 if none present or the incoming one is unusable
 * - Sets X-Request-Id on response
 */
export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header("X-Request-Id")?.trim();
    const requestId =
      incoming && incoming.length <= MAX_INCOMING_ID_LENGTH && /^[\w.:-]+$/.test(incoming)
        ? incoming
        : randomUUID();
    c.set("requestId", requestId);
    c.header("X-Request-Id", requestId);
    await next();
  };
}
