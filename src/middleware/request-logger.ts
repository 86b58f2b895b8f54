/**
 * Request Logging Middleware
 *
 * Logs method, path, status code, and latency for every request, and
 * exposes a request-scoped child logger to handlers.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./context.js";

export function requestLoggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = c.get("requestId");
    c.set("logger", logger.child({ requestId }));

    await next();

    const latencyMs = Date.now() - start;
    const method = c.req.method;
    const path = c.req.path;
    const status = c.res.status;

    logger.info(
      {
        requestId,
        method,
        path,
        status,
        latencyMs,
        logger: "http",
      },
      `${method} ${path} ${status} ${latencyMs}ms`
    );
  };
}
