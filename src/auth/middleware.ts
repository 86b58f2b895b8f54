/**
 * Auth Middleware - Hono middleware pipeline for authentication.
 *
 * Bearer access tokens only. The employee is reloaded on every request so
 * that deactivation takes effect immediately.
 */

import type { Context, MiddlewareHandler } from "hono";
import { ForbiddenError, RateLimitedError, UnauthorizedError } from "../core/errors.js";
import type { AppEnv, AuthContext } from "../middleware/context.js";
import type { EmployeeStorage } from "../storage/storage-interface.js";
import type { MemoryRateLimiter, RateLimitResult } from "./rate-limiter.js";
import { hasPermission, type Permission } from "./rbac.js";
import type { TokenService } from "./token-service.js";

// =============================================================================
// § Types
// =============================================================================

export interface AuthMiddlewareConfig {
  tokens: TokenService;
  employees: EmployeeStorage;
  /** Per-user limiter; omit to disable rate limiting */
  rateLimiter?: MemoryRateLimiter;
}

// =============================================================================
// § Middleware Factory
// =============================================================================

export function setRateLimitHeaders(c: Context, result: RateLimitResult): void {
  c.header("X-RateLimit-Limit", String(result.limit));
  c.header("X-RateLimit-Remaining", String(result.remaining));
  c.header("X-RateLimit-Reset", String(Math.ceil(result.resetAt / 1000)));
}

/**
 * Enforce a rate-limit window for `key`.
 *
 * @throws {RateLimitedError} when the window is full
 */
export function enforceRateLimit(c: Context, limiter: MemoryRateLimiter, key: string): void {
  const result = limiter.check(key);
  setRateLimitHeaders(c, result);
  if (!result.allowed) {
    throw new RateLimitedError(Math.max(1, Math.ceil((result.resetAt - Date.now()) / 1000)));
  }
}

/**
 * Create the auth middleware.
 */
export function createAuthMiddleware(config: AuthMiddlewareConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const authHeader = c.req.header("Authorization");

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      throw new UnauthorizedError("Missing or invalid Authorization header");
    }

    const token = authHeader.slice("Bearer ".length).trim();
    const claims = await config.tokens.verify(token, "access");

    const employee = await config.employees.get(claims.sub);
    if (!employee || !employee.active) {
      throw new UnauthorizedError("Account is not active");
    }

    if (config.rateLimiter) {
      enforceRateLimit(c, config.rateLimiter, `user:${employee.id}`);
    }

    c.set("auth", { employee, actor: { id: employee.id, role: employee.role } });
    await next();
  };
}

/**
 * Create a permission-checking middleware. Must run after the auth
 * middleware.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const { employee } = getAuthContext(c);
    if (!hasPermission(employee.role, permission)) {
      throw new ForbiddenError(`Permission '${permission}' is required`);
    }
    await next();
  };
}

export function getAuthContext(c: Context<AppEnv>): AuthContext {
  const auth = c.get("auth");
  if (!auth) {
    throw new UnauthorizedError();
  }
  return auth;
}
