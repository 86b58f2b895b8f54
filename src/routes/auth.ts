/**
 * Auth Routes
 *
 * Endpoints:
 * - POST /auth/login   form-encoded username (or email) + password
 * - POST /auth/refresh exchange a refresh token for a new pair
 * - GET  /auth/me      current profile and permissions
 */

import { Hono, type MiddlewareHandler } from "hono";
import type { Counter } from "prom-client";
import { z } from "zod";
import { verifyPassword } from "../auth/password.js";
import { enforceRateLimit, getAuthContext } from "../auth/middleware.js";
import type { MemoryRateLimiter } from "../auth/rate-limiter.js";
import { getPermissions } from "../auth/rbac.js";
import type { TokenPair, TokenService } from "../auth/token-service.js";
import { UnauthorizedError } from "../core/errors.js";
import type { AppEnv } from "../middleware/context.js";
import type { EmployeeStorage } from "../storage/storage-interface.js";
import type { Employee } from "../types/claim-contract.js";
import { parseWith, readJsonBody, toPublicEmployee } from "./shared/params.js";

export interface AuthRouterOptions {
  tokens: TokenService;
  employees: EmployeeStorage;
  authMiddleware: MiddlewareHandler<AppEnv>;
  /** Limits login attempts per username */
  loginLimiter?: MemoryRateLimiter;
  authAttempts?: Counter<"result">;
}

const loginSchema = z.object({
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

const refreshSchema = z.object({
  refresh_token: z.string().min(1, "refresh_token is required"),
});

function tokenResponse(pair: TokenPair, employee: Employee) {
  return {
    ok: true as const,
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: "bearer" as const,
    expires_in: pair.expiresIn,
    user: toPublicEmployee(employee),
  };
}

export function createAuthRouter(options: AuthRouterOptions): Hono<AppEnv> {
  const { tokens, employees, authMiddleware, loginLimiter, authAttempts } = options;
  const router = new Hono<AppEnv>();

  router.post("/auth/login", async (c) => {
    const form = await c.req.parseBody();
    const { username, password } = parseWith(loginSchema, {
      username: typeof form["username"] === "string" ? form["username"] : undefined,
      password: typeof form["password"] === "string" ? form["password"] : undefined,
    });

    if (loginLimiter) {
      try {
        enforceRateLimit(c, loginLimiter, `login:${username.toLowerCase()}`);
      } catch (error) {
        authAttempts?.inc({ result: "rate_limited" });
        throw error;
      }
    }

    const employee = await employees.getByLogin(username);
    const valid = employee ? await verifyPassword(password, employee.passwordHash) : false;
    if (!employee || !valid) {
      authAttempts?.inc({ result: "failure" });
      c.get("logger").info({ username }, "Login failed");
      throw new UnauthorizedError("Incorrect username or password");
    }
    if (!employee.active) {
      authAttempts?.inc({ result: "failure" });
      throw new UnauthorizedError("Account is not active");
    }

    authAttempts?.inc({ result: "success" });
    return c.json(tokenResponse(await tokens.issuePair(employee), employee));
  });

  router.post("/auth/refresh", async (c) => {
    const body = await readJsonBody(c, refreshSchema);
    const claims = await tokens.verify(body.refresh_token, "refresh").catch((error: unknown) => {
      authAttempts?.inc({ result: "failure" });
      throw error;
    });

    const employee = await employees.get(claims.sub);
    if (!employee || !employee.active) {
      authAttempts?.inc({ result: "failure" });
      throw new UnauthorizedError("Account is not active");
    }

    authAttempts?.inc({ result: "refreshed" });
    return c.json(tokenResponse(await tokens.issuePair(employee), employee));
  });

  router.get("/auth/me", authMiddleware, (c) => {
    const { employee } = getAuthContext(c);
    return c.json({
      ok: true,
      user: toPublicEmployee(employee),
      permissions: getPermissions(employee.role),
    });
  });

  return router;
}
