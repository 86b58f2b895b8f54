/**
 * ClaimFlow App Factory
 *
 * Creates the configured Hono application for the ClaimFlow HTTP API.
 * Wires together routes, middleware, and core services.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import type { Logger } from "pino";
import type { BillAnalyzer } from "./analysis/bill-analyzer.js";
import { createAuthMiddleware } from "./auth/middleware.js";
import { MemoryRateLimiter, type RateLimitConfig } from "./auth/rate-limiter.js";
import type { TokenService } from "./auth/token-service.js";
import { ApprovalManager } from "./core/approval-manager.js";
import { AuditTrail } from "./core/audit-trail.js";
import type { BillConstraints } from "./core/bill-intake.js";
import { ClaimManager } from "./core/claim-manager.js";
import { ClaimReports } from "./core/claim-reports.js";
import { EmployeeAdmin } from "./core/employee-admin.js";
import { ClaimEventBus } from "./core/event-bus.js";
import { NotificationCenter } from "./core/notification-center.js";
import { getLogger } from "./logging.js";
import { createMetrics, type ClaimFlowMetrics } from "./metrics.js";
import type { AppEnv } from "./middleware/context.js";
import { createErrorHandler, type ErrorResponse } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { requestLoggerMiddleware } from "./middleware/request-logger.js";
import type { ExpensePolicy } from "./policy/expense-policy.js";
import { createAdminRouter } from "./routes/admin.js";
import { createApprovalRouter } from "./routes/approvals.js";
import { createAuthRouter } from "./routes/auth.js";
import { createExpenseRouter } from "./routes/expenses.js";
import { createNotificationRouter } from "./routes/notifications.js";
import { createProbeRouter } from "./routes/probes.js";
import { createReportRouter } from "./routes/reports.js";
import type { BillStore } from "./storage/bill-store.js";
import type { ClaimFlowStorage } from "./storage/storage-interface.js";

export const DEFAULT_BILL_CONSTRAINTS: BillConstraints = {
  allowedExtensions: ["pdf", "jpg", "jpeg", "png"],
  maxBytes: 10 * 1024 * 1024,
};

export interface ClaimFlowAppOptions {
  storage: ClaimFlowStorage;
  billStore: BillStore;
  analyzer: BillAnalyzer;
  policy: ExpensePolicy;
  tokens: TokenService;
  currency?: string;
  billConstraints?: BillConstraints;
  /** Allowed CORS origins; CORS is off when empty */
  corsOrigins?: string[];
  /** Per-user and per-login limits; `false` disables rate limiting */
  rateLimit?: RateLimitConfig | false;
  logger?: Logger;
  metrics?: ClaimFlowMetrics;
  now?: () => Date;
  version?: string;
}

export interface ClaimFlowServices {
  events: ClaimEventBus;
  audit: AuditTrail;
  claims: ClaimManager;
  approvals: ApprovalManager;
  notifications: NotificationCenter;
  reports: ClaimReports;
  admin: EmployeeAdmin;
  metrics: ClaimFlowMetrics;
}

/**
 * Build the domain services and connect the event bus listeners
 * (notifications, metrics).
 */
export function createClaimFlowServices(options: ClaimFlowAppOptions): ClaimFlowServices {
  const logger = options.logger ?? getLogger();
  const { storage, now } = options;
  const metrics = options.metrics ?? createMetrics();

  const events = new ClaimEventBus(logger.child({ component: "event-bus" }));
  const audit = new AuditTrail(storage.audit, now);
  const notifications = new NotificationCenter(storage.notifications, storage.employees, {
    logger: logger.child({ component: "notifications" }),
    now,
  });
  events.addListener(notifications.handleEvent);
  events.addListener(metrics.onClaimEvent);

  const claims = new ClaimManager({
    claims: storage.claims,
    billStore: options.billStore,
    analyzer: options.analyzer,
    policy: options.policy,
    audit,
    events,
    currency: options.currency ?? "INR",
    billConstraints: options.billConstraints ?? DEFAULT_BILL_CONSTRAINTS,
    logger: logger.child({ component: "claims" }),
    now,
  });

  const approvals = new ApprovalManager({
    claims: storage.claims,
    audit,
    events,
    logger: logger.child({ component: "approvals" }),
    now,
  });

  const reports = new ClaimReports(storage.claims, storage.employees, audit);

  const admin = new EmployeeAdmin({
    employees: storage.employees,
    claims: storage.claims,
    policy: options.policy,
    audit,
    logger: logger.child({ component: "admin" }),
  });

  return { events, audit, claims, approvals, notifications, reports, admin, metrics };
}

/**
 * Creates a Hono app serving the ClaimFlow API.
 */
export function createClaimFlowApp(options: ClaimFlowAppOptions): Hono<AppEnv> {
  const logger = options.logger ?? getLogger();
  const services = createClaimFlowServices({ ...options, logger });
  const constraints = options.billConstraints ?? DEFAULT_BILL_CONSTRAINTS;
  const app = new Hono<AppEnv>();

  app.use("*", requestIdMiddleware());
  app.use("*", requestLoggerMiddleware(logger));
  app.use("*", secureHeaders());

  if (options.corsOrigins && options.corsOrigins.length > 0) {
    app.use(
      "*",
      cors({
        origin: options.corsOrigins,
        allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
        allowHeaders: ["Content-Type", "Authorization", "X-Request-Id"],
        exposeHeaders: ["X-Request-Id", "X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset"],
        maxAge: 86400,
      })
    );
  }

  // Upload limit plus 1 MiB for the other multipart fields
  app.use(
    "*",
    bodyLimit({
      maxSize: constraints.maxBytes + 1024 * 1024,
      onError: (c) => {
        const body: ErrorResponse = {
          ok: false,
          error: { type: "validation_error", message: "Request body is too large" },
        };
        return c.json(body, 413);
      },
    })
  );

  app.onError(createErrorHandler(logger));

  const rateLimit = options.rateLimit ?? { maxRequests: 120, windowMs: 60_000 };
  const authMiddleware = createAuthMiddleware({
    tokens: options.tokens,
    employees: options.storage.employees,
    rateLimiter: rateLimit ? new MemoryRateLimiter(rateLimit) : undefined,
  });

  app.get("/metrics", async (c) => {
    return c.text(await services.metrics.text(), 200, { "Content-Type": services.metrics.contentType });
  });

  app.route("/", createProbeRouter({ storage: options.storage, version: options.version }));
  app.route(
    "/",
    createAuthRouter({
      tokens: options.tokens,
      employees: options.storage.employees,
      authMiddleware,
      loginLimiter: rateLimit ? new MemoryRateLimiter(rateLimit) : undefined,
      authAttempts: services.metrics.authAttempts,
    })
  );
  app.route(
    "/",
    createExpenseRouter({
      claims: services.claims,
      policy: options.policy,
      currency: options.currency ?? "INR",
      authMiddleware,
    })
  );
  app.route("/", createApprovalRouter(services.approvals, authMiddleware));
  app.route("/", createNotificationRouter(services.notifications, authMiddleware));
  app.route("/", createReportRouter(services.reports, authMiddleware));
  app.route("/", createAdminRouter(services.admin, authMiddleware));

  app.notFound((c) => {
    const body: ErrorResponse = {
      ok: false,
      error: { type: "not_found", message: `No route for ${c.req.method} ${c.req.path}` },
    };
    return c.json(body, 404);
  });

  return app;
}
