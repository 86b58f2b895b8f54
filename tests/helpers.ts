/**
 * Shared test fixtures: employees, a stub bill analyzer and an app wired
 * to in-memory storage.
 */

import type { Hono } from "hono";
import type { z } from "zod";
import type { AnalysisContext, BillAnalyzer, BillDocument } from "../src/analysis/bill-analyzer.js";
import { createClaimFlowApp } from "../src/app.js";
import { hashPassword } from "../src/auth/password.js";
import { TokenService } from "../src/auth/token-service.js";
import { AnalysisUnavailableError } from "../src/core/errors.js";
import { createLogger } from "../src/logging.js";
import { createMetrics, type ClaimFlowMetrics } from "../src/metrics.js";
import type { AppEnv } from "../src/middleware/context.js";
import { loadExpensePolicy } from "../src/policy/expense-policy.js";
import { MemoryBillStore } from "../src/storage/bill-store.js";
import { MemoryStorage } from "../src/storage/memory-storage.js";
import { ClaimId, EmployeeId } from "../src/types/branded.js";
import type { BillAnalysis, Claim, Employee } from "../src/types/claim-contract.js";

export const TEST_SECRET = "test-secret-for-claimflow";
export const TEST_PASSWORD = "test-password";
export const FIXED_NOW = new Date("2025-03-10T09:00:00.000Z");

export const silentLogger = createLogger({ level: "silent", format: "json" });

export function makeEmployee(overrides: Omit<Partial<Employee>, "id"> & { id: string }): Employee {
  const { id, ...rest } = overrides;
  return {
    username: id,
    email: `${id}@example.com`,
    fullName: `Employee ${id}`,
    department: "Engineering",
    role: "employee",
    grade: "A",
    canClaimExpenses: true,
    active: true,
    passwordHash: "scrypt$00$00",
    createdAt: "2025-01-01T00:00:00.000Z",
    ...rest,
    id: EmployeeId(id),
  };
}

/** One employee per role; the owner of most test claims is `emp-1` */
export const STAFF = {
  employee: makeEmployee({ id: "emp-1", fullName: "Asha Rao", grade: "A" }),
  colleague: makeEmployee({ id: "emp-2", fullName: "Kiran Patel", grade: "C" }),
  manager: makeEmployee({ id: "mgr-1", fullName: "Vikram Shah", role: "manager", grade: "C" }),
  hr: makeEmployee({ id: "hr-1", fullName: "Meera Iyer", role: "hr", grade: "C" }),
  finance: makeEmployee({ id: "fin-1", fullName: "Rohan Das", role: "finance", grade: "C" }),
  admin: makeEmployee({ id: "adm-1", fullName: "Sys Admin", role: "admin", grade: "D", canClaimExpenses: false }),
};

export function sampleAnalysis(overrides: Partial<BillAnalysis> = {}): BillAnalysis {
  return {
    isAuthentic: true,
    confidenceScore: 88,
    hasRequiredStamps: true,
    extracted: {
      billNumber: "INV-1001",
      billDate: "2025-03-05",
      vendorName: "City Travels",
      amount: 1200,
      hasGst: true,
      gstNumber: "29ABCDE1234F1Z5",
      travelMode: "bus",
      travelRoute: "Pune - Mumbai",
      paymentMethod: "UPI",
    },
    recommendation: "APPROVE",
    recommendationReason: "Bill matches the claim",
    redFlags: [],
    missingElements: [],
    summary: "Bus ticket from Pune to Mumbai",
    model: "stub-model",
    analyzedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export function makeClaim(overrides: Omit<Partial<Claim>, "id"> & { id: string }): Claim {
  const { id, ...rest } = overrides;
  return {
    ownerId: STAFF.employee.id,
    category: "food",
    amount: 400,
    currency: "INR",
    expenseDate: "2025-03-05",
    description: "Team lunch with client",
    travel: null,
    bill: null,
    selfDeclared: false,
    noBillReason: null,
    status: "submitted",
    limitCheck: { withinLimits: true, reason: "Within the food limit of 500 for grade A", ceiling: 500 },
    analysis: null,
    analysisError: null,
    suspectedDuplicateOf: null,
    decisions: [],
    createdAt: "2025-03-05T10:00:00.000Z",
    updatedAt: "2025-03-05T10:00:00.000Z",
    resolvedAt: null,
    ...rest,
    id: ClaimId(id),
  };
}

/**
 * Analyzer returning queued results in order, then `fallback`.
 * An Error in the queue is thrown instead of returned.
 */
export class StubAnalyzer implements BillAnalyzer {
  readonly calls: Array<{ bill: BillDocument; context: AnalysisContext }> = [];
  private readonly queue: Array<BillAnalysis | Error> = [];

  constructor(private fallback: BillAnalysis | Error = sampleAnalysis()) {}

  enqueue(...results: Array<BillAnalysis | Error>): this {
    this.queue.push(...results);
    return this;
  }

  setFallback(result: BillAnalysis | Error): void {
    this.fallback = result;
  }

  async analyze(bill: BillDocument, context: AnalysisContext): Promise<BillAnalysis> {
    this.calls.push({ bill, context });
    const next = this.queue.shift() ?? this.fallback;
    if (next instanceof Error) throw next;
    return next;
  }
}

export const unavailable = (reason = "model did not respond within 30000ms") =>
  new AnalysisUnavailableError(reason);

export function billBytes(content: string): Uint8Array {
  return new TextEncoder().encode(content);
}

// =============================================================================
// § App Harness
// =============================================================================

export interface TestHarness {
  app: Hono<AppEnv>;
  storage: MemoryStorage;
  billStore: MemoryBillStore;
  analyzer: StubAnalyzer;
  tokens: TokenService;
  metrics: ClaimFlowMetrics;
  /** Bearer header for a seeded employee */
  authHeader(employee: Employee): Promise<Record<string, string>>;
}

export async function createTestHarness(
  options: { analyzer?: StubAnalyzer; rateLimit?: { maxRequests: number; windowMs: number } | false } = {}
): Promise<TestHarness> {
  const storage = new MemoryStorage();
  const billStore = new MemoryBillStore();
  const analyzer = options.analyzer ?? new StubAnalyzer();
  const metrics = createMetrics();
  const tokens = new TokenService({
    secret: TEST_SECRET,
    issuer: "claimflow-test",
    accessTokenTtlSeconds: 1800,
    refreshTokenTtlSeconds: 7 * 24 * 3600,
  });

  const passwordHash = await hashPassword(TEST_PASSWORD);
  for (const employee of Object.values(STAFF)) {
    await storage.employees.save({ ...employee, passwordHash });
  }

  const app = createClaimFlowApp({
    storage,
    billStore,
    analyzer,
    policy: loadExpensePolicy(),
    tokens,
    currency: "INR",
    rateLimit: options.rateLimit ?? false,
    logger: silentLogger,
    metrics,
    now: () => FIXED_NOW,
  });

  return {
    app,
    storage,
    billStore,
    analyzer,
    tokens,
    metrics,
    async authHeader(employee) {
      const pair = await tokens.issuePair(employee);
      return { Authorization: `Bearer ${pair.accessToken}` };
    },
  };
}

export function claimForm(fields: Record<string, string>, bill?: { name: string; content: string }): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  if (bill) {
    form.append("bill_file", new File([bill.content], bill.name, { type: "application/octet-stream" }));
  }
  return form;
}

/** Parse a JSON response body with `schema`, failing the test on a mismatch */
export async function readJson<T extends z.ZodTypeAny>(res: Response, schema: T): Promise<z.output<T>> {
  return schema.parse(await res.json());
}
