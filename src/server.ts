/**
 * ClaimFlow HTTP server entry point.
 *
 * Loads config, the expense policy and (optionally) seed employees, then
 * serves the API until SIGINT/SIGTERM.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { serve } from "@hono/node-server";
import { DisabledBillAnalyzer, type BillAnalyzer } from "./analysis/bill-analyzer.js";
import { GeminiBillAnalyzer, createGeminiClient } from "./analysis/gemini-analyzer.js";
import { createClaimFlowApp } from "./app.js";
import { TokenService } from "./auth/token-service.js";
import { loadConfig, type ClaimFlowConfig } from "./config.js";
import { createLogger } from "./logging.js";
import { createMetrics } from "./metrics.js";
import { loadExpensePolicy } from "./policy/expense-policy.js";
import { seedEmployeesFromFile } from "./seed-users.js";
import { LocalBillStore } from "./storage/bill-store.js";
import { MemoryStorage } from "./storage/memory-storage.js";
import { SqliteStorage } from "./storage/sqlite-storage.js";
import type { ClaimFlowStorage } from "./storage/storage-interface.js";

function createStorage(config: ClaimFlowConfig): ClaimFlowStorage {
  if (config.storage.kind === "memory") {
    return new MemoryStorage();
  }
  if (config.storage.path !== ":memory:") {
    mkdirSync(dirname(config.storage.path), { recursive: true });
  }
  return new SqliteStorage({ dbPath: config.storage.path });
}

async function main(): Promise<void> {
  const logger = createLogger();
  const config = loadConfig();
  const policy = config.policyFile ? loadExpensePolicy(config.policyFile) : loadExpensePolicy();

  const storage = createStorage(config);
  await storage.initialize();

  if (config.usersFile) {
    const seeded = await seedEmployeesFromFile(storage.employees, config.usersFile);
    logger.info({ ...seeded, file: config.usersFile }, "Employee directory seeded");
  }

  const billStore = new LocalBillStore({ rootDir: config.uploads.dir });
  await billStore.initialize();

  let analyzer: BillAnalyzer;
  if (config.analysis.apiKey) {
    analyzer = new GeminiBillAnalyzer({
      client: createGeminiClient(config.analysis.apiKey),
      model: config.analysis.model,
      timeoutMs: config.analysis.timeoutMs,
      logger: logger.child({ component: "bill-analyzer" }),
    });
  } else {
    logger.warn("GEMINI_API_KEY is not set, bills will be stored without AI analysis");
    analyzer = new DisabledBillAnalyzer();
  }

  const app = createClaimFlowApp({
    storage,
    billStore,
    analyzer,
    policy,
    tokens: new TokenService(config.auth),
    currency: config.currency,
    billConstraints: config.uploads,
    corsOrigins: config.corsOrigins,
    rateLimit: config.rateLimit,
    logger,
    metrics: createMetrics({ defaultMetrics: true }),
    version: process.env["npm_package_version"],
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info({ port: info.port, host: config.host, storage: config.storage.kind }, "ClaimFlow listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) logger.error({ err }, "Error while closing HTTP server");
      storage.close().then(
        () => process.exit(err ? 1 : 0),
        (closeErr: unknown) => {
          logger.error({ err: closeErr }, "Error while closing storage");
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  createLogger({ format: "json" }).fatal({ err }, "ClaimFlow failed to start");
  process.exit(1);
});
