/**
 * Liveness + Readiness Probe Routes
 *
 * GET /health process is up
 * GET /ready  checks storage backend connectivity
 */

import { Hono } from "hono";
import type { ClaimFlowStorage } from "../storage/storage-interface.js";
import type { AppEnv } from "../middleware/context.js";

export interface ProbeOptions {
  storage: Pick<ClaimFlowStorage, "healthCheck">;
  version?: string;
}

/**
 * Creates a Hono router with liveness and readiness probe endpoints.
 */
export function createProbeRouter(options: ProbeOptions): Hono<AppEnv> {
  const { storage, version } = options;
  const router = new Hono<AppEnv>();

  router.get("/health", (c) => c.json({ ok: true, status: "healthy", version: version ?? null }));

  /**
   * GET /ready: Readiness probe
   * A failing health check is reported as 503 and logged.
   */
  router.get("/ready", async (c) => {
    try {
      const result = await storage.healthCheck();
      if (result.ok) {
        return c.json({ ok: true, latencyMs: result.latencyMs }, 200);
      }
      return c.json({ ok: false, latencyMs: result.latencyMs }, 503);
    } catch (err) {
      c.get("logger").warn({ err }, "Storage health check failed");
      return c.json({ ok: false, latencyMs: 0 }, 503);
    }
  });

  return router;
}
