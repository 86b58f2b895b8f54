/**
 * Runtime configuration from environment variables.
 *
 * Secrets support the Docker `_FILE` suffix: when `NAME_FILE` is set, the
 * value is read from that file and takes precedence over `NAME`.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./core/errors.js";

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Resolve `name` from the environment, preferring `<name>_FILE`.
 *
 * @throws {ConfigError} if `_FILE` is set but the file cannot be read
 */
export function resolveSecret(name: string, env: Env = process.env): string | undefined {
  const filePath = env[`${name}_FILE`];

  if (filePath) {
    try {
      return readFileSync(filePath, "utf-8").trim();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to read secret file for ${name}_FILE (${filePath}): ${message}`);
    }
  }

  return env[name] || undefined;
}

const intVar = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) =>
      v
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    );

const envSchema = z.object({
  CLAIMFLOW_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CLAIMFLOW_HOST: z.string().default("0.0.0.0"),
  CLAIMFLOW_STORAGE: z.enum(["memory", "sqlite"]).default("sqlite"),
  CLAIMFLOW_DB_PATH: z.string().default("data/claimflow.db"),
  CLAIMFLOW_UPLOAD_DIR: z.string().default("uploads"),
  CLAIMFLOW_MAX_UPLOAD_BYTES: intVar(10 * 1024 * 1024),
  CLAIMFLOW_ALLOWED_EXTENSIONS: csv("pdf,jpg,jpeg,png").transform((list) =>
    list.map((ext) => ext.replace(/^\./, "").toLowerCase())
  ),
  CLAIMFLOW_CURRENCY: z.string().trim().min(1).default("INR"),
  CLAIMFLOW_JWT_SECRET: z
    .string({ required_error: "CLAIMFLOW_JWT_SECRET (or CLAIMFLOW_JWT_SECRET_FILE) is required" })
    .min(16, "CLAIMFLOW_JWT_SECRET must be at least 16 characters"),
  CLAIMFLOW_JWT_ISSUER: z.string().default("claimflow"),
  CLAIMFLOW_ACCESS_TOKEN_TTL_MINUTES: intVar(30),
  CLAIMFLOW_REFRESH_TOKEN_TTL_DAYS: intVar(7),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  CLAIMFLOW_ANALYSIS_TIMEOUT_MS: intVar(30_000),
  CLAIMFLOW_CORS_ORIGINS: csv(""),
  CLAIMFLOW_RATE_LIMIT_MAX: intVar(120),
  CLAIMFLOW_RATE_LIMIT_WINDOW_MS: intVar(60_000),
  CLAIMFLOW_POLICY_FILE: z.string().optional(),
  CLAIMFLOW_USERS_FILE: z.string().optional(),
});

export interface ClaimFlowConfig {
  port: number;
  host: string;
  storage: { kind: "memory" } | { kind: "sqlite"; path: string };
  uploads: { dir: string; maxBytes: number; allowedExtensions: string[] };
  currency: string;
  auth: {
    secret: string;
    issuer: string;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  };
  analysis: { apiKey: string | undefined; model: string; timeoutMs: number };
  corsOrigins: string[];
  rateLimit: { maxRequests: number; windowMs: number };
  policyFile: string | undefined;
  usersFile: string | undefined;
}

/**
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(env: Env = process.env): ClaimFlowConfig {
  const result = envSchema.safeParse({
    ...env,
    CLAIMFLOW_JWT_SECRET: resolveSecret("CLAIMFLOW_JWT_SECRET", env),
    GEMINI_API_KEY: resolveSecret("GEMINI_API_KEY", env),
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const e = result.data;
  return {
    port: e.CLAIMFLOW_PORT,
    host: e.CLAIMFLOW_HOST,
    storage: e.CLAIMFLOW_STORAGE === "memory" ? { kind: "memory" } : { kind: "sqlite", path: e.CLAIMFLOW_DB_PATH },
    uploads: {
      dir: e.CLAIMFLOW_UPLOAD_DIR,
      maxBytes: e.CLAIMFLOW_MAX_UPLOAD_BYTES,
      allowedExtensions: e.CLAIMFLOW_ALLOWED_EXTENSIONS,
    },
    currency: e.CLAIMFLOW_CURRENCY,
    auth: {
      secret: e.CLAIMFLOW_JWT_SECRET,
      issuer: e.CLAIMFLOW_JWT_ISSUER,
      accessTokenTtlSeconds: e.CLAIMFLOW_ACCESS_TOKEN_TTL_MINUTES * 60,
      refreshTokenTtlSeconds: e.CLAIMFLOW_REFRESH_TOKEN_TTL_DAYS * 24 * 60 * 60,
    },
    analysis: {
      apiKey: e.GEMINI_API_KEY || undefined,
      model: e.GEMINI_MODEL,
      timeoutMs: e.CLAIMFLOW_ANALYSIS_TIMEOUT_MS,
    },
    corsOrigins: e.CLAIMFLOW_CORS_ORIGINS,
    rateLimit: {
      maxRequests: e.CLAIMFLOW_RATE_LIMIT_MAX,
      windowMs: e.CLAIMFLOW_RATE_LIMIT_WINDOW_MS,
    },
    policyFile: e.CLAIMFLOW_POLICY_FILE || undefined,
    usersFile: e.CLAIMFLOW_USERS_FILE || undefined,
  };
}
