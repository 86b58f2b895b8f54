/**
 * Request parsing helpers shared by the ClaimFlow routers.
 */

import type { Context } from "hono";
import { z } from "zod";
import { ValidationError } from "../../core/errors.js";
import type { Employee, PublicEmployee } from "../../types/claim-contract.js";

export const MAX_PAGE_SIZE = 100;

/** `skip`/`limit` query parameters, mapped to offset/limit */
export const paginationQuery = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(50),
};

/** Query-string boolean: `true`/`false`/`1`/`0` */
export const queryBoolean = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

function issuesOf(error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    field: issue.path.join(".") || "body",
    message: issue.message,
  }));
  const first = issues[0];
  return new ValidationError(first ? `${first.field}: ${first.message}` : "Invalid request", issues);
}

/**
 * @throws {ValidationError}
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw issuesOf(result.error);
  }
  return result.data;
}

/**
 * Parse a JSON body. An absent or empty body is treated as `{}`.
 *
 * @throws {ValidationError}
 */
export async function readJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim()) {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ValidationError("Request body must be valid JSON", [{ field: "body", message: "Malformed JSON" }]);
    }
  }
  return parseWith(schema, raw);
}

export function toPublicEmployee(employee: Employee): PublicEmployee {
  const { passwordHash: _omit, ...rest } = employee;
  return rest;
}
