/**
 * Employee directory seeding from a JSON file.
 *
 * The file holds an array of employees with plain-text passwords, which are
 * hashed on load. Existing employees (matched by id) keep their record.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { hashPassword } from "./auth/password.js";
import { ConfigError } from "./core/errors.js";
import type { EmployeeStorage } from "./storage/storage-interface.js";
import { EmployeeId } from "./types/branded.js";
import { GRADES, ROLES, type Employee } from "./types/claim-contract.js";

const seedSchema = z.array(
  z.object({
    id: z.string().min(1),
    username: z.string().min(1),
    email: z.string().email(),
    fullName: z.string().min(1),
    department: z.string().nullable().default(null),
    role: z.enum(ROLES),
    grade: z.enum(GRADES),
    canClaimExpenses: z.boolean().default(true),
    active: z.boolean().default(true),
    password: z.string().min(8),
  })
);

export type SeedEmployee = z.input<typeof seedSchema>[number];

export interface SeedResult {
  created: number;
  skipped: number;
}

export async function seedEmployees(
  storage: EmployeeStorage,
  seeds: readonly SeedEmployee[],
  now: () => Date = () => new Date()
): Promise<SeedResult> {
  const parsed = seedSchema.safeParse(seeds);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid employee seed data: ${details}`);
  }

  const result: SeedResult = { created: 0, skipped: 0 };
  for (const { password, ...seed } of parsed.data) {
    const id = EmployeeId(seed.id);
    if (await storage.get(id)) {
      result.skipped++;
      continue;
    }
    const employee: Employee = {
      ...seed,
      id,
      passwordHash: await hashPassword(password),
      createdAt: now().toISOString(),
    };
    await storage.save(employee);
    result.created++;
  }
  return result;
}

export async function seedEmployeesFromFile(storage: EmployeeStorage, path: string): Promise<SeedResult> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot load employees from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`Employee seed file ${path} must contain a JSON array`);
  }
  return seedEmployees(storage, raw);
}
