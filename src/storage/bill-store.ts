/**
 * BillStore - where uploaded bill files live.
 *
 * Keys look like `<ownerId>/<claimId>-<filename>` and are always relative
 * to the store root.
 */

import { promises as fs } from "node:fs";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";

export interface BillStore {
  put(key: string, data: Uint8Array): Promise<void>;
  get(key: string): Promise<Uint8Array | null>;
  delete(key: string): Promise<boolean>;
}

/**
 * Reduce an uploaded filename to a safe single path segment.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "");
  return cleaned.slice(-100) || "bill";
}

export function billStorageKey(ownerId: string, claimId: string, filename: string): string {
  return `${sanitizeFilename(ownerId)}/${claimId}-${sanitizeFilename(filename)}`;
}

// =============================================================================
// § Local Filesystem
// =============================================================================

export interface LocalBillStoreConfig {
  /** Base directory for stored bills */
  rootDir: string;
}

export class LocalBillStore implements BillStore {
  private readonly rootDir: string;

  constructor(config: LocalBillStoreConfig) {
    this.rootDir = resolve(config.rootDir);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  async put(key: string, data: Uint8Array): Promise<void> {
    const path = this.pathFor(key);
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, data, { flag: "wx" });
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  /**
   * @throws {Error} when the key escapes the root directory
   */
  pathFor(key: string): string {
    const path = resolve(join(this.rootDir, key));
    const rel = relative(this.rootDir, path);
    if (!rel || rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(`Invalid bill storage key: ${key}`);
    }
    return path;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// =============================================================================
// § In-Memory
// =============================================================================

export class MemoryBillStore implements BillStore {
  private readonly files = new Map<string, Uint8Array>();

  async put(key: string, data: Uint8Array): Promise<void> {
    if (this.files.has(key)) {
      throw new Error(`Bill already stored: ${key}`);
    }
    this.files.set(key, new Uint8Array(data));
  }

  async get(key: string): Promise<Uint8Array | null> {
    return this.files.get(key) ?? null;
  }

  async delete(key: string): Promise<boolean> {
    return this.files.delete(key);
  }

  get size(): number {
    return this.files.size;
  }
}
