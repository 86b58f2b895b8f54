/**
 * Bill Intake - checks and fingerprints an uploaded bill before it is
 * stored.
 */

import { createHash } from "node:crypto";
import { ValidationError } from "./errors.js";

export interface IncomingBill {
  filename: string;
  data: Uint8Array;
}

export interface BillConstraints {
  /** Lower-case extensions without the dot */
  allowedExtensions: readonly string[];
  maxBytes: number;
}

export interface CheckedBill extends IncomingBill {
  extension: string;
  mimeType: string;
  sha256: string;
}

const MIME_TYPES: Readonly<Record<string, string>> = {
  pdf: "application/pdf",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  heic: "image/heic",
};

export function sha256Hex(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot === -1 ? "" : filename.slice(dot + 1).toLowerCase();
}

/**
 * @throws {ValidationError} for unsupported type, empty file or oversize file
 */
export function checkBill(bill: IncomingBill, constraints: BillConstraints): CheckedBill {
  const extension = fileExtension(bill.filename);
  if (!constraints.allowedExtensions.includes(extension)) {
    throw new ValidationError(
      `File type '.${extension}' is not allowed. Allowed: ${constraints.allowedExtensions.join(", ")}`,
      [{ field: "bill_file", message: "Unsupported file type" }]
    );
  }
  if (bill.data.byteLength === 0) {
    throw new ValidationError("Bill file is empty", [{ field: "bill_file", message: "File is empty" }]);
  }
  if (bill.data.byteLength > constraints.maxBytes) {
    const maxMb = (constraints.maxBytes / (1024 * 1024)).toFixed(1);
    throw new ValidationError(`Bill file exceeds the ${maxMb} MB limit`, [
      { field: "bill_file", message: "File too large" },
    ]);
  }
  return {
    ...bill,
    extension,
    mimeType: MIME_TYPES[extension] ?? "application/octet-stream",
    sha256: sha256Hex(bill.data),
  };
}
