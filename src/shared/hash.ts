import { createHash } from "crypto";
import { readFileSync } from "fs";

/** SHA-256 hash of raw bytes (Buffer). */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 of a file's bytes on disk. */
export function sha256File(filePath: string): string {
  return sha256Bytes(readFileSync(filePath));
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Used for deterministic hashing of trace records and store values.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Buffer.isBuffer(obj)) return obj.toString("base64");
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  if (obj instanceof Map) return sortKeysDeep(Object.fromEntries(obj));
  const record: Record<string, unknown> = { ...obj };
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = sortKeysDeep(record[key]);
  }
  return sorted;
}

/** Compute SHA-256 of a canonical JSON representation. */
export function contentHash(obj: unknown): string {
  return sha256String(canonicalJsonStringify(obj) ?? "undefined");
}
