import { createHash, timingSafeEqual } from "crypto";

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Arrays keep their order; `undefined` members are dropped like JSON.stringify does.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  const entries: Array<[string, unknown]> = Object.entries(obj);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const sorted: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    sorted[key] = sortKeysDeep(value);
  }
  return sorted;
}

/** Compute SHA-256 of a canonical JSON representation. */
export function contentHash(obj: unknown): string {
  return sha256String(canonicalJsonStringify(obj));
}

/** Simple Merkle root from an array of hashes. */
export function merkleRoot(hashes: string[]): string {
  if (hashes.length === 0) return sha256String("");
  if (hashes.length === 1) return hashes[0];

  const nextLevel: string[] = [];
  for (let i = 0; i < hashes.length; i += 2) {
    const left = hashes[i];
    const right = i + 1 < hashes.length ? hashes[i + 1] : left;
    nextLevel.push(sha256String(left + right));
  }
  return merkleRoot(nextLevel);
}

/**
 * Constant-time comparison of two hex digests.
 * Length mismatches return false without comparing contents.
 */
export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
