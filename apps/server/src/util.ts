import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

// Object keys in sorted order at every depth; arrays keep their order.
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value === null || typeof value !== "object") return value;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([k, v]) => [k, canonicalize(v)]));
}

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

/**
 * Parse an optional query-string fraction.
 *
 * - undefined / "" => fallback
 * - anything that is not a finite number => throws
 *
 * Range checking is left to FetchWindowV1Schema.
 */
export function parseFractionParam(v: unknown, name: string, fallback: number): number {
  if (v === undefined) return fallback;
  if (typeof v === "string" && v.trim() === "") return fallback;
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v.trim()) : NaN;
  if (!Number.isFinite(n)) throw new Error(`invalid ${name}`);
  return n;
}

/** Nearest ancestor of `startDir` (itself included) that contains `marker`. */
export function findRepoRoot(startDir: string, marker: string, maxLevels = 8): string {
  let dir = path.resolve(startDir);
  for (let level = 0; level <= maxLevels; level++) {
    if (fs.existsSync(path.join(dir, marker))) return dir;
    const up = path.dirname(dir);
    if (up === dir) break;
    dir = up;
  }
  throw new Error(`no ${marker} above ${startDir}`);
}
