import { createHash, randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function newId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

/**
 * Rejects with `TimeoutError` if `p` does not settle within `ms`.
 * The timer is always cleared so nothing is left pending.
 */
export async function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([p, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

// Nearest directory at or above `startDir` that contains `marker`.
export function findUp(startDir: string, marker: string): string {
  const dir = path.resolve(startDir);
  if (fs.existsSync(path.join(dir, marker))) return dir;
  const parent = path.dirname(dir);
  if (parent === dir) throw new Error(`no ${marker} at or above ${startDir}`);
  return findUp(parent, marker);
}
