// Risk Kernel - Persistent hysteresis counter (v1)
//
// increment on risk-positive readings, decay (floored at 0) otherwise.
// increment_step and decay_step are independent so recovery can be faster than escalation.

import type { HysteresisConfigV1, RiskFlagV1 } from "@safewave/contracts";

function normalizeCount(n: number): number {
  if (!Number.isFinite(n) || n < 0) return 0;
  return Math.floor(n);
}

export function advanceCounter(priorCount: number, bioScore: number, h: HysteresisConfigV1): number {
  const prior = normalizeCount(priorCount);
  if (bioScore >= h.increment_at) return prior + h.increment_step;
  return Math.max(0, prior - h.decay_step);
}

/**
 * Hard safe override: under the "hard_reset" strategy a reading with none of the
 * dominant flags active resets the counter to 0 and publishes SAFE directly.
 * Always false under "decay".
 */
export function isHardSafe(flags: ReadonlyArray<RiskFlagV1>, h: HysteresisConfigV1): boolean {
  if (h.strategy !== "hard_reset") return false;
  return h.dominant_flags.every((f) => !flags.includes(f));
}
