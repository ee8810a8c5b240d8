// Shared fixtures for risk-kernel tests (mirrors config/risk/default.json).

import type { RiskConfigV1, SensorReadingV1 } from "@safewave/contracts";

import { fixedClock } from "../clock";

const BASE_CONFIG: RiskConfigV1 = {
  schema_version: "1.0.0",
  name: "test",
  site_id: "site-a",
  temperature: { cool_below: 25, high_at: 34 },
  triggers: { turb_at: 50, tds_at: 250, ph_at: 7.5, flow: { mode: "flag" } },
  weights: { temp_high: 3, temp_moderate: 1, turb: 1.5, tds: 1, flow: 1, ph: 0.5 },
  secondary: { weights: { turb: 1, tds: 1, flow: 1, ph: 0.5 }, min_score: 1.5 },
  seasonal: { enabled: true, months: [4, 5, 6, 7, 8, 9], min_temp: 30, bonus: 0.5 },
  hysteresis: {
    increment_at: 4,
    increment_step: 1,
    decay_step: 2,
    confirm_at: 6,
    strategy: "decay",
    dominant_flags: ["temp_risk", "turb_risk"],
  },
  normalization: { max_score: 7 },
};

export function makeConfig(mutate?: (c: RiskConfigV1) => void): RiskConfigV1 {
  const c = structuredClone(BASE_CONFIG);
  if (mutate) mutate(c);
  return c;
}

// Outside the seasonal window.
export const JANUARY = fixedClock("2026-01-15T12:00:00.000Z");
// Inside the seasonal window.
export const JULY = fixedClock("2026-07-15T12:00:00.000Z");

export const EXTREME: SensorReadingV1 = { ph: 9, temp: 40, tds: 1000, turb: 500, flow: 0 };
export const CALM: SensorReadingV1 = { ph: 7, temp: 20, tds: 100, turb: 5, flow: 1 };
