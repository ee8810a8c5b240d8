// Risk Kernel - Rule evaluator (v1)
//
// Converts one reading into risk flags and scalar scores.
// - Flags compare each field against its configured trigger (>= for upper bounds).
// - bio_score: temperature-zone weight + weights of active non-temperature flags + seasonal bonus.
// - other_score: secondary weights of active non-temperature flags (gates escalation).
//
// No IO. Total over every number, including out-of-range and non-finite values.

import type { FlowTriggerV1, RiskConfigV1, RiskFlagV1, SensorReadingV1, TempZoneV1 } from "@safewave/contracts";
import { RISK_FLAGS_V1 } from "@safewave/contracts";

export type ReadingEvaluationV1 = {
  flags: RiskFlagV1[];
  temp_zone: TempZoneV1;
  bio_score: number;
  other_score: number;
  seasonal_bonus: number;
};

export function temperatureZone(temp: number, config: RiskConfigV1): TempZoneV1 {
  if (temp < config.temperature.cool_below) return "cool";
  if (temp >= config.temperature.high_at) return "high";
  return "moderate";
}

export function isStagnant(flow: number, trigger: FlowTriggerV1): boolean {
  switch (trigger.mode) {
    case "flag":
      return flow === 0;
    case "rate":
      return flow < trigger.min_rate;
  }
}

export function seasonalBonus(reading: SensorReadingV1, config: RiskConfigV1, now: Date): number {
  const s = config.seasonal;
  if (!s.enabled) return 0;
  const month = now.getUTCMonth() + 1;
  if (!s.months.includes(month)) return 0;
  return reading.temp >= s.min_temp ? s.bonus : 0;
}

function activeFlags(reading: SensorReadingV1, config: RiskConfigV1, zone: TempZoneV1): Set<RiskFlagV1> {
  const t = config.triggers;
  const out = new Set<RiskFlagV1>();
  if (zone === "high") out.add("temp_risk");
  if (reading.turb >= t.turb_at) out.add("turb_risk");
  if (reading.tds >= t.tds_at) out.add("tds_risk");
  if (isStagnant(reading.flow, t.flow)) out.add("flow_risk");
  if (reading.ph >= t.ph_at) out.add("ph_risk");
  return out;
}

function zoneWeight(zone: TempZoneV1, config: RiskConfigV1): number {
  switch (zone) {
    case "high":
      return config.weights.temp_high;
    case "moderate":
      return config.weights.temp_moderate;
    case "cool":
      return 0;
  }
}

/**
 * Weighted sum of the non-temperature flags, using either the primary or the secondary weight table.
 */
function nonTemperatureScore(
  flags: ReadonlySet<RiskFlagV1>,
  w: { turb: number; tds: number; flow: number; ph: number }
): number {
  let score = 0;
  if (flags.has("turb_risk")) score += w.turb;
  if (flags.has("tds_risk")) score += w.tds;
  if (flags.has("flow_risk")) score += w.flow;
  if (flags.has("ph_risk")) score += w.ph;
  return score;
}

export function evaluateReading(reading: SensorReadingV1, config: RiskConfigV1, now: Date): ReadingEvaluationV1 {
  const temp_zone = temperatureZone(reading.temp, config);
  const set = activeFlags(reading, config, temp_zone);
  const seasonal_bonus = seasonalBonus(reading, config, now);

  const bio_score = zoneWeight(temp_zone, config) + nonTemperatureScore(set, config.weights) + seasonal_bonus;
  const other_score = nonTemperatureScore(set, config.secondary.weights);

  return {
    flags: RISK_FLAGS_V1.filter((f) => set.has(f)),
    temp_zone,
    bio_score,
    other_score,
    seasonal_bonus,
  };
}
