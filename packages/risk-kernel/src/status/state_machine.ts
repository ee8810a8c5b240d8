// Risk Kernel - Escalation state machine (v1)
//
// Temperature gates the ceiling, other_score gates whether escalation is considered,
// high_count gates the final step to HIGH_RISK:
//
//   cool                                  -> SAFE
//   moderate  other <  min                -> SAFE
//   moderate  other >= min                -> WARNING
//   high      other <  min                -> WARNING
//   high      other >= min, count <  conf -> WARNING
//   high      other >= min, count >= conf -> HIGH_RISK

import type { RiskConfigV1, RiskStatusV1, StatusReasonV1, TempZoneV1 } from "@safewave/contracts";

export type StatusInputV1 = {
  temp_zone: TempZoneV1;
  other_score: number;
  high_count: number;
};

export type StatusDecisionV1 = {
  status: RiskStatusV1;
  reason: StatusReasonV1;
};

export function deriveStatus(input: StatusInputV1, config: RiskConfigV1): StatusDecisionV1 {
  const secondaryLow = input.other_score < config.secondary.min_score;

  switch (input.temp_zone) {
    case "cool":
      return { status: "SAFE", reason: "COOL_WATER" };
    case "moderate":
      return secondaryLow
        ? { status: "SAFE", reason: "MODERATE_SECONDARY_LOW" }
        : { status: "WARNING", reason: "MODERATE_SECONDARY_HIGH" };
    case "high":
      if (secondaryLow) return { status: "WARNING", reason: "HIGH_SECONDARY_LOW" };
      return input.high_count >= config.hysteresis.confirm_at
        ? { status: "HIGH_RISK", reason: "HIGH_CONFIRMED" }
        : { status: "WARNING", reason: "HIGH_UNCONFIRMED" };
  }
}
