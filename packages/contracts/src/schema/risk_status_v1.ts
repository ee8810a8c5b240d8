import { z } from "zod";

// Ordered by severity: index is the rank.
export const RISK_STATUSES_V1 = ["SAFE", "WARNING", "HIGH_RISK"] as const;

export const RiskStatusV1Z = z.enum(RISK_STATUSES_V1);

export type RiskStatusV1 = z.infer<typeof RiskStatusV1Z>;

export function severityRank(status: RiskStatusV1): number {
  return RISK_STATUSES_V1.indexOf(status);
}

export function compareSeverity(a: RiskStatusV1, b: RiskStatusV1): number {
  return severityRank(a) - severityRank(b);
}

// Fixed order; records list active flags in this order.
export const RISK_FLAGS_V1 = ["temp_risk", "turb_risk", "tds_risk", "flow_risk", "ph_risk"] as const;

export const RiskFlagV1Z = z.enum(RISK_FLAGS_V1);

export type RiskFlagV1 = z.infer<typeof RiskFlagV1Z>;

export const TempZoneV1Z = z.enum(["cool", "moderate", "high"]);

export type TempZoneV1 = z.infer<typeof TempZoneV1Z>;

export const StatusReasonV1Z = z.enum([
  "COOL_WATER",
  "MODERATE_SECONDARY_LOW",
  "MODERATE_SECONDARY_HIGH",
  "HIGH_SECONDARY_LOW",
  "HIGH_UNCONFIRMED",
  "HIGH_CONFIRMED",
  "HARD_SAFE_OVERRIDE",
]);

export type StatusReasonV1 = z.infer<typeof StatusReasonV1Z>;
