import { z } from "zod";

import { RiskFlagV1Z, RiskStatusV1Z, StatusReasonV1Z, TempZoneV1Z } from "./risk_status_v1";
import { SiteIdZ } from "./sensor_reading_v1";

// Substituted when the advisory classifier is unavailable.
export const ADVISORY_FALLBACK_LABEL = "UNKNOWN";

export const AdvisoryLabelZ = z.string().min(1).max(64);

/**
 * DecisionRecordV1
 *
 * Append-only output of one engine invocation. Never mutated after it is stored.
 */
export const DecisionRecordV1Z = z
  .object({
    record_id: z.string().min(1),
    site_id: SiteIdZ,

    ph: z.number(),
    temp: z.number(),
    tds: z.number(),
    turb: z.number(),
    flow: z.number(),

    advisory_label: AdvisoryLabelZ,
    advisory_fallback: z.boolean(),

    flags: z.array(RiskFlagV1Z),
    temp_zone: TempZoneV1Z,
    bio_score: z.number(),
    other_score: z.number(),
    seasonal_bonus: z.number(),
    risk_percent: z.number().int().min(0).max(100),

    high_count: z.number().int().nonnegative(),
    previous_status: RiskStatusV1Z,
    status: RiskStatusV1Z,
    status_reason: StatusReasonV1Z,

    config_hash: z.string().min(1),
    timestamp: z.string().datetime(),
  })
  .strict();

export type DecisionRecordV1 = z.infer<typeof DecisionRecordV1Z>;

export function parseDecisionRecordV1(input: unknown): DecisionRecordV1 {
  return DecisionRecordV1Z.parse(input);
}
