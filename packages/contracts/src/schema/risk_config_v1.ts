import { z } from "zod";

import { RiskFlagV1Z } from "./risk_status_v1";
import { SiteIdZ } from "./sensor_reading_v1";

const WeightZ = z.number().finite().nonnegative();

const FlowTriggerZ = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("flag") }).strict(), // stagnant iff flow == 0
  z.object({ mode: z.literal("rate"), min_rate: z.number().finite().positive() }).strict(), // stagnant iff flow < min_rate
]);

export type FlowTriggerV1 = z.infer<typeof FlowTriggerZ>;

const HysteresisZ = z
  .object({
    increment_at: z.number().finite(), // bio_score cutoff for "this reading looks bad"
    increment_step: z.number().int().positive(),
    decay_step: z.number().int().positive(),
    confirm_at: z.number().int().positive(), // high_count needed for HIGH_RISK
    strategy: z.enum(["decay", "hard_reset"]),
    dominant_flags: z.array(RiskFlagV1Z).min(1),
  })
  .strict();

export type HysteresisConfigV1 = z.infer<typeof HysteresisZ>;

/**
 * RiskConfigV1
 *
 * Thresholds, weights and hysteresis bands for one deployment.
 * Source of truth: config/risk/<profile>.json
 */
export const RiskConfigV1Z = z
  .object({
    schema_version: z.literal("1.0.0"),
    name: z.string().min(1),
    site_id: SiteIdZ,
    temperature: z
      .object({
        cool_below: z.number().finite(),
        high_at: z.number().finite(),
      })
      .strict()
      .refine((t) => t.high_at >= t.cool_below, { message: "temperature.high_at must be >= temperature.cool_below" }),
    triggers: z
      .object({
        turb_at: z.number().finite(),
        tds_at: z.number().finite(),
        ph_at: z.number().finite(),
        flow: FlowTriggerZ,
      })
      .strict(),
    weights: z
      .object({
        temp_high: WeightZ,
        temp_moderate: WeightZ,
        turb: WeightZ,
        tds: WeightZ,
        flow: WeightZ,
        ph: WeightZ,
      })
      .strict(),
    secondary: z
      .object({
        weights: z.object({ turb: WeightZ, tds: WeightZ, flow: WeightZ, ph: WeightZ }).strict(),
        min_score: z.number().finite(),
      })
      .strict(),
    seasonal: z
      .object({
        enabled: z.boolean(),
        months: z.array(z.number().int().min(1).max(12)),
        min_temp: z.number().finite(),
        bonus: WeightZ,
      })
      .strict(),
    hysteresis: HysteresisZ,
    normalization: z.object({ max_score: z.number().finite().positive() }).strict(),
  })
  .strict();

export type RiskConfigV1 = z.infer<typeof RiskConfigV1Z>;

export function parseRiskConfigV1(input: unknown): RiskConfigV1 {
  return RiskConfigV1Z.parse(input);
}
