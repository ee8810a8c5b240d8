import { z } from "zod";

import { RiskStatusV1Z } from "./risk_status_v1";
import { SiteIdZ } from "./sensor_reading_v1";

export const RiskStateV1Z = z
  .object({
    site_id: SiteIdZ,
    high_count: z.number().int().nonnegative(),
    status: RiskStatusV1Z,
    updated_at: z.string().datetime(),
    version: z.number().int().nonnegative(), // compare-and-swap token; 0 = never persisted
  })
  .strict();

export type RiskStateV1 = z.infer<typeof RiskStateV1Z>;

export function initialRiskState(site_id: string, updated_at: string): RiskStateV1 {
  return { site_id, high_count: 0, status: "SAFE", updated_at, version: 0 };
}
