// Risk Kernel - DecisionRecord assembler (v1)

import type { DecisionRecordV1, SensorReadingV1 } from "@safewave/contracts";

import type { RiskDecisionV1 } from "../kernel";

export type AdvisoryResultV1 = {
  label: string;
  fallback: boolean;
};

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

/**
 * clamp(round(bio_score / max_score * 100), 0, 100); non-finite ratios map to 0.
 */
export function riskPercent(bioScore: number, maxScore: number): number {
  const pct = Math.round((bioScore / maxScore) * 100);
  if (!Number.isFinite(pct)) return 0;
  return Math.min(100, Math.max(0, pct));
}

export function assembleDecisionRecord(args: {
  record_id: string;
  site_id: string;
  reading: SensorReadingV1;
  advisory: AdvisoryResultV1;
  decision: RiskDecisionV1;
  max_score: number;
  config_hash: string;
  timestamp: string;
}): DecisionRecordV1 {
  const { reading, advisory, decision } = args;
  const ev = decision.evaluation;

  const record: DecisionRecordV1 = {
    record_id: args.record_id,
    site_id: args.site_id,
    ph: reading.ph,
    temp: reading.temp,
    tds: reading.tds,
    turb: reading.turb,
    flow: reading.flow,
    advisory_label: advisory.label,
    advisory_fallback: advisory.fallback,
    flags: [...ev.flags],
    temp_zone: ev.temp_zone,
    bio_score: round2(ev.bio_score),
    other_score: round2(ev.other_score),
    seasonal_bonus: ev.seasonal_bonus,
    risk_percent: riskPercent(ev.bio_score, args.max_score),
    high_count: decision.high_count,
    previous_status: decision.previous_status,
    status: decision.status,
    status_reason: decision.reason,
    config_hash: args.config_hash,
    timestamp: args.timestamp,
  };

  // Freeze to prevent accidental mutation by callers.
  Object.freeze(record.flags);
  return Object.freeze(record);
}
