// Risk Kernel - Pure decision entrypoint (v1)
//
// One reading + prior (high_count, status) -> next (high_count, status).
// No IO. "now" is injected; the advisory label is not an input.

import type { RiskConfigV1, RiskStateV1, RiskStatusV1, SensorReadingV1, StatusReasonV1 } from "@safewave/contracts";

import { evaluateReading } from "./rules/evaluator";
import type { ReadingEvaluationV1 } from "./rules/evaluator";
import { advanceCounter, isHardSafe } from "./hysteresis/counter";
import { deriveStatus } from "./status/state_machine";

export type PriorRiskV1 = Pick<RiskStateV1, "high_count" | "status">;

export type RiskDecisionV1 = {
  evaluation: ReadingEvaluationV1;
  high_count: number;
  previous_status: RiskStatusV1;
  status: RiskStatusV1;
  reason: StatusReasonV1;
};

/**
 * Decides the next published status for one reading.
 *
 * Under the "hard_reset" strategy a reading without any dominant flag short-circuits
 * to SAFE with high_count = 0; otherwise the counter is advanced and the state
 * machine derives the status from the updated count.
 */
export function decideRisk(
  reading: SensorReadingV1,
  prior: PriorRiskV1,
  config: RiskConfigV1,
  now: Date
): RiskDecisionV1 {
  const evaluation = evaluateReading(reading, config, now);

  if (isHardSafe(evaluation.flags, config.hysteresis)) {
    return { evaluation, high_count: 0, previous_status: prior.status, status: "SAFE", reason: "HARD_SAFE_OVERRIDE" };
  }

  const high_count = advanceCounter(prior.high_count, evaluation.bio_score, config.hysteresis);
  const { status, reason } = deriveStatus(
    { temp_zone: evaluation.temp_zone, other_score: evaluation.other_score, high_count },
    config
  );

  return { evaluation, high_count, previous_status: prior.status, status, reason };
}
