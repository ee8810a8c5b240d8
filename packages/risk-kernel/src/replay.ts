// Risk Kernel - Offline replay (v1)
//
// Folds decideRisk over a sequence of readings with an in-memory prior.
// Non-durable: nothing is persisted; used to tune thresholds against recorded data.

import { ReplayLineV1Z } from "@safewave/contracts";
import type { RiskConfigV1, SensorReadingV1 } from "@safewave/contracts";

import type { Clock } from "./clock";
import { decideRisk } from "./kernel";
import type { PriorRiskV1, RiskDecisionV1 } from "./kernel";
import { riskPercent } from "./record/assembler";

// `at` overrides the clock for that reading (seasonal evaluation of historical data).
export type ReplayInputV1 = SensorReadingV1 & { at?: Date };

export type ReplayStepV1 = {
  index: number;
  reading: ReplayInputV1;
  decision: RiskDecisionV1;
  risk_percent: number;
};

export function replayReadings(
  readings: Iterable<ReplayInputV1>,
  config: RiskConfigV1,
  opts: { clock: Clock; initial?: PriorRiskV1 }
): ReplayStepV1[] {
  let prior: PriorRiskV1 = opts.initial ?? { high_count: 0, status: "SAFE" };
  const steps: ReplayStepV1[] = [];

  let index = 0;
  for (const reading of readings) {
    const decision = decideRisk(reading, prior, config, reading.at ?? opts.clock.now());
    steps.push({
      index,
      reading,
      decision,
      risk_percent: riskPercent(decision.evaluation.bio_score, config.normalization.max_score),
    });
    prior = { high_count: decision.high_count, status: decision.status };
    index++;
  }

  return steps;
}

export class ReplayLineInvalid extends Error {
  public readonly line: number;

  constructor(line: number, detail: string) {
    super(`line ${line}: ${detail}`);
    this.name = "ReplayLineInvalid";
    this.line = line;
  }
}

/**
 * Parses JSONL replay input. Blank lines are skipped; the first invalid line throws
 * `ReplayLineInvalid` with its 1-based line number. A `ts` becomes the reading's `at`.
 */
export function parseReplayJsonl(text: string): ReplayInputV1[] {
  const out: ReplayInputV1[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new ReplayLineInvalid(i + 1, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    const parsed = ReplayLineV1Z.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((x) => `${x.path.join(".") || "<root>"}: ${x.message}`);
      throw new ReplayLineInvalid(i + 1, issues.join("; "));
    }

    const { ts, ...reading } = parsed.data;
    out.push(ts ? { ...reading, at: new Date(ts) } : reading);
  }

  return out;
}
