#!/usr/bin/env node
/**
 * Offline replay of recorded readings through the risk kernel.
 *
 * Contract:
 * - Input: JSONL, one reading per line: { ph, temp, tds, turb, flow, ts? }
 * - `ts` (ISO datetime) is the evaluation time for that line; otherwise the wall clock.
 * - Output: one JSON line per step on stdout. Nothing is persisted.
 * - Any invalid line aborts the run with its line number.
 *
 * Usage:
 *   npm run replay -- --file ./readings.jsonl --profile default
 */

import fs from "node:fs";

import { ReplayLineInvalid, parseReplayJsonl, replayReadings, systemClock } from "@safewave/risk-kernel";
import type { ReplayInputV1 } from "@safewave/risk-kernel";

import { loadRiskConfig } from "../apps/server/src/config/risk_config";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function readReplayFile(file: string): ReplayInputV1[] {
  try {
    return parseReplayJsonl(fs.readFileSync(file, "utf8"));
  } catch (err) {
    if (err instanceof ReplayLineInvalid) die(err.message);
    throw err;
  }
}

/* -------------------- main -------------------- */

function main(): void {
  const file = arg("--file") ?? die("missing --file <readings.jsonl>");
  const profile = arg("--profile", process.env.RISK_CONFIG_PROFILE ?? "default") ?? "default";

  if (!fs.existsSync(file)) die(`file not found: ${file}`);

  const { config, config_hash } = loadRiskConfig(profile, process.env.SAFEWAVE_REPO_ROOT);

  const readings = readReplayFile(file);

  const steps = replayReadings(readings, config, { clock: systemClock });
  for (const s of steps) {
    const { at, ...reading } = s.reading;
    const d = s.decision;
    console.log(
      JSON.stringify({
        index: s.index,
        at: at ? at.toISOString() : null,
        reading,
        flags: d.evaluation.flags,
        temp_zone: d.evaluation.temp_zone,
        bio_score: d.evaluation.bio_score,
        other_score: d.evaluation.other_score,
        high_count: d.high_count,
        previous_status: d.previous_status,
        status: d.status,
        status_reason: d.reason,
        risk_percent: s.risk_percent,
      })
    );
  }

  console.error(`replayed ${steps.length} readings (profile=${profile}, ${config_hash})`);
}

main();
