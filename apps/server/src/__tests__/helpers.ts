// Test doubles shared by server tests.

import { setTimeout as sleep } from "node:timers/promises";

import Fastify from "fastify";
import type { FastifyBaseLogger } from "fastify";

import type { DecisionRecordV1, RiskStateV1, SensorReadingV1 } from "@safewave/contracts";
import { fixedClock } from "@safewave/risk-kernel";

import type { AdvisoryClassifier } from "../classifier/advisory";
import { loadRiskConfig } from "../config/risk_config";
import type { LoadedRiskConfig } from "../config/risk_config";
import { SqliteRiskStore } from "../store";
import type { CommitDecisionArgs, CommitOutcome, RiskStore } from "../store";

export const JANUARY = fixedClock("2026-01-15T12:00:00.000Z");

export const EXTREME: SensorReadingV1 = { ph: 9, temp: 40, tds: 1000, turb: 500, flow: 0 };
export const CALM: SensorReadingV1 = { ph: 7, temp: 20, tds: 100, turb: 5, flow: 1 };

export function silentLog(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function defaultConfig(): LoadedRiskConfig {
  return loadRiskConfig("default");
}

export function memoryStore(): SqliteRiskStore {
  return new SqliteRiskStore({ filePath: ":memory:" });
}

export class FixedClassifier implements AdvisoryClassifier {
  calls = 0;
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
  }

  async classify(): Promise<string> {
    this.calls++;
    return this.label;
  }
}

export class FailingClassifier implements AdvisoryClassifier {
  calls = 0;

  async classify(): Promise<string> {
    this.calls++;
    throw new Error("model offline");
  }
}

/**
 * Delegating store whose individual operations can be made to fail or hang.
 */
export class ScriptedStore implements RiskStore {
  readonly kind = "sqlite" as const;
  failLoad = false;
  hangLoad = false;
  failCommit = false;
  // Delay before the commit reaches the inner store; aborts cut it short unless ignoreAbort is set.
  commitDelayMs = 0;
  ignoreAbort = false;
  // Writes through to the inner store, then never settles.
  hangAfterCommit = false;
  commits = 0;
  // Runs against the inner store before each commit, e.g. to simulate another writer.
  beforeCommit?: (args: CommitDecisionArgs) => Promise<void>;

  private readonly inner: RiskStore;

  constructor(inner: RiskStore) {
    this.inner = inner;
  }

  async ping(): Promise<void> {
    return this.inner.ping();
  }

  loadState(site_id: string): Promise<RiskStateV1 | null> {
    if (this.hangLoad) return new Promise<RiskStateV1 | null>(() => undefined);
    if (this.failLoad) return Promise.reject(new Error("connection reset"));
    return this.inner.loadState(site_id);
  }

  async commitDecision(args: CommitDecisionArgs): Promise<CommitOutcome> {
    this.commits++;
    if (this.failCommit) throw new Error("disk full");
    if (this.beforeCommit) await this.beforeCommit(args);
    if (this.commitDelayMs > 0) {
      await sleep(this.commitDelayMs, undefined, this.ignoreAbort ? {} : { signal: args.signal });
    }
    const outcome = await this.inner.commitDecision(this.ignoreAbort ? { ...args, signal: undefined } : args);
    if (this.hangAfterCommit) return new Promise<CommitOutcome>(() => undefined);
    return outcome;
  }

  async hasRecord(record_id: string): Promise<boolean> {
    return this.inner.hasRecord(record_id);
  }

  async latestRecord(site_id: string): Promise<DecisionRecordV1 | null> {
    if (this.failLoad) throw new Error("connection reset");
    return this.inner.latestRecord(site_id);
  }

  async listRecords(site_id: string, limit: number): Promise<DecisionRecordV1[]> {
    return this.inner.listRecords(site_id, limit);
  }

  async close(): Promise<void> {
    return this.inner.close();
  }
}
