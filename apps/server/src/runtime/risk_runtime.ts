import type { FastifyBaseLogger } from "fastify";

import { compareSeverity, initialRiskState } from "@safewave/contracts";
import type { DecisionRecordV1, RiskStateV1, SensorReadingV1 } from "@safewave/contracts";
import { assembleDecisionRecord, decideRisk, systemClock } from "@safewave/risk-kernel";
import type { AdvisoryResultV1, Clock } from "@safewave/risk-kernel";

import { classifyAdvisory } from "../classifier/advisory";
import type { AdvisoryClassifier } from "../classifier/advisory";
import type { LoadedRiskConfig } from "../config/risk_config";
import type { CommitDecisionArgs, CommitOutcome, RiskStore } from "../store";
import { TimeoutError, newId, withTimeout } from "../util";
import { DecisionNotPersisted, StateStoreUnavailable } from "./errors";
import { SiteLock } from "./site_lock";

export type RiskRuntimeOptions = {
  store: RiskStore;
  classifier: AdvisoryClassifier;
  config: LoadedRiskConfig;
  log: FastifyBaseLogger;
  clock?: Clock;
  storeTimeoutMs?: number;
  casMaxAttempts?: number;
};

/**
 * Orchestrates one decision per reading:
 * classify -> [site lock] load -> decide -> conditional commit (retry on version conflict).
 *
 * The lock serializes writers inside this process; the versioned commit protects
 * against writers in other processes sharing the same store.
 */
export class RiskRuntime {
  private readonly store: RiskStore;
  private readonly classifier: AdvisoryClassifier;
  private readonly loaded: LoadedRiskConfig;
  private readonly log: FastifyBaseLogger;
  private readonly clock: Clock;
  private readonly storeTimeoutMs: number;
  private readonly casMaxAttempts: number;
  private readonly lock = new SiteLock();

  constructor(opts: RiskRuntimeOptions) {
    this.store = opts.store;
    this.classifier = opts.classifier;
    this.loaded = opts.config;
    this.log = opts.log;
    this.clock = opts.clock ?? systemClock;
    this.storeTimeoutMs = opts.storeTimeoutMs ?? 2000;
    this.casMaxAttempts = Math.max(1, opts.casMaxAttempts ?? 5);
  }

  get defaultSiteId(): string {
    return this.loaded.config.site_id;
  }

  get configInfo(): LoadedRiskConfig {
    return this.loaded;
  }

  async predict(reading: SensorReadingV1, site_id = this.defaultSiteId): Promise<DecisionRecordV1> {
    // Classification does not depend on state, so it runs before the lock is taken.
    const advisory = await classifyAdvisory(this.classifier, reading, this.log);
    return this.lock.run(site_id, () => this.decideAndCommit(reading, site_id, advisory));
  }

  async state(site_id = this.defaultSiteId): Promise<RiskStateV1> {
    return (await this.loadState(site_id)) ?? initialRiskState(site_id, this.clock.now().toISOString());
  }

  async latest(site_id = this.defaultSiteId): Promise<DecisionRecordV1 | null> {
    return this.read("latest record", () => this.store.latestRecord(site_id));
  }

  async list(site_id: string, limit: number): Promise<DecisionRecordV1[]> {
    return this.read("record list", () => this.store.listRecords(site_id, limit));
  }

  private async decideAndCommit(
    reading: SensorReadingV1,
    site_id: string,
    advisory: AdvisoryResultV1
  ): Promise<DecisionRecordV1> {
    const { config, config_hash } = this.loaded;

    for (let attempt = 1; ; attempt++) {
      const now = this.clock.now();
      const timestamp = now.toISOString();
      const prior = (await this.loadState(site_id)) ?? initialRiskState(site_id, timestamp);

      const decision = decideRisk(reading, prior, config, now);
      const record = assembleDecisionRecord({
        record_id: newId("rec"),
        site_id,
        reading,
        advisory,
        decision,
        max_score: config.normalization.max_score,
        config_hash,
        timestamp,
      });
      const next: RiskStateV1 = {
        site_id,
        high_count: decision.high_count,
        status: decision.status,
        updated_at: timestamp,
        version: prior.version + 1,
      };

      let outcome: CommitOutcome;
      try {
        outcome = await this.commitBounded({ site_id, expected_version: prior.version, state: next, record });
      } catch (err) {
        this.log.error({ err, site_id, record_id: record.record_id }, "risk decision not persisted");
        throw new DecisionNotPersisted("risk state write failed", record, { cause: err });
      }

      if (outcome === "committed") {
        this.logTransition(record);
        return record;
      }

      this.log.warn({ site_id, attempt, expected_version: prior.version }, "risk state version moved; retrying");
      if (attempt >= this.casMaxAttempts) {
        throw new DecisionNotPersisted(`risk state commit conflicted ${attempt} times`, record);
      }
    }
  }

  /**
   * Commits within the store timeout. On timeout the write is aborted and given one more
   * timeout window to settle; a commit that finished anyway counts as committed. If it is
   * still unsettled or rejected, the outcome is read back from the store by record_id.
   */
  private async commitBounded(args: Omit<CommitDecisionArgs, "signal">): Promise<CommitOutcome> {
    const abort = new AbortController();
    const pending = this.store.commitDecision({ ...args, signal: abort.signal });

    try {
      return await withTimeout(pending, this.storeTimeoutMs, "risk state commit");
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      abort.abort(err);
      this.log.warn({ site_id: args.site_id, record_id: args.record.record_id }, "risk state commit timed out; aborting");
    }

    try {
      return await withTimeout(pending, this.storeTimeoutMs, "aborted risk state commit");
    } catch (err) {
      const landed = await withTimeout(
        this.store.hasRecord(args.record.record_id),
        this.storeTimeoutMs,
        "risk record lookup"
      );
      if (landed) {
        this.log.warn({ site_id: args.site_id, record_id: args.record.record_id }, "aborted commit had already landed");
        return "committed";
      }
      throw err;
    }
  }

  private logTransition(record: DecisionRecordV1): void {
    const dir = compareSeverity(record.status, record.previous_status);
    if (dir === 0) return;
    this.log.info(
      {
        site_id: record.site_id,
        from: record.previous_status,
        to: record.status,
        reason: record.status_reason,
        high_count: record.high_count,
      },
      dir > 0 ? "risk status escalated" : "risk status de-escalated"
    );
  }

  private async loadState(site_id: string): Promise<RiskStateV1 | null> {
    return this.read("risk state load", () => this.store.loadState(site_id));
  }

  private async read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.storeTimeoutMs, label);
    } catch (err) {
      this.log.error({ err }, "%s failed", label);
      throw new StateStoreUnavailable(`${label} failed`, { cause: err });
    }
  }
}
