import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";

import { RiskStateV1Z, parseDecisionRecordV1 } from "@safewave/contracts";
import type { DecisionRecordV1, RiskStateV1 } from "@safewave/contracts";

import type { CommitDecisionArgs, CommitOutcome, RiskStore } from "./risk_store";

export type RiskSqliteStoreConfig = {
  filePath: string; // ":memory:" for an in-process database
};

const RecordRowZ = z.object({ record_json: z.string() });

export class SqliteRiskStore implements RiskStore {
  readonly kind = "sqlite" as const;
  private db: Database.Database;

  constructor(cfg: RiskSqliteStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // risk_state: one row per site (mutable, CAS on version)
    // risk_readings: append-only decision log
    this.db.exec(`
      create table if not exists risk_state (
        site_id text primary key,
        high_count integer not null check (high_count >= 0),
        status text not null,
        updated_at text not null,
        version integer not null
      );

      create table if not exists risk_readings (
        seq integer primary key autoincrement,
        record_id text not null unique,
        site_id text not null,
        created_at text not null,
        record_json text not null
      );

      create index if not exists idx_readings_site_created on risk_readings(site_id, created_at);
    `);
  }

  async ping(): Promise<void> {
    this.db.prepare("select 1 as ok").get();
  }

  async loadState(site_id: string): Promise<RiskStateV1 | null> {
    const row: unknown = this.db
      .prepare(`select site_id, high_count, status, updated_at, version from risk_state where site_id = ?`)
      .get(site_id);
    if (row === undefined) return null;
    return RiskStateV1Z.parse(row);
  }

  async commitDecision(args: CommitDecisionArgs): Promise<CommitOutcome> {
    const { state, record } = args;
    // The transaction runs synchronously, so an abort can only take effect before it starts.
    args.signal?.throwIfAborted();

    const tx = this.db.transaction((): CommitOutcome => {
      const changes =
        args.expected_version === 0
          ? this.db
              .prepare(
                `insert into risk_state (site_id, high_count, status, updated_at, version)
                 values (?, ?, ?, ?, ?)
                 on conflict (site_id) do nothing`
              )
              .run(args.site_id, state.high_count, state.status, state.updated_at, state.version).changes
          : this.db
              .prepare(
                `update risk_state set high_count = ?, status = ?, updated_at = ?, version = ?
                 where site_id = ? and version = ?`
              )
              .run(state.high_count, state.status, state.updated_at, state.version, args.site_id, args.expected_version)
              .changes;

      if (changes === 0) return "conflict";

      this.db
        .prepare(`insert into risk_readings (record_id, site_id, created_at, record_json) values (?, ?, ?, ?)`)
        .run(record.record_id, record.site_id, record.timestamp, JSON.stringify(record));
      return "committed";
    });

    return tx();
  }

  async hasRecord(record_id: string): Promise<boolean> {
    return this.db.prepare(`select 1 as ok from risk_readings where record_id = ?`).get(record_id) !== undefined;
  }

  async latestRecord(site_id: string): Promise<DecisionRecordV1 | null> {
    const rows = await this.listRecords(site_id, 1);
    return rows[0] ?? null;
  }

  async listRecords(site_id: string, limit: number): Promise<DecisionRecordV1[]> {
    const rows: unknown[] = this.db
      .prepare(`select record_json from risk_readings where site_id = ? order by created_at desc, seq desc limit ?`)
      .all(site_id, limit);
    return rows.map((r) => parseDecisionRecordV1(JSON.parse(RecordRowZ.parse(r).record_json)));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
