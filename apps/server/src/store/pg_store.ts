import { Pool } from "pg";
import { z } from "zod";

import { RiskStateV1Z, parseDecisionRecordV1 } from "@safewave/contracts";
import type { DecisionRecordV1, RiskStateV1 } from "@safewave/contracts";

import type { CommitDecisionArgs, CommitOutcome, RiskStore } from "./risk_store";

// pg returns timestamptz as Date and bigint as string; normalize before the contract parse.
const StateRowZ = z.object({
  site_id: z.string(),
  high_count: z.coerce.number(),
  status: z.string(),
  updated_at: z.union([z.date(), z.string()]).transform((v) => (v instanceof Date ? v.toISOString() : v)),
  version: z.coerce.number(),
});

const RecordRowZ = z.object({
  record_json: z.union([z.string(), z.record(z.unknown())]),
});

function parseRecordRow(row: unknown): DecisionRecordV1 {
  const { record_json } = RecordRowZ.parse(row);
  return parseDecisionRecordV1(typeof record_json === "string" ? JSON.parse(record_json) : record_json);
}

export type PgRiskStoreConfig = {
  databaseUrl: string;
  // Server- and client-side bound on every statement; a timed-out transaction is rolled back.
  statementTimeoutMs: number;
};

export class PgRiskStore implements RiskStore {
  readonly kind = "postgres" as const;
  private pool: Pool;

  constructor(cfg: PgRiskStoreConfig) {
    this.pool = new Pool({
      connectionString: cfg.databaseUrl,
      statement_timeout: cfg.statementTimeoutMs,
      query_timeout: cfg.statementTimeoutMs,
      idle_in_transaction_session_timeout: cfg.statementTimeoutMs,
    });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r?.rows?.length) throw new Error("pg ping failed");
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      create table if not exists risk_state (
        site_id text primary key,
        high_count integer not null check (high_count >= 0),
        status text not null,
        updated_at timestamptz not null,
        version bigint not null
      );

      create table if not exists risk_readings (
        seq bigserial primary key,
        record_id text not null unique,
        site_id text not null,
        created_at timestamptz not null,
        record_json text not null
      );

      create index if not exists idx_readings_site_created on risk_readings(site_id, created_at);
    `);
  }

  async loadState(site_id: string): Promise<RiskStateV1 | null> {
    const r = await this.pool.query(
      `select site_id, high_count, status, updated_at, version from risk_state where site_id = $1 limit 1`,
      [site_id]
    );
    if (!r.rows.length) return null;
    return RiskStateV1Z.parse(StateRowZ.parse(r.rows[0]));
  }

  async commitDecision(args: CommitDecisionArgs): Promise<CommitOutcome> {
    const { state, record, signal } = args;
    signal?.throwIfAborted();
    const client = await this.pool.connect();
    try {
      await client.query("begin");

      const r =
        args.expected_version === 0
          ? await client.query(
              `insert into risk_state (site_id, high_count, status, updated_at, version)
               values ($1, $2, $3, $4::timestamptz, $5)
               on conflict (site_id) do nothing`,
              [args.site_id, state.high_count, state.status, state.updated_at, state.version]
            )
          : await client.query(
              `update risk_state set high_count = $2, status = $3, updated_at = $4::timestamptz, version = $5
               where site_id = $1 and version = $6`,
              [args.site_id, state.high_count, state.status, state.updated_at, state.version, args.expected_version]
            );

      if (!r.rowCount) {
        await client.query("rollback");
        return "conflict";
      }

      await client.query(
        `insert into risk_readings (record_id, site_id, created_at, record_json) values ($1, $2, $3::timestamptz, $4)`,
        [record.record_id, record.site_id, record.timestamp, JSON.stringify(record)]
      );
      // Last point at which the caller's abort turns into a rollback.
      signal?.throwIfAborted();
      await client.query("commit");
      return "committed";
    } catch (err) {
      await client.query("rollback").catch(() => undefined);
      throw err;
    } finally {
      client.release();
    }
  }

  async hasRecord(record_id: string): Promise<boolean> {
    const r = await this.pool.query(`select 1 as ok from risk_readings where record_id = $1 limit 1`, [record_id]);
    return r.rows.length > 0;
  }

  async latestRecord(site_id: string): Promise<DecisionRecordV1 | null> {
    const rows = await this.listRecords(site_id, 1);
    return rows[0] ?? null;
  }

  async listRecords(site_id: string, limit: number): Promise<DecisionRecordV1[]> {
    const r = await this.pool.query(
      `select record_json from risk_readings where site_id = $1 order by created_at desc, seq desc limit $2`,
      [site_id, limit]
    );
    return r.rows.map(parseRecordRow);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
