import type { DecisionRecordV1, RiskStateV1 } from "@safewave/contracts";

export type CommitOutcome = "committed" | "conflict";

export type CommitDecisionArgs = {
  site_id: string;
  expected_version: number; // 0 = state row must not exist yet
  state: RiskStateV1; // version = expected_version + 1
  record: DecisionRecordV1;
  // Once aborted, the store must not make the write durable: it rolls back and rejects.
  signal?: AbortSignal;
};

/**
 * Persistence boundary of the engine.
 *
 * - loadState resolves null ONLY on confirmed absence; any other failure rejects.
 * - commitDecision writes the state row and appends the record atomically, or
 *   writes nothing and resolves "conflict" when the stored version moved.
 * - hasRecord answers whether a commit carrying that record landed.
 */
export interface RiskStore {
  readonly kind: "sqlite" | "postgres";
  ping(): Promise<void>;
  loadState(site_id: string): Promise<RiskStateV1 | null>;
  commitDecision(args: CommitDecisionArgs): Promise<CommitOutcome>;
  hasRecord(record_id: string): Promise<boolean>;
  latestRecord(site_id: string): Promise<DecisionRecordV1 | null>;
  listRecords(site_id: string, limit: number): Promise<DecisionRecordV1[]>;
  close(): Promise<void>;
}
