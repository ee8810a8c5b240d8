import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { DecisionRecordV1Z } from "@safewave/contracts";

import { assembleDecisionRecord, riskPercent } from "../record/assembler";
import type { RiskDecisionV1 } from "../kernel";
import { CALM } from "./fixtures";

describe("riskPercent", () => {
  it("rounds and clamps to 0..100", () => {
    assert.equal(riskPercent(7, 7), 100);
    assert.equal(riskPercent(7.5, 7), 100);
    assert.equal(riskPercent(3, 7), 43);
    assert.equal(riskPercent(1.5, 7), 21);
    assert.equal(riskPercent(-1, 7), 0);
  });

  it("maps non-finite ratios to zero", () => {
    assert.equal(riskPercent(1, 0), 0);
    assert.equal(riskPercent(0, 0), 0);
  });
});

describe("assembleDecisionRecord", () => {
  const decision: RiskDecisionV1 = {
    evaluation: {
      flags: ["turb_risk"],
      temp_zone: "moderate",
      bio_score: 1 / 3,
      other_score: 2 / 3,
      seasonal_bonus: 0,
    },
    high_count: 2,
    previous_status: "SAFE",
    status: "WARNING",
    reason: "MODERATE_SECONDARY_HIGH",
  };

  const record = assembleDecisionRecord({
    record_id: "rec_1",
    site_id: "site-a",
    reading: CALM,
    advisory: { label: "UNKNOWN", fallback: true },
    decision,
    max_score: 7,
    config_hash: "sha256:test",
    timestamp: "2026-01-15T12:00:00.000Z",
  });

  it("packages reading, advisory and decision into one record", () => {
    assert.equal(record.ph, 7);
    assert.equal(record.temp, 20);
    assert.equal(record.advisory_label, "UNKNOWN");
    assert.equal(record.advisory_fallback, true);
    assert.equal(record.high_count, 2);
    assert.equal(record.previous_status, "SAFE");
    assert.equal(record.status, "WARNING");
    assert.equal(record.status_reason, "MODERATE_SECONDARY_HIGH");
    assert.deepEqual(record.flags, ["turb_risk"]);
  });

  it("rounds scores to two decimals and derives risk_percent from the raw score", () => {
    assert.equal(record.bio_score, 0.33);
    assert.equal(record.other_score, 0.67);
    assert.equal(record.risk_percent, 5);
  });

  it("produces a frozen record that satisfies the contract", () => {
    assert.ok(Object.isFrozen(record));
    assert.ok(Object.isFrozen(record.flags));
    assert.equal(DecisionRecordV1Z.safeParse(record).success, true);
  });
});
