import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { decideRisk } from "../kernel";
import type { PriorRiskV1 } from "../kernel";
import { CALM, EXTREME, JANUARY, makeConfig } from "./fixtures";

const cfg = makeConfig();
const FRESH: PriorRiskV1 = { high_count: 0, status: "SAFE" };

describe("decideRisk", () => {
  it("a single extreme reading on fresh state is WARNING, not HIGH_RISK", () => {
    const d = decideRisk(EXTREME, FRESH, cfg, JANUARY.now());
    assert.equal(d.high_count, 1);
    assert.equal(d.status, "WARNING");
    assert.equal(d.reason, "HIGH_UNCONFIRMED");
    assert.equal(d.previous_status, "SAFE");
  });

  it("reaches HIGH_RISK exactly on the confirmation-th identical reading", () => {
    let prior = FRESH;
    const statuses: string[] = [];
    const counts: number[] = [];
    for (let i = 0; i < 7; i++) {
      const d = decideRisk(EXTREME, prior, cfg, JANUARY.now());
      statuses.push(d.status);
      counts.push(d.high_count);
      prior = { high_count: d.high_count, status: d.status };
    }
    assert.deepEqual(counts, [1, 2, 3, 4, 5, 6, 7]);
    assert.deepEqual(statuses, ["WARNING", "WARNING", "WARNING", "WARNING", "WARNING", "HIGH_RISK", "HIGH_RISK"]);
  });

  it("cool water is SAFE for pathological secondary readings", () => {
    const d = decideRisk({ ph: 14, temp: 10, tds: 100000, turb: 10000, flow: 0 }, { high_count: 10, status: "HIGH_RISK" }, cfg, JANUARY.now());
    assert.equal(d.status, "SAFE");
    assert.equal(d.reason, "COOL_WATER");
    assert.equal(d.previous_status, "HIGH_RISK");
    // bio_score 4 still counts as risk-positive evidence.
    assert.equal(d.high_count, 11);
  });

  it("one risky then one safe reading returns the counter to zero", () => {
    const first = decideRisk(EXTREME, FRESH, cfg, JANUARY.now());
    const second = decideRisk(CALM, { high_count: first.high_count, status: first.status }, cfg, JANUARY.now());
    assert.equal(first.high_count, 1);
    assert.equal(second.high_count, 0);
    assert.equal(second.status, "SAFE");
  });

  it("all-safe readings converge to zero and stay there", () => {
    let prior: PriorRiskV1 = { high_count: 5, status: "WARNING" };
    const counts: number[] = [];
    for (let i = 0; i < 6; i++) {
      const d = decideRisk(CALM, prior, cfg, JANUARY.now());
      counts.push(d.high_count);
      prior = { high_count: d.high_count, status: d.status };
    }
    assert.deepEqual(counts, [3, 1, 0, 0, 0, 0]);
  });

  it("de-escalates from HIGH_RISK as soon as secondary evidence drops", () => {
    const d = decideRisk({ ...EXTREME, tds: 100, flow: 1, ph: 7 }, { high_count: 8, status: "HIGH_RISK" }, cfg, JANUARY.now());
    // bio = 3 + 1.5 = 4.5 -> increment; other = 1 < 1.5
    assert.equal(d.high_count, 9);
    assert.equal(d.status, "WARNING");
    assert.equal(d.reason, "HIGH_SECONDARY_LOW");
  });
});

describe("decideRisk with the hard_reset strategy", () => {
  const hard = makeConfig((c) => {
    c.hysteresis.strategy = "hard_reset";
  });
  const noDominant = { ph: 8, temp: 30, tds: 300, turb: 10, flow: 0 };

  it("short-circuits to SAFE with high_count 0 when dominant flags are absent", () => {
    const d = decideRisk(noDominant, { high_count: 5, status: "WARNING" }, hard, JANUARY.now());
    assert.equal(d.status, "SAFE");
    assert.equal(d.high_count, 0);
    assert.equal(d.reason, "HARD_SAFE_OVERRIDE");
  });

  it("the same reading decays gradually under the decay strategy", () => {
    const d = decideRisk(noDominant, { high_count: 5, status: "WARNING" }, cfg, JANUARY.now());
    assert.equal(d.high_count, 3);
    assert.equal(d.status, "WARNING");
    assert.equal(d.reason, "MODERATE_SECONDARY_HIGH");
  });

  it("falls through to normal scoring when a dominant flag is present", () => {
    const d = decideRisk({ ph: 7, temp: 30, tds: 100, turb: 60, flow: 1 }, { high_count: 3, status: "SAFE" }, hard, JANUARY.now());
    assert.equal(d.high_count, 1);
    assert.equal(d.status, "SAFE");
    assert.equal(d.reason, "MODERATE_SECONDARY_LOW");
  });
});
