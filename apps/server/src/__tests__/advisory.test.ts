import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import Fastify from "fastify";

import { HttpAdvisoryClassifier, UnconfiguredClassifier, classifyAdvisory } from "../classifier/advisory";
import { CALM, FailingClassifier, FixedClassifier, silentLog } from "./helpers";

describe("classifyAdvisory", () => {
  const log = silentLog();

  it("passes through the classifier label exactly once", async () => {
    const c = new FixedClassifier("HIGH_RISK");
    assert.deepEqual(await classifyAdvisory(c, CALM, log), { label: "HIGH_RISK", fallback: false });
    assert.equal(c.calls, 1);
  });

  it("substitutes UNKNOWN when the classifier fails", async () => {
    const c = new FailingClassifier();
    assert.deepEqual(await classifyAdvisory(c, CALM, log), { label: "UNKNOWN", fallback: true });
    assert.equal(c.calls, 1);
  });

  it("substitutes UNKNOWN for an empty label", async () => {
    assert.deepEqual(await classifyAdvisory(new FixedClassifier(""), CALM, log), { label: "UNKNOWN", fallback: true });
  });

  it("substitutes UNKNOWN when no classifier is configured", async () => {
    assert.deepEqual(await classifyAdvisory(new UnconfiguredClassifier(), CALM, log), {
      label: "UNKNOWN",
      fallback: true,
    });
  });
});

describe("HttpAdvisoryClassifier", () => {
  // In-process stand-in for the model service.
  const model = Fastify({ logger: false });
  const received: unknown[] = [];
  let baseUrl = "";

  before(async () => {
    model.post("/classify", async (req) => {
      received.push(req.body);
      return { label: "SAFE" };
    });
    model.post("/broken", async (_req, reply) => reply.code(500).send({ error: "boom" }));
    model.post("/malformed", async () => ({ verdict: "SAFE" }));
    baseUrl = await model.listen({ port: 0, host: "127.0.0.1" });
  });

  after(async () => {
    await model.close();
  });

  it("posts the reading and returns the label", async () => {
    const c = new HttpAdvisoryClassifier({ url: `${baseUrl}/classify`, timeoutMs: 2000 });
    assert.equal(await c.classify(CALM), "SAFE");
    assert.deepEqual(received[received.length - 1], CALM);
  });

  it("rejects on a non-2xx response", async () => {
    const c = new HttpAdvisoryClassifier({ url: `${baseUrl}/broken`, timeoutMs: 2000 });
    await assert.rejects(c.classify(CALM), /classifier responded 500/);
  });

  it("rejects on a response without a label", async () => {
    const c = new HttpAdvisoryClassifier({ url: `${baseUrl}/malformed`, timeoutMs: 2000 });
    await assert.rejects(c.classify(CALM));
  });
});
