// Advisory classifier adapter.
//
// The external model's label is recorded on every DecisionRecord but is never an
// input to status derivation. Any classifier failure degrades to the fallback label.

import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";

import { ADVISORY_FALLBACK_LABEL, AdvisoryLabelZ } from "@safewave/contracts";
import type { SensorReadingV1 } from "@safewave/contracts";
import type { AdvisoryResultV1 } from "@safewave/risk-kernel";

import type { ServerEnv } from "../env";

export interface AdvisoryClassifier {
  classify(reading: SensorReadingV1): Promise<string>;
}

const ClassifierResponseZ = z.object({ label: AdvisoryLabelZ });

/**
 * POSTs the reading to an external model service and expects `{ label }` back.
 */
export class HttpAdvisoryClassifier implements AdvisoryClassifier {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(cfg: { url: string; timeoutMs: number }) {
    this.url = cfg.url;
    this.timeoutMs = cfg.timeoutMs;
  }

  async classify(reading: SensorReadingV1): Promise<string> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(reading),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) throw new Error(`classifier responded ${res.status}`);
    const body: unknown = await res.json();
    return ClassifierResponseZ.parse(body).label;
  }
}

// Used when no CLASSIFIER_URL is configured.
export class UnconfiguredClassifier implements AdvisoryClassifier {
  async classify(): Promise<string> {
    throw new Error("classifier not configured");
  }
}

export async function classifyAdvisory(
  classifier: AdvisoryClassifier,
  reading: SensorReadingV1,
  log: FastifyBaseLogger
): Promise<AdvisoryResultV1> {
  try {
    const label = AdvisoryLabelZ.parse(await classifier.classify(reading));
    return { label, fallback: false };
  } catch (err) {
    log.warn({ err }, "advisory classifier unavailable; substituting %s", ADVISORY_FALLBACK_LABEL);
    return { label: ADVISORY_FALLBACK_LABEL, fallback: true };
  }
}

export function makeClassifierFromEnv(env: Pick<ServerEnv, "CLASSIFIER_URL" | "CLASSIFIER_TIMEOUT_MS">): AdvisoryClassifier {
  if (!env.CLASSIFIER_URL) return new UnconfiguredClassifier();
  return new HttpAdvisoryClassifier({ url: env.CLASSIFIER_URL, timeoutMs: env.CLASSIFIER_TIMEOUT_MS });
}
