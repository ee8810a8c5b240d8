import type { DecisionRecordV1 } from "@safewave/contracts";

/**
 * The state store could not confirm the prior state (error or timeout).
 * Never treated as "no state".
 */
export class StateStoreUnavailable extends Error {
  public readonly status = 503;
  public readonly code = "STATE_STORE_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateStoreUnavailable";
  }
}

/**
 * A decision was computed but not durably persisted. Carries the decision for
 * visibility; callers must present it as not durable.
 */
export class DecisionNotPersisted extends Error {
  public readonly status = 503;
  public readonly code = "STATE_PERSIST_FAILED";
  public readonly decision: DecisionRecordV1;

  constructor(message: string, decision: DecisionRecordV1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecisionNotPersisted";
    this.decision = decision;
  }
}
