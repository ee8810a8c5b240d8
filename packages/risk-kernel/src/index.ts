// @safewave/risk-kernel
// Entry point exports for the risk escalation engine.

export * from "./clock";
export * from "./kernel";
export * from "./rules/evaluator";
export * from "./hysteresis/counter";
export * from "./status/state_machine";
export * from "./record/assembler";
export * from "./replay";
