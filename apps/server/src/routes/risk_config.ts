// GET /config: active risk profile, its SSOT fingerprint and the effective thresholds.
// Read-only; thresholds change only by editing config/risk/<profile>.json and restarting.

import type { FastifyInstance } from "fastify";

import type { RiskRuntime } from "../runtime/risk_runtime";

export function registerRiskConfigRoutes(app: FastifyInstance, runtime: RiskRuntime): void {
  app.get("/config", async (_req, reply) => {
    const { profile, config_hash, config } = runtime.configInfo;
    return reply.send({ profile, config_hash, config });
  });
}
