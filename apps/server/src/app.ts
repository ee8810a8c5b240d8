import Fastify from "fastify";
import type { FastifyError, FastifyInstance } from "fastify";

import { registerHealthRoutes } from "./routes/health";
import { registerRiskConfigRoutes } from "./routes/risk_config";
import { registerRiskRoutes } from "./routes/risk";
import { RiskRuntime } from "./runtime/risk_runtime";
import type { RiskRuntimeOptions } from "./runtime/risk_runtime";

export type BuildAppOptions = Omit<RiskRuntimeOptions, "log"> & {
  logger?: boolean;
};

const BODY_PARSE_CODES = new Set(["FST_ERR_CTP_EMPTY_JSON_BODY", "FST_ERR_CTP_INVALID_JSON_BODY"]);

// The JSON content-type parser fails with a FastifyError code or a SyntaxError tagged 400.
function isBodyParseError(err: FastifyError): boolean {
  if (BODY_PARSE_CODES.has(err.code)) return true;
  return err instanceof SyntaxError && err.statusCode === 400;
}

export function buildApp(opts: BuildAppOptions): { app: FastifyInstance; runtime: RiskRuntime } {
  const { logger = true, ...runtimeOpts } = opts;
  const app = Fastify({ logger });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  // Bodies the JSON parser rejects get the 422 schema-failure shape.
  app.setErrorHandler(async (err, _req, reply) => {
    if (isBodyParseError(err)) {
      return reply.code(422).send({ ok: false, errors: [{ path: "", code: "invalid_json", message: err.message }] });
    }
    throw err;
  });

  const runtime = new RiskRuntime({ ...runtimeOpts, log: app.log });

  registerHealthRoutes(app);
  registerRiskRoutes(app, runtime);
  registerRiskConfigRoutes(app, runtime);

  app.addHook("onClose", async () => {
    await runtimeOpts.store.close();
  });

  return { app, runtime };
}
