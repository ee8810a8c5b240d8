import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { ZodIssue } from "zod";

import { SensorReadingInputV1Z, SiteIdZ, toSensorReading } from "@safewave/contracts";

import type { RiskRuntime } from "../runtime/risk_runtime";
import { DecisionNotPersisted, StateStoreUnavailable } from "../runtime/errors";

const SiteQueryZ = z.object({ site_id: SiteIdZ.optional() }).strict();

const ListQueryZ = z
  .object({
    site_id: SiteIdZ.optional(),
    limit: z.coerce.number().int().optional(),
  })
  .strict();

type FieldError = { path: string; code: string; message: string };

function fieldErrors(issues: ZodIssue[]): FieldError[] {
  return issues.map((i) => ({ path: i.path.join("."), code: i.code, message: i.message }));
}

function clampLimit(v: number | undefined): number {
  if (v === undefined) return 50;
  return Math.max(1, Math.min(v, 500));
}

// Maps engine failures to 503; anything else goes to Fastify's default 500 handler.
function sendEngineError(reply: FastifyReply, e: unknown): FastifyReply {
  if (e instanceof DecisionNotPersisted) {
    return reply.code(e.status).send({ ok: false, error: e.code, durable: false, decision: e.decision });
  }
  if (e instanceof StateStoreUnavailable) {
    return reply.code(e.status).send({ ok: false, error: e.code });
  }
  throw e;
}

/**
 * Risk endpoints.
 *
 * - POST /predict   reading -> DecisionRecord (422 on schema failure, never reaches the engine)
 * - GET  /latest    newest DecisionRecord or { error: "No data available" }
 * - GET  /readings  newest-first DecisionRecords (limit 1..500, default 50)
 * - GET  /state     current RiskState (fresh default when none is stored)
 */
export function registerRiskRoutes(app: FastifyInstance, runtime: RiskRuntime): void {
  app.post("/predict", async (req, reply) => {
    const parsed = SensorReadingInputV1Z.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(422).send({ ok: false, errors: fieldErrors(parsed.error.issues) });
    }

    const site_id = parsed.data.site_id ?? runtime.defaultSiteId;
    try {
      const record = await runtime.predict(toSensorReading(parsed.data), site_id);
      return reply.send(record);
    } catch (e) {
      return sendEngineError(reply, e);
    }
  });

  app.get("/latest", async (req, reply) => {
    const q = SiteQueryZ.safeParse(req.query ?? {});
    if (!q.success) return reply.code(422).send({ ok: false, errors: fieldErrors(q.error.issues) });

    try {
      const record = await runtime.latest(q.data.site_id ?? runtime.defaultSiteId);
      if (!record) return reply.send({ error: "No data available" });
      return reply.send(record);
    } catch (e) {
      return sendEngineError(reply, e);
    }
  });

  app.get("/readings", async (req, reply) => {
    const q = ListQueryZ.safeParse(req.query ?? {});
    if (!q.success) return reply.code(422).send({ ok: false, errors: fieldErrors(q.error.issues) });

    try {
      const site_id = q.data.site_id ?? runtime.defaultSiteId;
      const readings = await runtime.list(site_id, clampLimit(q.data.limit));
      return reply.send({ site_id, readings });
    } catch (e) {
      return sendEngineError(reply, e);
    }
  });

  app.get("/state", async (req, reply) => {
    const q = SiteQueryZ.safeParse(req.query ?? {});
    if (!q.success) return reply.code(422).send({ ok: false, errors: fieldErrors(q.error.issues) });

    try {
      return reply.send(await runtime.state(q.data.site_id ?? runtime.defaultSiteId));
    } catch (e) {
      return sendEngineError(reply, e);
    }
  });
}
