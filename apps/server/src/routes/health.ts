import type { FastifyInstance } from "fastify";

// GET /health: liveness only. Consults no store, classifier or engine state.
export function registerHealthRoutes(app: FastifyInstance): void {
  app.get("/health", async (_req, reply) => {
    return reply.send({ status: "ok" });
  });
}
