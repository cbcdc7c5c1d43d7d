// src/routes/metrics.ts
// Prometheus metrics endpoint.
// GET /metrics returns all registered metrics.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { registry } from "../observability/metrics";

/* ---------- Route Registration ---------- */
export default async function metricsRoutes(app: FastifyInstance) {
  app.get("/metrics", async (_req: FastifyRequest, reply: FastifyReply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header("Content-Type", registry.contentType).send(metrics);
    } catch (err) {
      app.log.error({ err }, "Failed to collect metrics");
      return reply.code(500).send({ error: "metrics_unavailable", message: "Failed to collect metrics" });
    }
  });
}
