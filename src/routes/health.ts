// src/routes/health.ts
// Health check endpoints with Kubernetes probe support.
// - GET /health - Full health status with dependency checks
// - GET /health/ready - readiness probe
// - GET /health/live - liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  getHealthStatus,
  isAlive,
  isReady,
  type HealthDependencies,
} from "../observability/healthCheck";

/* ---------- Route Registration ---------- */
export function createHealthRoutes(deps: HealthDependencies) {
  return async function healthRoutes(app: FastifyInstance) {
    /**
     * GET /health
     * Returns health status including dependency checks
     */
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus(deps);
      return reply.code(health.status === "healthy" ? 200 : 503).send(health);
    });

    app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await isReady(deps);
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get("/health/live", async (_req: FastifyRequest, reply: FastifyReply) => {
      const alive = await isAlive();
      return reply.code(alive ? 200 : 503).send({ alive });
    });
  };
}
