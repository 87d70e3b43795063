// src/routes/health.ts
// Health check endpoints with Kubernetes probe support.
// - GET /health - Full health status with database check and corpus statistics
// - GET /health/ready - Readiness probe
// - GET /health/live - Liveness probe

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { AppServices } from "../services";
import { getHealthStatus, isReady, isAlive } from "../observability/healthCheck";

/* ---------- Route Registration ---------- */
export function createHealthRoutes(services: AppServices) {
  return async function healthRoutes(app: FastifyInstance) {
    /**
     * GET /health
     * 503 only when the database is unreachable
     */
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus(services);
      const statusCode = health.status === "unhealthy" ? 503 : 200;
      return reply.code(statusCode).send(health);
    });

    app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await isReady(services);
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get("/health/live", async (_req: FastifyRequest, reply: FastifyReply) => {
      const alive = await isAlive(services);
      return reply.code(alive ? 200 : 503).send({ alive });
    });
  };
}
