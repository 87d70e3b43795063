// src/observability/metricsCollector.ts
// Fastify hooks that collect HTTP metrics, plus periodic corpus gauge updates.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { recordHttpRequest, updateCorpusMetrics, METRICS_ENABLED } from "./metrics";
import type { CorpusCounts } from "./healthCheck";
import { createLogger } from "./logger";

const log = createLogger("metrics");

/* ---------- Request Timing ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/* ---------- Fastify Hook Registration ---------- */

export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.info("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    // Route pattern (with placeholders) when the request matched a route
    const routePattern = req.routeOptions.url ?? req.url;

    recordHttpRequest(req.method, routePattern, reply.statusCode, duration);
    requestStartTimes.delete(req);
  });

  log.info("Metrics collection enabled");
}

/* ---------- Periodic Gauge Updates ---------- */

let gaugeUpdateInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Refresh corpus gauges now and every `intervalMs`.
 * The timer is unref'd so it never keeps the process alive.
 */
export function startGaugeUpdates(
  readCounts: () => Promise<CorpusCounts>,
  intervalMs: number = 60000
): void {
  if (!METRICS_ENABLED) return;

  stopGaugeUpdates();

  const updateGauges = () => {
    readCounts()
      .then(updateCorpusMetrics)
      .catch((err: unknown) => log.error({ err }, "Failed to update gauge metrics"));
  };

  updateGauges();
  gaugeUpdateInterval = setInterval(updateGauges, intervalMs);
  gaugeUpdateInterval.unref();

  log.info({ intervalMs }, "Started periodic gauge updates");
}

export function stopGaugeUpdates(): void {
  if (gaugeUpdateInterval) {
    clearInterval(gaugeUpdateInterval);
    gaugeUpdateInterval = null;
  }
}
