// src/observability/index.ts
// Central export point for all observability functionality.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  getOrCreateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId";

/* ---------- Request Logger ---------- */
export {
  createRequestLogger,
  registerRequestLogger,
  getRequestLogger,
} from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordAiRequest,
  recordPipelineRun,
  updateCorpusMetrics,
  METRICS_ENABLED,
} from "./metrics";

export {
  registerMetricsCollector,
  startGaugeUpdates,
  stopGaugeUpdates,
} from "./metricsCollector";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  getCorpusCounts,
  isReady,
  isAlive,
  type HealthStatus,
  type HealthCheckResult,
  type CorpusCounts,
} from "./healthCheck";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import type { AppServices } from "../services";
import { getCorpusCounts } from "./healthCheck";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector, startGaugeUpdates, stopGaugeUpdates } from "./metricsCollector";

/**
 * Register all observability hooks with Fastify.
 * Gauge updates stop when the app closes.
 */
export function registerObservability(app: FastifyInstance, services: AppServices): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
  startGaugeUpdates(() => getCorpusCounts(services));
  app.addHook("onClose", async () => stopGaugeUpdates());
}
