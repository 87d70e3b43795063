// src/observability/metrics.ts
// Prometheus metrics collection
//
// Defines application metrics using prom-client.
// Metrics are exposed via GET /metrics endpoint.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "hybrid_qa";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "hybrid-qa-backend",
});

// Default Node.js metrics (memory, CPU, event loop, etc.)
if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Capability Metrics ---------- */

/**
 * Language/embedding capability calls, one per attempt
 */
export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Total number of AI capability calls",
  labelNames: ["action", "provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "AI capability call duration in seconds",
  labelNames: ["action", "provider"] as const,
  buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/* ---------- Pipeline Metrics ---------- */

export const pipelineRunsTotal = new Counter({
  name: `${METRICS_PREFIX}_pipeline_runs_total`,
  help: "Completed and failed pipeline runs by query type and outcome",
  labelNames: ["query_type", "outcome"] as const,
  registers: [registry],
});

export const pipelineConfidence = new Histogram({
  name: `${METRICS_PREFIX}_pipeline_confidence`,
  help: "Composite confidence score of completed runs",
  labelNames: ["query_type"] as const,
  buckets: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [registry],
});

/* ---------- Corpus Metrics ---------- */

export const corpusSize = new Gauge({
  name: `${METRICS_PREFIX}_corpus_items_total`,
  help: "Number of stored documents, chunks, entities and relations",
  labelNames: ["kind"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe(
    { method, route: normalizeRoute(route) },
    durationMs / 1000
  );
}

export function recordAiRequest(
  action: string,
  provider: string,
  status: "success" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  aiRequestsTotal.inc({ action, provider, status });
  aiRequestDuration.observe({ action, provider }, durationMs / 1000);
}

/**
 * Record the outcome of one pipeline run.
 * `confidence` is only observed for runs that reached a verdict.
 */
export function recordPipelineRun(
  queryType: string,
  outcome: "accept" | "reject" | "unavailable" | "timeout",
  confidence?: number
): void {
  if (!METRICS_ENABLED) return;

  pipelineRunsTotal.inc({ query_type: queryType, outcome });
  if (confidence !== undefined) {
    pipelineConfidence.observe({ query_type: queryType }, confidence);
  }
}

export function updateCorpusMetrics(counts: {
  documents: number;
  chunks: number;
  entities: number;
  relations: number;
}): void {
  if (!METRICS_ENABLED) return;
  for (const [kind, count] of Object.entries(counts)) {
    corpusSize.set({ kind }, count);
  }
}

/* ---------- Route Normalization ---------- */

/**
 * Normalize route paths to reduce cardinality
 */
function normalizeRoute(route: string): string {
  const path = route.split("?")[0];

  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
    .replace(/\/[a-zA-Z0-9_-]{21}/g, "/:id") // nanoid
    .replace(/\/\d+/g, "/:id");
}

export { METRICS_ENABLED };
