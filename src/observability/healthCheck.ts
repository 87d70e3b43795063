// src/observability/healthCheck.ts
// Health checks: database reachability plus corpus statistics.

import type { AppServices } from "../services";
import { errorMessage } from "../knowledge/errors";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface CorpusCounts {
  documents: number;
  chunks: number;
  entities: number;
  relations: number;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
  };
  corpus: CorpusCounts | null;
  providers: { language: string; embedding: string };
}

/* ---------- Configuration ---------- */

const HEALTH_CHECK_TIMEOUT = Number(process.env.HEALTH_CHECK_TIMEOUT) || 5000;
const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Health Checks ---------- */

async function checkDatabase(services: AppServices): Promise<HealthCheckResult> {
  const start = Date.now();

  try {
    const result = await services.db.queryOne<{ ok: number }>("SELECT 1 AS ok");

    if (result?.ok === 1) {
      return { status: "up", latency: Date.now() - start };
    }

    return {
      status: "down",
      latency: Date.now() - start,
      error: "Unexpected query result",
    };
  } catch (err) {
    log.error({ err }, "Database health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: errorMessage(err),
    };
  }
}

/** Documents, chunks, entities and relations currently stored */
export async function getCorpusCounts(services: AppServices): Promise<CorpusCounts> {
  const [documents, chunks, graph] = await Promise.all([
    services.documents.count(),
    services.vectorIndex.count(),
    services.graphStore.stats(),
  ]);
  return { documents, chunks, entities: graph.entities, relations: graph.relations };
}

/* ---------- Timeout Wrapper ---------- */

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, fallback: T): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<T>((resolve) => {
    timeoutId = setTimeout(() => resolve(fallback), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/* ---------- Combined Health Check ---------- */

export async function getHealthStatus(services: AppServices): Promise<HealthStatus> {
  const database = await withTimeout<HealthCheckResult>(
    checkDatabase(services),
    HEALTH_CHECK_TIMEOUT,
    { status: "down", error: "Timeout" }
  );

  let corpus: CorpusCounts | null = null;
  if (database.status === "up") {
    try {
      corpus = await getCorpusCounts(services);
    } catch (err) {
      log.warn({ err }, "Corpus statistics unavailable");
    }
  }

  let status: HealthStatus["status"];
  if (database.status === "down") {
    status = "unhealthy";
  } else if (!corpus) {
    status = "degraded";
  } else {
    status = "healthy";
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { database },
    corpus,
    providers: services.providers,
  };
}

/* ---------- Kubernetes Probes ---------- */

/**
 * Readiness probe - is the service ready to accept traffic?
 */
export async function isReady(services: AppServices): Promise<boolean> {
  const health = await getHealthStatus(services);
  return health.status === "healthy";
}

/**
 * Liveness probe - is the service alive (even if degraded)?
 */
export async function isAlive(services: AppServices): Promise<boolean> {
  const health = await getHealthStatus(services);
  return health.status !== "unhealthy";
}
