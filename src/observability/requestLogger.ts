// src/observability/requestLogger.ts
// Request/response logging with timing.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { createLogger, createChildLogger, type Logger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  userId?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function buildRequestContext(req: FastifyRequest): RequestContext {
  const userId = req.headers["x-user-id"];

  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    userId: typeof userId === "string" ? userId : undefined,
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

/**
 * Create a request-scoped logger with context
 */
export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

// Store request start times for duration calculation
const requestStartTimes = new WeakMap<FastifyRequest, number>();
const requestLoggers = new WeakMap<FastifyRequest, Logger>();

/**
 * Register request logging hooks with Fastify
 *
 * Logs:
 * - Request start (debug)
 * - Request completion with status code and duration
 * - Request errors with error details
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());

    const log = createRequestLogger(req);
    requestLoggers.set(req, log);

    log.debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(getRequestLogger(req), {
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
      requestLoggers.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}

/* ---------- Request Logger Access ---------- */

/**
 * Get the request-scoped logger for a Fastify request
 * Falls back to base logger if none was attached
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? baseLogger;
}
