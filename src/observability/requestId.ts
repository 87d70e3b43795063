// src/observability/requestId.ts
// Request ID generation
//
// Generates unique request IDs for correlation across logs.
// Supports distributed tracing via X-Request-ID header passthrough.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default

/* ---------- Request ID Generation ---------- */

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Extract request ID from incoming message headers or generate a new one
 */
export function getOrCreateRequestId(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (typeof incomingId === "string" && incomingId.length > 0) {
    return incomingId;
  }

  return generateRequestId();
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Echo the request ID back as X-Request-ID on every response
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}

/**
 * Custom request ID generator for Fastify configuration
 * Use this in Fastify({ genReqId: requestIdGenerator })
 *
 * Note: genReqId receives IncomingMessage, not FastifyRequest
 */
export function requestIdGenerator(req: IncomingMessage): string {
  return getOrCreateRequestId(req);
}
