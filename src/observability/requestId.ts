// src/observability/requestId.ts
// Request ID generation for log correlation.
// Accepts an upstream X-Request-ID header, otherwise generates one.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default
const MAX_INCOMING_ID_LENGTH = 128;

/* ---------- Request ID Generation ---------- */

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Extract request ID from incoming message headers or generate a new one
 */
export function getOrCreateRequestIdFromMessage(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (
    typeof incomingId === "string" &&
    incomingId.length > 0 &&
    incomingId.length <= MAX_INCOMING_ID_LENGTH
  ) {
    return incomingId;
  }

  return generateRequestId();
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Echo the request ID on every response for client correlation
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}

/**
 * Custom request ID generator for Fastify configuration.
 * Use this in Fastify({ genReqId: requestIdGenerator })
 *
 * Note: genReqId receives IncomingMessage, not FastifyRequest
 */
export function requestIdGenerator(req: IncomingMessage): string {
  return getOrCreateRequestIdFromMessage(req);
}
