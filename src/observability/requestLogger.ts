// src/observability/requestLogger.ts
// Request/response logging with timing.
// Captures the request ID and the analysed document ID when the route has one.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  documentId?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function extractDocumentId(req: FastifyRequest): string | undefined {
  const params = req.params;
  if (params && typeof params === "object" && "id" in params) {
    return typeof params.id === "string" ? params.id : undefined;
  }
  return undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    documentId: extractDocumentId(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

export function createRequestLogger(req: FastifyRequest): Logger {
  return baseLogger.child(buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

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

      const log = baseLogger.child({
        ...buildRequestContext(req),
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
    const log = createRequestLogger(req);

    log.error(
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
 * Get the request-scoped logger. Falls back to the base HTTP logger.
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? baseLogger;
}
