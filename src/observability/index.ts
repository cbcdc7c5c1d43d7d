// src/observability/index.ts
// Central export point for logging, request IDs, metrics and health checks.

/* ---------- Logger ---------- */
export { createLogger, getLogLevel, buildLoggerOptions, REDACTED_PATHS, type LogLevel } from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
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
  recordClassifierCall,
  recordAnalysis,
  updateStoredAnalyses,
  METRICS_ENABLED,
} from "./metrics";

export {
  registerMetricsCollector,
  startGaugeUpdates,
  stopGaugeUpdates,
  type AnalysisCountSource,
} from "./metricsCollector";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  isReady,
  isAlive,
  type HealthStatus,
  type HealthCheckResult,
  type HealthDependencies,
} from "./healthCheck";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/**
 * Register all observability hooks with Fastify.
 * Call this right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
