// src/observability/metrics.ts
// Prometheus metrics collection
//
// Defines application metrics using prom-client.
// Metrics are exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "compliance";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "compliance-analyzer",
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
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

/* ---------- Classifier Metrics ---------- */

/**
 * Zero-shot classifier calls, one per attempt
 */
export const classifierCallsTotal = new Counter({
  name: `${METRICS_PREFIX}_classifier_calls_total`,
  help: "Total number of zero-shot classifier calls (per attempt)",
  labelNames: ["provider", "outcome"] as const,
  registers: [registry],
});

export const classifierCallDuration = new Histogram({
  name: `${METRICS_PREFIX}_classifier_call_duration_seconds`,
  help: "Zero-shot classifier call duration in seconds",
  labelNames: ["provider"] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
  registers: [registry],
});

/* ---------- Analysis Metrics ---------- */

export const analysesTotal = new Counter({
  name: `${METRICS_PREFIX}_analyses_total`,
  help: "Total number of completed document analyses by verdict",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const sectionsClassifiedTotal = new Counter({
  name: `${METRICS_PREFIX}_sections_classified_total`,
  help: "Total number of classified sections by result",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const storedAnalyses = new Gauge({
  name: `${METRICS_PREFIX}_stored_analyses`,
  help: "Number of stored analyses by verdict",
  labelNames: ["status"] as const,
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

/**
 * Record one classifier attempt
 */
export function recordClassifierCall(
  provider: string,
  outcome: "success" | "timeout" | "transient" | "permanent" | "cancelled",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  classifierCallsTotal.inc({ provider, outcome });
  classifierCallDuration.observe({ provider }, durationMs / 1000);
}

export function recordAnalysis(
  status: string,
  sections: { succeeded: number; failed: number }
): void {
  if (!METRICS_ENABLED) return;

  analysesTotal.inc({ status });
  sectionsClassifiedTotal.inc({ status: "success" }, sections.succeeded);
  sectionsClassifiedTotal.inc({ status: "error" }, sections.failed);
}

/**
 * Replace stored-analysis gauges with a status → count map.
 * Statuses missing from the map (all deleted) drop out of the gauge.
 */
export function updateStoredAnalyses(counts: Record<string, number>): void {
  if (!METRICS_ENABLED) return;
  storedAnalyses.reset();
  for (const [status, count] of Object.entries(counts)) {
    storedAnalyses.set({ status }, count);
  }
}

/* ---------- Route Normalization ---------- */

/**
 * Replace dynamic path segments with placeholders to keep cardinality low
 */
export function normalizeRoute(route: string): string {
  const path = route.split("?")[0];

  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
    .replace(/\/[a-zA-Z0-9_-]{21}(?=\/|$)/g, "/:id") // nanoid
    .replace(/\/\d+(?=\/|$)/g, "/:id");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };
