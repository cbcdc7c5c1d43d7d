// src/observability/metricsCollector.ts
// Metrics collection hooks
//
// Fastify hooks that collect metrics at request lifecycle points,
// plus periodic gauge updates for stored analysis counts.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import {
  recordHttpRequest,
  updateStoredAnalyses,
  METRICS_ENABLED,
} from "./metrics";
import { createLogger } from "./logger";

const log = createLogger("metrics");

/** Anything that can report stored analyses grouped by verdict */
export interface AnalysisCountSource {
  countByStatus(): Promise<Record<string, number>>;
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.info("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      // Route pattern (with placeholders) when the request matched a route
      const routePattern = req.routeOptions.url ?? req.url;

      recordHttpRequest(req.method, routePattern, reply.statusCode, duration);

      requestStartTimes.delete(req);
    }
  );

  log.info("Metrics collection enabled");
}

/* ---------- Periodic Gauge Updates ---------- */

let gaugeUpdateInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Start periodic updates for the stored-analyses gauge
 */
export function startGaugeUpdates(
  source: AnalysisCountSource,
  intervalMs: number = 60000
): void {
  if (!METRICS_ENABLED) return;

  stopGaugeUpdates();

  const updateGauges = async () => {
    try {
      updateStoredAnalyses(await source.countByStatus());
    } catch (err) {
      log.error({ err }, "Failed to update gauge metrics");
    }
  };

  // Run immediately, then periodically
  void updateGauges();
  gaugeUpdateInterval = setInterval(() => void updateGauges(), intervalMs);
  gaugeUpdateInterval.unref();

  log.info({ intervalMs }, "Started periodic gauge updates");
}

export function stopGaugeUpdates(): void {
  if (gaugeUpdateInterval) {
    clearInterval(gaugeUpdateInterval);
    gaugeUpdateInterval = null;
  }
}
