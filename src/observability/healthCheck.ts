// src/observability/healthCheck.ts
// Health checks for service dependencies.
// Supports Kubernetes-style readiness and liveness probes.

import type { DbAdapter } from "../db/types";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  classifier: {
    provider: string;
    model: string;
  };
  checks: {
    database: HealthCheckResult;
  };
}

export interface HealthDependencies {
  db: DbAdapter;
  classifier: { provider: string; model: string };
}

/* ---------- Configuration ---------- */

const HEALTH_CHECK_TIMEOUT = Number(process.env.HEALTH_CHECK_TIMEOUT) || 5000;
const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Health Checks ---------- */

async function checkDatabase(db: DbAdapter): Promise<HealthCheckResult> {
  const start = Date.now();

  try {
    const result = await db.queryOne<{ ok: number }>("SELECT 1 as ok");

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
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/* ---------- Timeout Wrapper ---------- */

async function withFallback<T>(
  promise: Promise<T>,
  timeoutMs: number,
  fallback: T
): Promise<T> {
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

export async function getHealthStatus(deps: HealthDependencies): Promise<HealthStatus> {
  const database = await withFallback(
    checkDatabase(deps.db),
    HEALTH_CHECK_TIMEOUT,
    { status: "down" as const, error: "Timeout" }
  );

  return {
    status: database.status === "up" ? "healthy" : "unhealthy",
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    classifier: { provider: deps.classifier.provider, model: deps.classifier.model },
    checks: { database },
  };
}

/* ---------- Kubernetes Probes ---------- */

/**
 * Readiness probe - the database must answer
 */
export async function isReady(deps: HealthDependencies): Promise<boolean> {
  const health = await getHealthStatus(deps);
  return health.status === "healthy";
}

/**
 * Liveness probe - the process is serving requests
 */
export async function isAlive(): Promise<boolean> {
  return true;
}
