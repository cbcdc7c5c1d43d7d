// src/observability/logger.ts
// Pino loggers for the analyzer. One root logger per process; modules take a
// child bound to their name. Provider credentials never reach the output.

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/** Paths censored in every log line (request headers and classifier client options) */
export const REDACTED_PATHS = [
  "req.headers.authorization",
  "headers.authorization",
  "apiKey",
  "token",
  "*.apiKey",
  "*.token",
];

type Env = Record<string, string | undefined>;

/** LOG_LEVEL, case-insensitive; unknown values fall back to info */
export function getLogLevel(env: Env = process.env): LogLevel {
  const wanted = env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? "info";
}

export function buildLoggerOptions(env: Env = process.env): LoggerOptions {
  const options: LoggerOptions = {
    level: getLogLevel(env),
    base: {
      service: "compliance-analyzer",
      env: env.NODE_ENV ?? "development",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };

  if (env.LOG_PRETTY !== "true") return options;
  return {
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:HH:MM:ss.l", ignore: "pid,hostname,service,env" },
    },
  };
}

let root: Logger | undefined;

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger("store/analyses");
 * log.warn({ id }, "analysis not found");
 */
export function createLogger(moduleName: string, bindings: Record<string, unknown> = {}): Logger {
  if (!root) root = pino(buildLoggerOptions());
  return root.child({ module: moduleName, ...bindings });
}
