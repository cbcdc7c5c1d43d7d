// src/analysis/classifier.ts
// Classifier invocation wrapper
//
// Wraps one ZeroShotClient call per section with a per-attempt timeout,
// exponential backoff with jitter on transient failures, a wall-clock budget
// across attempts, input truncation and cancellation. classify() resolves to an
// error result instead of throwing, so every section reaches the aggregator.

import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from "../ai/types";
import type {
  ClassificationErrorCode,
  ClassificationFailure,
  ClassificationResult,
} from "./types";
import {
  AnalysisCancelledError,
  ClassifierPermanentError,
  ClassifierTimeoutError,
  ClassifierTransientError,
} from "./errors";
import { recordClassifierCall } from "../observability/metrics";
import { createLogger } from "../observability/logger";

const log = createLogger("classifier");

/* ============= Options ============= */

export const DEFAULT_HYPOTHESIS_TEMPLATE = "This document is {}.";

export interface RetryPolicy {
  /** Per-attempt timeout */
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Budget across all attempts and backoff sleeps */
  maxElapsedMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: 30_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  maxElapsedMs: 90_000,
};

export interface ClassifyOptions extends Partial<RetryPolicy> {
  client: ZeroShotClient;
  hypothesisTemplate?: string;
  signal?: AbortSignal;
  /** Backoff sleep; must reject when `signal` aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Jitter source in [0, 1) */
  random?: () => number;
  now?: () => number;
}

/* ============= Helpers ============= */

/** Abortable sleep */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AnalysisCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AnalysisCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Exponential backoff for the given 1-based attempt, capped at maxDelayMs,
 * with ±25% jitter.
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = exponential * 0.25 * (2 * random() - 1);
  return Math.max(0, Math.round(exponential + jitter));
}

/**
 * Trim, drop blanks and duplicates. Returns an error message when nothing usable remains.
 */
export function normalizeLabels(candidateLabels: Iterable<string>): string[] | string {
  const labels: string[] = [];
  for (const raw of candidateLabels) {
    const label = raw.trim();
    if (!label) return "Candidate labels must be non-blank strings";
    if (!labels.includes(label)) labels.push(label);
  }
  return labels.length > 0 ? labels : "At least one candidate label is required";
}

/**
 * Map a provider response to label → score, requiring a finite score in [0,1]
 * for every candidate label. Labels the provider adds on its own are ignored.
 */
export function toScoreMap(response: ZeroShotResponse, labels: string[]): Record<string, number> {
  if (
    !Array.isArray(response.labels) ||
    !Array.isArray(response.scores) ||
    response.labels.length !== response.scores.length
  ) {
    throw new ClassifierPermanentError("Classifier response is not a label/score list", {
      invalidResponse: true,
    });
  }

  const byLabel = new Map<string, number>();
  response.labels.forEach((label, i) => byLabel.set(String(label).trim(), response.scores[i]));

  const scores: Record<string, number> = {};
  for (const label of labels) {
    const score = byLabel.get(label);
    if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 1) {
      throw new ClassifierPermanentError(`Classifier response has no valid score for "${label}"`, {
        invalidResponse: true,
      });
    }
    scores[label] = score;
  }
  return scores;
}

/** Highest score wins; ties go to the earlier candidate label */
export function topLabel(scores: Record<string, number>, labels: string[]): string {
  let best = labels[0];
  for (const label of labels) {
    if (scores[label] > scores[best]) best = label;
  }
  return best;
}

async function callWithTimeout(
  client: ZeroShotClient,
  request: Omit<ZeroShotRequest, "signal">,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<ZeroShotResponse> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    // Reject before aborting so the race settles with our error, not the client's
    timer = setTimeout(() => {
      reject(new ClassifierTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);

    if (outer) {
      onAbort = () => {
        reject(new AnalysisCancelledError());
        controller.abort();
      };
      outer.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([client.classify({ ...request, signal: controller.signal }), guard]);
  } finally {
    clearTimeout(timer);
    if (outer && onAbort) outer.removeEventListener("abort", onAbort);
  }
}

interface AttemptFailure {
  code: ClassificationErrorCode;
  retryable: boolean;
  reason: string;
}

function describeFailure(err: unknown, signal?: AbortSignal): AttemptFailure {
  if (err instanceof AnalysisCancelledError || signal?.aborted) {
    return { code: "cancelled", retryable: false, reason: "Analysis was cancelled" };
  }
  if (err instanceof ClassifierTimeoutError) {
    return { code: "timeout", retryable: true, reason: err.message };
  }
  if (err instanceof ClassifierTransientError) {
    return { code: "transient", retryable: true, reason: err.message };
  }
  if (err instanceof ClassifierPermanentError) {
    return {
      code: err.invalidResponse ? "invalid_response" : "permanent",
      retryable: false,
      reason: err.message,
    };
  }
  // Anything else a provider throws is treated as a network-level failure
  const message = err instanceof Error ? err.message : String(err);
  return { code: "transient", retryable: true, reason: message };
}

function metricOutcome(
  code: ClassificationErrorCode
): "timeout" | "transient" | "permanent" | "cancelled" {
  switch (code) {
    case "timeout":
    case "transient":
    case "cancelled":
      return code;
    default:
      return "permanent";
  }
}

function failure(
  code: ClassificationErrorCode,
  reason: string,
  attempts: number,
  truncated: boolean
): ClassificationFailure {
  return { status: "error", label: "error", confidence: 0, reason, errorCode: code, truncated, attempts };
}

/* ============= classify ============= */

/**
 * Classify one section against the candidate labels.
 * Never throws; every failure path resolves to an error result.
 */
export async function classify(
  sectionText: string,
  candidateLabels: Iterable<string>,
  options: ClassifyOptions
): Promise<ClassificationResult> {
  const { client, signal } = options;
  const policy: RetryPolicy = {
    timeoutMs: options.timeoutMs ?? DEFAULT_RETRY_POLICY.timeoutMs,
    maxAttempts: Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    maxElapsedMs: options.maxElapsedMs ?? DEFAULT_RETRY_POLICY.maxElapsedMs,
  };
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const now = options.now ?? Date.now;

  const labels = normalizeLabels(candidateLabels);
  if (typeof labels === "string") return failure("permanent", labels, 0, false);

  if (!sectionText.trim()) {
    return failure("empty_section", "Section contains no text", 0, false);
  }

  const truncated = sectionText.length > client.maxInputChars;
  const text = truncated ? sectionText.slice(0, client.maxInputChars) : sectionText;
  const request = {
    text,
    labels,
    hypothesisTemplate: options.hypothesisTemplate ?? DEFAULT_HYPOTHESIS_TEMPLATE,
  };

  const startedAt = now();
  let last: AttemptFailure = { code: "transient", retryable: true, reason: "No attempt made" };
  let attempts = 0;

  while (attempts < policy.maxAttempts) {
    if (signal?.aborted) return failure("cancelled", "Analysis was cancelled", attempts, truncated);

    const remaining = policy.maxElapsedMs - (now() - startedAt);
    if (remaining <= 0) break;

    attempts += 1;
    const attemptStart = Date.now();
    try {
      const response = await callWithTimeout(
        client,
        request,
        Math.min(policy.timeoutMs, remaining),
        signal
      );
      const scores = toScoreMap(response, labels);
      const label = topLabel(scores, labels);
      recordClassifierCall(client.provider, "success", Date.now() - attemptStart);

      return {
        status: "success",
        label,
        confidence: scores[label],
        scores,
        truncated,
        attempts,
        provider: client.provider,
        model: client.model,
      };
    } catch (err) {
      last = describeFailure(err, signal);
      recordClassifierCall(client.provider, metricOutcome(last.code), Date.now() - attemptStart);

      if (!last.retryable) return failure(last.code, last.reason, attempts, truncated);
      if (attempts >= policy.maxAttempts) break;

      const delay = backoffDelay(attempts, policy, random);
      if (now() - startedAt + delay >= policy.maxElapsedMs) {
        last = { ...last, reason: `${last.reason} (retry budget of ${policy.maxElapsedMs}ms exhausted)` };
        break;
      }

      log.warn(
        { provider: client.provider, attempt: attempts, delayMs: delay, code: last.code },
        "classifier attempt failed, retrying"
      );

      try {
        await wait(delay, signal);
      } catch (sleepErr) {
        log.debug({ err: sleepErr }, "backoff interrupted");
        return failure("cancelled", "Analysis was cancelled", attempts, truncated);
      }
    }
  }

  return failure(
    last.code,
    attempts > 1 ? `${last.reason} after ${attempts} attempts` : last.reason,
    attempts,
    truncated
  );
}
