// src/ai/types.ts
// Zero-shot classification client contract.
//
// The model is an opaque oracle: it receives a text and candidate labels and
// answers with one score per label. Providers live under ./providers.

export interface ZeroShotRequest {
  text: string;
  labels: string[];
  /** Entailment hypothesis with `{}` standing for the label, e.g. "This document is {}." */
  hypothesisTemplate: string;
  signal?: AbortSignal;
}

/** Parallel arrays, highest score first (providers may return any order) */
export interface ZeroShotResponse {
  labels: string[];
  scores: number[];
}

export interface ZeroShotClient {
  readonly provider: string;
  readonly model: string;
  /** Longest text the provider accepts; longer sections are truncated before the call */
  readonly maxInputChars: number;
  classify(request: ZeroShotRequest): Promise<ZeroShotResponse>;
}
