// src/ai/providers/huggingface.ts
// Hugging Face Inference API zero-shot-classification endpoint (NLI models such as bart-large-mnli).

import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from '../types';
import { ClassifierTransientError } from '../../analysis/errors';
import { httpFailure, invalidResponse } from './errors';

export interface HuggingFaceOptions {
  token: string;
  baseUrl: string;
  model: string;
  maxInputChars: number;
  fetch?: typeof fetch;
}

const PROVIDER = 'huggingface';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'number');
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

/**
 * The endpoint answers either `{ sequence, labels, scores }` or a list of
 * `{ label, score }` objects, depending on the serving backend.
 */
export function parseZeroShotPayload(payload: unknown): ZeroShotResponse {
  if (isRecord(payload) && isStringArray(payload.labels) && isNumberArray(payload.scores)) {
    return { labels: payload.labels, scores: payload.scores };
  }

  if (Array.isArray(payload)) {
    const labels: string[] = [];
    const scores: number[] = [];
    for (const item of payload) {
      if (!isRecord(item) || typeof item.label !== 'string' || typeof item.score !== 'number') {
        throw invalidResponse(PROVIDER, 'unexpected list entry');
      }
      labels.push(item.label);
      scores.push(item.score);
    }
    return { labels, scores };
  }

  throw invalidResponse(PROVIDER, 'unexpected payload shape');
}

export class HuggingFaceZeroShotClient implements ZeroShotClient {
  readonly provider = PROVIDER;
  readonly model: string;
  readonly maxInputChars: number;
  private readonly url: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HuggingFaceOptions) {
    this.model = opts.model;
    this.maxInputChars = opts.maxInputChars;
    this.url = `${opts.baseUrl.replace(/\/+$/, '')}/${opts.model}`;
    this.token = opts.token;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async classify(req: ZeroShotRequest): Promise<ZeroShotResponse> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          inputs: req.text,
          parameters: {
            candidate_labels: req.labels,
            hypothesis_template: req.hypothesisTemplate,
            multi_label: false,
          },
        }),
        signal: req.signal,
      });
    } catch (err) {
      if (req.signal?.aborted) throw err;
      throw new ClassifierTransientError(
        `${PROVIDER} request failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!res.ok) {
      const detail = (await res.text().catch(() => '')).slice(0, 200);
      throw httpFailure(PROVIDER, res.status, detail);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw invalidResponse(PROVIDER, 'body is not JSON');
    }
    return parseZeroShotPayload(payload);
  }
}
