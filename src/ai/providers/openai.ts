// src/ai/providers/openai.ts
// Zero-shot scoring through OpenAI Chat Completions in JSON mode.
import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from '../types';
import { ClassifierTransientError } from '../../analysis/errors';
import { httpFailure } from './errors';
import { SCORING_SYSTEM_PROMPT, buildScoringPrompt, parseScoreJson } from './scores';

/** The slice of `openai.chat.completions` this client calls */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export interface OpenAIZeroShotOptions {
  apiKey: string;
  model: string;
  maxInputChars: number;
  /** Replaces the SDK's chat completions endpoint (tests) */
  completions?: ChatCompletionsApi;
}

const PROVIDER = 'openai';

export class OpenAIZeroShotClient implements ZeroShotClient {
  readonly provider = PROVIDER;
  readonly model: string;
  readonly maxInputChars: number;
  private readonly completions: ChatCompletionsApi;

  constructor(opts: OpenAIZeroShotOptions) {
    this.model = opts.model;
    this.maxInputChars = opts.maxInputChars;
    // Retries and timeouts belong to the classify() wrapper
    this.completions =
      opts.completions ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 }).chat.completions;
  }

  async classify(req: ZeroShotRequest): Promise<ZeroShotResponse> {
    let text: string;
    try {
      const resp = await this.completions.create(
        {
          model: this.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: SCORING_SYSTEM_PROMPT },
            { role: 'user', content: buildScoringPrompt(req) },
          ],
        },
        { signal: req.signal }
      );
      text = (resp.choices[0]?.message?.content ?? '').trim();
    } catch (err) {
      throw mapOpenAIError(err);
    }
    return parseScoreJson(PROVIDER, text, req.labels);
  }
}

/** HTTP errors by status; connection failures are transient */
export function mapOpenAIError(err: unknown): unknown {
  if (err instanceof OpenAI.APIError) {
    if (typeof err.status === 'number') return httpFailure(PROVIDER, err.status, err.message);
    return new ClassifierTransientError(`${PROVIDER} request failed: ${err.message}`);
  }
  return err;
}
