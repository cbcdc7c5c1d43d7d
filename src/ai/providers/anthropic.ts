// src/ai/providers/anthropic.ts
// Zero-shot scoring through the Anthropic Messages API (same JSON contract as OpenAI).
import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from '../types';
import { ClassifierTransientError } from '../../analysis/errors';
import { httpFailure } from './errors';
import { SCORING_SYSTEM_PROMPT, buildScoringPrompt, parseScoreJson } from './scores';

/** The slice of `anthropic.messages` this client calls */
export interface MessagesApi {
  create(
    body: MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<{ content: Array<{ type: string; text?: string }> }>;
}

export interface AnthropicZeroShotOptions {
  apiKey: string;
  model: string;
  maxInputChars: number;
  messages?: MessagesApi;
}

const PROVIDER = 'anthropic';
const MAX_TOKENS = 200;

export class AnthropicZeroShotClient implements ZeroShotClient {
  readonly provider = PROVIDER;
  readonly model: string;
  readonly maxInputChars: number;
  private readonly messages: MessagesApi;

  constructor(opts: AnthropicZeroShotOptions) {
    this.model = opts.model;
    this.maxInputChars = opts.maxInputChars;
    this.messages = opts.messages ?? new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 }).messages;
  }

  async classify(req: ZeroShotRequest): Promise<ZeroShotResponse> {
    let text = '';
    try {
      const resp = await this.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: 0,
          system: SCORING_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildScoringPrompt(req) }],
        },
        { signal: req.signal }
      );
      for (const block of resp.content) {
        if (block.type === 'text' && block.text !== undefined) text += block.text;
      }
    } catch (err) {
      throw mapAnthropicError(err);
    }
    return parseScoreJson(PROVIDER, text, req.labels);
  }
}

export function mapAnthropicError(err: unknown): unknown {
  if (err instanceof Anthropic.APIError) {
    if (typeof err.status === 'number') return httpFailure(PROVIDER, err.status, err.message);
    return new ClassifierTransientError(`${PROVIDER} request failed: ${err.message}`);
  }
  return err;
}
