import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { HuggingFaceZeroShotClient, parseZeroShotPayload } from '../providers/huggingface';
import { OpenAIZeroShotClient, mapOpenAIError } from '../providers/openai';
import { AnthropicZeroShotClient, mapAnthropicError } from '../providers/anthropic';
import { DevZeroShotClient, devNonCompliantScore } from '../providers/dev';
import { SCORING_SYSTEM_PROMPT, buildScoringPrompt, parseScoreJson } from '../providers/scores';
import { createZeroShotClient } from '../providers';
import { isRetryableStatus } from '../providers/errors';
import { loadConfig } from '../../config';
import { ClassifierPermanentError, ClassifierTransientError } from '../../analysis/errors';

const LABELS = ['compliant', 'non-compliant'];
const request = { text: 'Passage text.', labels: LABELS, hypothesisTemplate: 'This document is {}.' };

/* ============= Hugging Face ============= */

function hfClient(fetchImpl: typeof fetch) {
  return new HuggingFaceZeroShotClient({
    token: 'test-secret',
    baseUrl: 'https://hf.test/models/',
    model: 'facebook/bart-large-mnli',
    maxInputChars: 2048,
    fetch: fetchImpl,
  });
}

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HuggingFaceZeroShotClient', () => {
  it('posts the zero-shot payload and returns labels and scores', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ sequence: 'Passage text.', labels: ['non-compliant', 'compliant'], scores: [0.7, 0.3] })
    );
    const client = hfClient(fetchMock);

    const result = await client.classify(request);

    expect(result).toEqual({ labels: ['non-compliant', 'compliant'], scores: [0.7, 0.3] });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://hf.test/models/facebook/bart-large-mnli');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: 'Passage text.',
      parameters: {
        candidate_labels: LABELS,
        hypothesis_template: 'This document is {}.',
        multi_label: false,
      },
    });
  });

  it('maps 503 to a transient error', async () => {
    const client = hfClient(vi.fn(async () => new Response('loading', { status: 503 })));
    await expect(client.classify(request)).rejects.toBeInstanceOf(ClassifierTransientError);
  });

  it('maps 400 to a permanent error', async () => {
    const client = hfClient(vi.fn(async () => new Response('bad input', { status: 400 })));
    const err = await client.classify(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ClassifierPermanentError);
    expect(err).toMatchObject({ httpStatus: 400, message: 'huggingface responded with HTTP 400: bad input' });
  });

  it('maps network failures to a transient error', async () => {
    const client = hfClient(vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    await expect(client.classify(request)).rejects.toBeInstanceOf(ClassifierTransientError);
  });

  it('flags a non-JSON body as an invalid response', async () => {
    const client = hfClient(vi.fn(async () => new Response('<html>', { status: 200 })));
    const err = await client.classify(request).catch((e: unknown) => e);
    expect(err).toMatchObject({ invalidResponse: true });
  });
});

describe('parseZeroShotPayload', () => {
  it('accepts the list-of-objects shape', () => {
    expect(
      parseZeroShotPayload([
        { label: 'compliant', score: 0.6 },
        { label: 'non-compliant', score: 0.4 },
      ])
    ).toEqual({ labels: ['compliant', 'non-compliant'], scores: [0.6, 0.4] });
  });

  it('rejects anything else', () => {
    expect(() => parseZeroShotPayload({ error: 'oops' })).toThrow(ClassifierPermanentError);
  });
});

/* ============= Chat-model JSON contract ============= */

describe('parseScoreJson', () => {
  it('reads a fenced JSON object and rescales to sum 1', () => {
    const raw = '```json\n{"compliant": 1, "non-compliant": 3}\n```';
    expect(parseScoreJson('openai', raw, LABELS)).toEqual({
      labels: ['non-compliant', 'compliant'],
      scores: [0.75, 0.25],
    });
  });

  it('accepts a nested scores object', () => {
    const raw = '{"scores": {"compliant": 0.5, "non-compliant": 0.5}}';
    expect(parseScoreJson('openai', raw, LABELS).scores).toEqual([0.5, 0.5]);
  });

  it('spreads evenly when every score is zero', () => {
    const raw = '{"compliant": 0, "non-compliant": 0}';
    expect(parseScoreJson('openai', raw, LABELS).scores).toEqual([0.5, 0.5]);
  });

  it('rejects replies without a score for each label', () => {
    expect(() => parseScoreJson('openai', '{"compliant": 0.9}', LABELS)).toThrow(
      'openai returned an invalid response: missing or invalid score for "non-compliant"'
    );
    expect(() => parseScoreJson('openai', 'no json here', LABELS)).toThrow(ClassifierPermanentError);
    expect(() => parseScoreJson('openai', '{not json}', LABELS)).toThrow(ClassifierPermanentError);
  });
});

describe('buildScoringPrompt', () => {
  it('lists the template, labels and passage', () => {
    expect(buildScoringPrompt(request)).toBe(
      'Hypothesis template: This document is {}.\nCandidate labels: ["compliant","non-compliant"]\n\nPassage:\n"""\nPassage text.\n"""'
    );
  });
});

describe('SDK error mapping', () => {
  it('maps OpenAI HTTP errors by status', () => {
    expect(mapOpenAIError(new OpenAI.APIError(429, undefined, 'rate limited', undefined))).toBeInstanceOf(
      ClassifierTransientError
    );
    expect(mapOpenAIError(new OpenAI.APIError(401, undefined, 'bad key', undefined))).toBeInstanceOf(
      ClassifierPermanentError
    );
    expect(mapOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toBeInstanceOf(
      ClassifierTransientError
    );
  });

  it('maps Anthropic HTTP errors by status', () => {
    expect(mapAnthropicError(new Anthropic.APIError(529, undefined, 'overloaded', undefined))).toBeInstanceOf(
      ClassifierTransientError
    );
    expect(mapAnthropicError(new Anthropic.APIError(400, undefined, 'bad request', undefined))).toBeInstanceOf(
      ClassifierPermanentError
    );
  });

  it('passes other errors through', () => {
    const err = new Error('boom');
    expect(mapOpenAIError(err)).toBe(err);
  });

  it('retries only 408, 429 and 5xx', () => {
    expect([408, 429, 500, 503, 400, 401, 404, 422].map(isRetryableStatus)).toEqual([
      true, true, true, true, false, false, false, false,
    ]);
  });
});

describe('OpenAIZeroShotClient', () => {
  it('sends the scoring prompt and normalizes the returned scores', async () => {
    const create = vi.fn(async () => ({
      choices: [{ message: { content: ' {"compliant": 3, "non-compliant": 1} ' } }],
    }));
    const client = new OpenAIZeroShotClient({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      maxInputChars: 2048,
      completions: { create },
    });
    const controller = new AbortController();

    const result = await client.classify({ ...request, signal: controller.signal });

    expect(result).toEqual({ labels: ['compliant', 'non-compliant'], scores: [0.75, 0.25] });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: SCORING_SYSTEM_PROMPT },
          { role: 'user', content: buildScoringPrompt(request) },
        ],
      },
      { signal: controller.signal }
    );
  });

  it('maps SDK failures raised by the endpoint', async () => {
    const client = new OpenAIZeroShotClient({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      maxInputChars: 2048,
      completions: {
        create: async () => {
          throw new OpenAI.APIError(503, undefined, 'unavailable', undefined);
        },
      },
    });

    await expect(client.classify(request)).rejects.toBeInstanceOf(ClassifierTransientError);
  });
});

describe('AnthropicZeroShotClient', () => {
  it('joins text blocks and normalizes the returned scores', async () => {
    const create = vi.fn(async () => ({
      content: [
        { type: 'text', text: '{"compliant": 1, ' },
        { type: 'text', text: '"non-compliant": 3}' },
      ],
    }));
    const client = new AnthropicZeroShotClient({
      apiKey: 'test-secret',
      model: 'claude-3-5-haiku-latest',
      maxInputChars: 2048,
      messages: { create },
    });

    const result = await client.classify(request);

    expect(result).toEqual({ labels: ['non-compliant', 'compliant'], scores: [0.75, 0.25] });
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-haiku-latest',
        max_tokens: 200,
        temperature: 0,
        system: SCORING_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildScoringPrompt(request) }],
      },
      { signal: undefined }
    );
  });

  it('rejects a reply without score JSON as permanent', async () => {
    const client = new AnthropicZeroShotClient({
      apiKey: 'test-secret',
      model: 'claude-3-5-haiku-latest',
      maxInputChars: 2048,
      messages: { create: async () => ({ content: [{ type: 'text', text: 'I cannot score this.' }] }) },
    });

    await expect(client.classify(request)).rejects.toBeInstanceOf(ClassifierPermanentError);
  });
});

/* ============= Dev stub ============= */

describe('DevZeroShotClient', () => {
  const client = new DevZeroShotClient({ compliant: 'compliant', nonCompliant: 'non-compliant' });

  it('scores high and medium risk terms', async () => {
    const result = await client.classify({
      ...request,
      text: 'This contract has a penalty for breach of policy.',
    });
    expect(result).toEqual({ labels: ['non-compliant', 'compliant'], scores: [0.85, 0.15] });
  });

  it('leans compliant on neutral text', async () => {
    const result = await client.classify({ ...request, text: 'Quarterly picnic schedule.' });
    expect(result).toEqual({ labels: ['compliant', 'non-compliant'], scores: [0.85, 0.15] });
  });

  it('caps the non-compliant score', () => {
    expect(devNonCompliantScore('violation breach illegal penalty')).toBe(0.95);
  });
});

/* ============= Factory ============= */

describe('createZeroShotClient', () => {
  it('builds the dev stub by default', () => {
    const client = createZeroShotClient(loadConfig({}));
    expect(client.provider).toBe('dev');
  });

  it('builds the Hugging Face client with the configured model', () => {
    const client = createZeroShotClient(loadConfig({ AI_PROVIDER: 'huggingface', HF_API_TOKEN: 'test-secret' }));
    expect(client.provider).toBe('huggingface');
    expect(client.model).toBe('facebook/bart-large-mnli');
    expect(client.maxInputChars).toBe(2048);
  });

  it('refuses to build a hosted client without credentials', () => {
    expect(() => createZeroShotClient(loadConfig({ AI_PROVIDER: 'openai' }))).toThrow(
      'OPENAI_API_KEY is not set. Set it in your environment to use the openai provider.'
    );
  });
});
