// src/ai/providers/scores.ts
// Shared JSON contract for the chat-model providers: the model is asked for a
// JSON object mapping every candidate label to a probability.

import type { ZeroShotRequest, ZeroShotResponse } from '../types';
import { invalidResponse } from './errors';

export const SCORING_SYSTEM_PROMPT =
  'You are a zero-shot text classifier. For each candidate label, estimate the probability ' +
  'that the hypothesis (the template with the label substituted for {}) is true of the passage. ' +
  'Reply with a single JSON object whose keys are exactly the candidate labels and whose values ' +
  'are numbers between 0 and 1. Do not add any other text.';

export function buildScoringPrompt(req: Pick<ZeroShotRequest, 'text' | 'labels' | 'hypothesisTemplate'>): string {
  return [
    `Hypothesis template: ${req.hypothesisTemplate}`,
    `Candidate labels: ${JSON.stringify(req.labels)}`,
    '',
    'Passage:',
    '"""',
    req.text,
    '"""',
  ].join('\n');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Parse the model's reply into a ZeroShotResponse, highest score first.
 * Accepts `{label: p}` or `{"scores": {label: p}}`, tolerates text around the object,
 * and rescales the probabilities to sum to 1.
 */
export function parseScoreJson(provider: string, raw: string, labels: string[]): ZeroShotResponse {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) throw invalidResponse(provider, 'no JSON object in reply');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch (err) {
    throw invalidResponse(provider, err instanceof Error ? err.message : 'malformed JSON');
  }

  const map = isRecord(parsed) && isRecord(parsed.scores) ? parsed.scores : parsed;
  if (!isRecord(map)) throw invalidResponse(provider, 'reply is not a JSON object');

  const values = labels.map((label) => {
    const v = map[label];
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) {
      throw invalidResponse(provider, `missing or invalid score for "${label}"`);
    }
    return v;
  });

  const total = values.reduce((a, b) => a + b, 0);
  const scores = total > 0 ? values.map((v) => v / total) : values.map(() => 1 / labels.length);

  const ranked = labels
    .map((label, i) => ({ label, score: scores[i] }))
    .sort((a, b) => b.score - a.score);
  return { labels: ranked.map((r) => r.label), scores: ranked.map((r) => r.score) };
}
