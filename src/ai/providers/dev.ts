// src/ai/providers/dev.ts
// Deterministic offline stub: scores risk keywords so local runs and tests
// never reach a hosted model.

import riskKeywords from '../../analysis/data/riskKeywords.json';
import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from '../types';
import type { ComplianceLabels } from '../../analysis/types';
import { containsTerm } from '../../analysis/textMatch';

const BASE_SCORE = 0.15;
const HIGH_WEIGHT = 0.3;
const MEDIUM_WEIGHT = 0.1;
const MAX_SCORE = 0.95;

/** Non-compliant probability from the distinct high/medium risk terms present */
export function devNonCompliantScore(text: string): number {
  const high = riskKeywords.high.filter((k) => containsTerm(text, k)).length;
  const medium = riskKeywords.medium.filter((k) => containsTerm(text, k)).length;
  const score = BASE_SCORE + HIGH_WEIGHT * high + MEDIUM_WEIGHT * medium;
  return Math.round(Math.min(MAX_SCORE, score) * 100) / 100;
}

export class DevZeroShotClient implements ZeroShotClient {
  readonly provider = 'dev';
  readonly model = 'dev-keyword-stub-1';
  readonly maxInputChars: number;

  constructor(private readonly labels: ComplianceLabels, maxInputChars = 8000) {
    this.maxInputChars = maxInputChars;
  }

  async classify(req: ZeroShotRequest): Promise<ZeroShotResponse> {
    const nonCompliant = devNonCompliantScore(req.text);
    const scoreFor = (label: string): number => {
      if (label === this.labels.nonCompliant) return nonCompliant;
      if (label === this.labels.compliant) return Math.round((1 - nonCompliant) * 100) / 100;
      return 0;
    };

    const ranked = req.labels
      .map((label) => ({ label, score: scoreFor(label) }))
      .sort((a, b) => b.score - a.score);
    return { labels: ranked.map((r) => r.label), scores: ranked.map((r) => r.score) };
  }
}
