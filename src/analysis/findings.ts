// src/analysis/findings.ts
// Key findings: risk-tier keyword lookup over the document text.

import riskKeywords from "./data/riskKeywords.json";
import type { KeyFinding, RiskLevel } from "./types";
import { findTerm } from "./textMatch";

export const MAX_FINDINGS = 10;
export const CONTEXT_CHARS = 50;

const TIERS: ReadonlyArray<[RiskLevel, readonly string[]]> = [
  ["high", riskKeywords.high],
  ["medium", riskKeywords.medium],
  ["low", riskKeywords.low],
];

/** Up to `contextChars` characters either side of the match, "..." marking cut ends */
export function extractContext(
  text: string,
  position: number,
  length: number,
  contextChars: number = CONTEXT_CHARS
): string {
  const start = Math.max(0, position - contextChars);
  const end = Math.min(text.length, position + length + contextChars);
  let context = text.slice(start, end).replace(/\s+/g, " ");
  if (start > 0) context = `...${context}`;
  if (end < text.length) context = `${context}...`;
  return context;
}

/**
 * High-risk terms first, then medium, then low; one finding per term that occurs.
 */
export function extractKeyFindings(text: string, limit: number = MAX_FINDINGS): KeyFinding[] {
  const findings: KeyFinding[] = [];

  for (const [riskLevel, keywords] of TIERS) {
    for (const keyword of keywords) {
      if (findings.length >= limit) return findings;
      const position = findTerm(text, keyword);
      if (position === -1) continue;
      findings.push({
        finding: `Contains reference to '${keyword}'`,
        keyword,
        riskLevel,
        context: extractContext(text, position, keyword.length),
      });
    }
  }

  return findings;
}
