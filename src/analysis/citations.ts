// src/analysis/citations.ts
// Regulatory citations
//
// Scores each catalogue entry against the document text:
//   keyword phrase   +0.5
//   category term    +0.3 each (underscores read as spaces)
//   full title       +0.4
// capped at 1.0; entries under the threshold are dropped.

import regulatorySources from "./data/regulatorySources.json";
import type { Citation } from "./types";
import { containsTerm } from "./textMatch";

export interface RegulatorySource {
  keyword: string;
  title: string;
  url: string;
  description: string;
  categories: string[];
}

export interface SourceMatch {
  source: RegulatorySource;
  relevance: number;
  matchedCategories: string[];
}

export const REGULATORY_SOURCES: readonly RegulatorySource[] = regulatorySources;
export const RELEVANCE_THRESHOLD = 0.3;

const KEYWORD_WEIGHT = 0.5;
const CATEGORY_WEIGHT = 0.3;
const TITLE_WEIGHT = 0.4;

// Float sums like 0.3 + 0.3 + 0.3 are kept to 4 decimals
function round(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

export function searchRegulatorySources(
  text: string,
  threshold: number = RELEVANCE_THRESHOLD,
  sources: readonly RegulatorySource[] = REGULATORY_SOURCES
): SourceMatch[] {
  const matches: SourceMatch[] = [];

  for (const source of sources) {
    let relevance = 0;
    if (containsTerm(text, source.keyword)) relevance += KEYWORD_WEIGHT;

    const matchedCategories = source.categories.filter(
      (category) => containsTerm(text, category) || containsTerm(text, category.replace(/_/g, " "))
    );
    relevance += CATEGORY_WEIGHT * matchedCategories.length;

    if (containsTerm(text, source.title)) relevance += TITLE_WEIGHT;

    relevance = round(Math.min(relevance, 1));
    if (relevance >= threshold) matches.push({ source, relevance, matchedCategories });
  }

  // Stable: equal relevance keeps catalogue order
  return matches.sort((a, b) => b.relevance - a.relevance);
}

/** Organization from "(...)" in the title, else from the URL host */
export function organizationOf(source: Pick<RegulatorySource, "title" | "url">): string {
  const inParens = /\(([^)]+)\)/.exec(source.title);
  if (inParens) return inParens[1];

  const host = /^https?:\/\/(?:www\.)?([^/]+)/.exec(source.url);
  if (!host) return "";
  return host[1]
    .split(/[.-]/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function formatCitations(matches: readonly SourceMatch[], accessDate: string): Citation[] {
  return matches.map(({ source, relevance, matchedCategories }, i) => {
    const number = i + 1;
    const organization = organizationOf(source);
    const year = /\b(?:19|20)\d{2}\b/.exec(`${source.title} ${source.description}`);
    const publicationYear = year ? year[0] : null;

    let citationText = `[${number}] ${source.title}. `;
    if (organization) citationText += `${organization}. `;
    if (publicationYear) citationText += `Published ${publicationYear}. `;
    citationText += `Retrieved from ${source.url} on ${accessDate}.`;

    return {
      number,
      title: source.title,
      url: source.url,
      description: source.description,
      relevance,
      matchedCategories,
      organization,
      publicationYear,
      accessDate,
      citationText,
    };
  });
}

/** Search and format in one step */
export function findCitations(text: string, accessDate: string): Citation[] {
  return formatCitations(searchRegulatorySources(text), accessDate);
}
