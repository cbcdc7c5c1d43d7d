// src/analysis/textMatch.ts
// Case-insensitive whole-word term lookup shared by findings, citations and rules.

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function termPattern(term: string): RegExp {
  return new RegExp(`(?<![\\w-])${escapeRegExp(term)}(?![\\w-])`, "i");
}

/** Offset of the first whole-word occurrence of `term`, or -1 */
export function findTerm(text: string, term: string): number {
  const match = termPattern(term).exec(text);
  return match ? match.index : -1;
}

export function containsTerm(text: string, term: string): boolean {
  return findTerm(text, term) !== -1;
}
