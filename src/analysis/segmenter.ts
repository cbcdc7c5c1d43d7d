// src/analysis/segmenter.ts
// Splits document text into bounded sections.
//
// Windows are greedy: each section takes as much text as fits, then backs off
// to the last paragraph break, sentence end or whitespace run in the window.
// Sections partition the input, so joining their texts gives back the document.

import type { Section } from "./types";
import { EmptyDocumentError, InvalidInputError } from "./errors";

/* ============= Boundaries ============= */

// Blank line (LF or CRLF) plus any whitespace after it
const PARAGRAPH_BOUNDARY = /\r?\n[ \t\r]*\n\s*/g;
// Terminal punctuation, optional closing quotes/brackets, then whitespace
const SENTENCE_BOUNDARY = /[.!?]["')\]]*\s+/g;
const WHITESPACE_RUN = /\s+/g;

const BOUNDARIES = [PARAGRAPH_BOUNDARY, SENTENCE_BOUNDARY, WHITESPACE_RUN];

/** End offset of the last match inside `window`, or 0 when there is none */
function lastBoundaryEnd(window: string, pattern: RegExp): number {
  let cut = 0;
  for (const match of window.matchAll(pattern)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > 0) cut = end;
  }
  return cut;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Offset (relative to `window`) at which the section should end */
function findCut(window: string): number {
  for (const pattern of BOUNDARIES) {
    const cut = lastBoundaryEnd(window, pattern);
    if (cut > 0) return cut;
  }

  // Hard cut; keep surrogate pairs together
  let cut = window.length;
  if (cut > 1 && isHighSurrogate(window.charCodeAt(cut - 1))) cut -= 1;
  return cut;
}

/* ============= Public API ============= */

/**
 * Split `text` into sections of at most `maxSectionLength` characters.
 *
 * @throws InvalidInputError when maxSectionLength is not a positive integer
 * @throws EmptyDocumentError when the text is empty or whitespace only
 */
export function segment(text: string, maxSectionLength: number): Section[] {
  if (!Number.isInteger(maxSectionLength) || maxSectionLength <= 0) {
    throw new InvalidInputError(
      `maxSectionLength must be a positive integer (got ${maxSectionLength})`
    );
  }
  if (text.trim().length === 0) {
    throw new EmptyDocumentError();
  }

  const sections: Section[] = [];
  let start = 0;

  while (start < text.length) {
    const remaining = text.length - start;
    const length =
      remaining <= maxSectionLength
        ? remaining
        : findCut(text.slice(start, start + maxSectionLength));

    const end = start + length;
    sections.push({ index: sections.length, text: text.slice(start, end), start, end });
    start = end;
  }

  return sections;
}
