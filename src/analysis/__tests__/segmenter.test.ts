import { describe, it, expect } from 'vitest';
import { segment } from '../segmenter';
import { EmptyDocumentError, InvalidInputError } from '../errors';

const texts = (input: string, max: number) => segment(input, max).map((s) => s.text);

describe('segment', () => {
  it('splits "A. B. C." into three sentence sections', () => {
    const sections = segment('A. B. C.', 3);
    expect(sections).toEqual([
      { index: 0, text: 'A. ', start: 0, end: 3 },
      { index: 1, text: 'B. ', start: 3, end: 6 },
      { index: 2, text: 'C.', start: 6, end: 8 },
    ]);
  });

  it('returns a single section when the text fits', () => {
    expect(segment('Short document.', 100)).toEqual([
      { index: 0, text: 'Short document.', start: 0, end: 15 },
    ]);
  });

  it('prefers a paragraph break and keeps the blank line with the preceding section', () => {
    expect(texts('First para here.\n\nSecond one.', 25)).toEqual([
      'First para here.\n\n',
      'Second one.',
    ]);
  });

  it('recognizes CRLF blank lines as paragraph breaks', () => {
    expect(texts('Para one words here\r\n\r\nPara two words here and more', 30)).toEqual([
      'Para one words here\r\n\r\n',
      'Para two words here and more',
    ]);
  });

  it('falls back to the last sentence end', () => {
    expect(texts('One two. Three four five', 15)).toEqual(['One two. ', 'Three four five']);
  });

  it('treats closing quotes after punctuation as part of the sentence end', () => {
    expect(texts('He said "stop." Then left', 17)).toEqual(['He said "stop." ', 'Then left']);
  });

  it('falls back to whitespace when no sentence ends in the window', () => {
    expect(texts('alpha beta gamma', 12)).toEqual(['alpha beta ', 'gamma']);
  });

  it('hard-cuts text without any boundary', () => {
    expect(texts('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not split a surrogate pair on a hard cut', () => {
    expect(texts('a\u{1F600}b', 2)).toEqual(['a', '\u{1F600}', 'b']);
  });

  it('reconstructs the input exactly with contiguous offsets', () => {
    const inputs = [
      'Policy text.\n\n  Indented paragraph with more words!\r\n\r\nAnd a third? Yes.',
      'no punctuation at all just words that keep going and going',
      'x'.repeat(57),
      '  leading and trailing whitespace  \n\n\n',
      'Mixed\tseparators. Non-breaking space! End',
    ];
    for (const input of inputs) {
      for (const max of [1, 2, 5, 13, 40, 1000]) {
        const sections = segment(input, max);
        expect(sections.map((s) => s.text).join('')).toBe(input);

        let offset = 0;
        sections.forEach((s, i) => {
          expect(s.index).toBe(i);
          expect(s.start).toBe(offset);
          expect(s.end - s.start).toBe(s.text.length);
          expect(s.text.length).toBeGreaterThan(0);
          expect(s.text.length).toBeLessThanOrEqual(max);
          offset = s.end;
        });
        expect(offset).toBe(input.length);
      }
    }
  });

  it('throws EmptyDocumentError for empty or whitespace-only text', () => {
    expect(() => segment('', 10)).toThrow(EmptyDocumentError);
    expect(() => segment('  \n\t ', 10)).toThrow(EmptyDocumentError);
  });

  it('throws InvalidInputError for a non-positive or fractional max length', () => {
    expect(() => segment('text', 0)).toThrow(InvalidInputError);
    expect(() => segment('text', -5)).toThrow(InvalidInputError);
    expect(() => segment('text', 1.5)).toThrow(InvalidInputError);
  });
});
