import { describe, it, expect } from 'vitest';
import { cleanTextForPreview } from '../preview';

describe('cleanTextForPreview', () => {
  it('removes control characters and collapses whitespace', () => {
    expect(cleanTextForPreview('hello\u0000 world\n\n   again')).toBe('hello world again');
  });

  it('returns short text unchanged apart from trimming', () => {
    expect(cleanTextForPreview('  Short text.  ')).toBe('Short text.');
  });

  it('cuts long text back to a word boundary', () => {
    expect(cleanTextForPreview('word '.repeat(40), 20)).toBe('word word word word...');
  });

  it('hard-cuts when there is no usable word boundary', () => {
    expect(cleanTextForPreview('a'.repeat(30), 10)).toBe('aaaaaaaaaa...');
  });

  it('uses 150 characters by default', () => {
    const preview = cleanTextForPreview('x'.repeat(400));
    expect(preview).toBe(`${'x'.repeat(150)}...`);
  });

  it('labels blank text', () => {
    expect(cleanTextForPreview(' \n ')).toBe('[No text content]');
  });

  it('summarises mostly-binary content', () => {
    expect(cleanTextForPreview('\u0001\u0002\u0003abc')).toBe('Binary content with text fragments: abc...');
    expect(cleanTextForPreview('\u0001\u0002\u0003\u0004ab')).toBe('[Binary content]');
  });
});
