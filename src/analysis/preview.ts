// src/analysis/preview.ts
// Short, display-safe previews of section text.

// Control characters other than tab, newline and carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const BINARY_RATIO = 0.3;

export const DEFAULT_PREVIEW_LENGTH = 150;

/**
 * First `maxLength` characters of `text` with control characters removed and
 * whitespace collapsed, cut back to a word boundary and ended with "..." when shortened.
 */
export function cleanTextForPreview(
  text: string,
  maxLength: number = DEFAULT_PREVIEW_LENGTH
): string {
  if (!text.trim()) return "[No text content]";

  const controlCount = text.match(CONTROL_CHARS)?.length ?? 0;
  if (controlCount > text.length * BINARY_RATIO) {
    const words = text.match(/[A-Za-z]{3,}/g);
    return words
      ? `Binary content with text fragments: ${words.slice(0, 5).join(" ")}...`
      : "[Binary content]";
  }

  const clean = text.replace(CONTROL_CHARS, "").replace(/\s+/g, " ").trim();
  if (clean.length <= maxLength) return clean;

  let cut = clean.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(" ");
  // Only back off to a word boundary when it keeps most of the preview
  if (lastSpace > maxLength / 2) cut = cut.slice(0, lastSpace);
  return `${cut.trimEnd()}...`;
}
