// src/ingest/decode.ts
// Upload validation and in-memory text extraction.
// Files are never written to disk; only the decoded text leaves this module.

import path from 'node:path';
import mammoth from 'mammoth';
import {
  FileTooLargeError,
  UnreadableFileError,
  UnsupportedFileError,
} from '../analysis/errors';
import { createLogger } from '../observability/logger';

const log = createLogger('ingest');

/* ---------------- file types ---------------- */

export type FileKind = 'text' | 'rtf' | 'pdf' | 'docx' | 'html';

const KIND_BY_EXTENSION: Record<string, FileKind> = {
  '.txt': 'text',
  '.md': 'text',
  '.rtf': 'rtf',
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.html': 'html',
  '.htm': 'html',
};

export const ALLOWED_EXTENSIONS: readonly string[] = Object.keys(KIND_BY_EXTENSION);

export interface UploadedFile {
  filename: string;
  buffer: Buffer;
}

export function fileKindOf(filename: string): FileKind | null {
  const ext = path.extname(filename).toLowerCase();
  return KIND_BY_EXTENSION[ext] ?? null;
}

/**
 * @throws UnsupportedFileError for extensions outside ALLOWED_EXTENSIONS
 * @throws FileTooLargeError when the upload exceeds maxBytes
 */
export function validateUpload(filename: string, size: number, maxBytes: number): FileKind {
  const kind = fileKindOf(filename);
  if (!kind) throw new UnsupportedFileError(filename, ALLOWED_EXTENSIONS);
  if (size > maxBytes) throw new FileTooLargeError(filename, maxBytes);
  return kind;
}

/* ---------------- converters ---------------- */

export function rtfToText(rtf: string): string {
  return rtf
    .replace(/\\'([0-9a-fA-F]{2})/g, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\par[d]?/g, '\n')
    .replace(/\\[a-z]+-?\d* ?/gi, '')
    .replace(/[{}]/g, '')
    .replace(/\r/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|h[1-6])>/gi, '\n\n')
    .replace(/<\/li>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function utf8(buffer: Buffer): string {
  return buffer.toString('utf8').replace(/^\uFEFF/, '');
}

async function pdfToText(buffer: Buffer): Promise<string> {
  // Loaded on first use
  const { default: pdfParse } = await import('pdf-parse');
  const parsed = await pdfParse(buffer);
  return parsed.text;
}

async function docxToText(buffer: Buffer): Promise<string> {
  const { value, messages } = await mammoth.extractRawText({ buffer });
  if (messages.length > 0) log.debug({ messages }, 'mammoth conversion messages');
  return value;
}

/* ---------------- entry point ---------------- */

/**
 * Validate an upload and return its plain text.
 * An empty result is returned as-is; the pipeline turns it into EmptyDocumentError.
 */
export async function decodeUpload(file: UploadedFile, maxBytes: number): Promise<string> {
  const kind = validateUpload(file.filename, file.buffer.length, maxBytes);

  try {
    switch (kind) {
      case 'text':
        return utf8(file.buffer);
      case 'rtf':
        return rtfToText(utf8(file.buffer));
      case 'html':
        return htmlToText(utf8(file.buffer));
      case 'pdf':
        return await pdfToText(file.buffer);
      case 'docx':
        return await docxToText(file.buffer);
    }
  } catch (err) {
    log.warn({ err, filename: file.filename, kind }, 'failed to decode upload');
    throw new UnreadableFileError(file.filename, err instanceof Error ? err.message : String(err));
  }
}
