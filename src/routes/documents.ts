// src/routes/documents.ts
// Document analysis API: submit text or files, read back and manage stored reports.
//
// Endpoints:
// - POST   /documents/analyze  : JSON { text, filename? } → report
// - POST   /documents/upload   : multipart `file` or `text_content`, or JSON → report
// - POST   /documents/batch    : multipart files or JSON { documents } → per-document outcome
// - GET    /documents/history  : stored analyses, newest first
// - GET    /documents/search   : filter by status and text query
// - GET    /documents/:id      : one stored analysis
// - DELETE /documents/:id      : delete one analysis
// - DELETE /documents          : bulk delete, body { ids }

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import multipart, { type MultipartFile } from '@fastify/multipart';
import type { AppConfig } from '../config';
import type { AnalysisPipeline } from '../analysis/pipeline';
import type { ComplianceReport, DocumentSource } from '../analysis/types';
import {
  AllSectionsFailedError,
  AnalysisCancelledError,
  AnalysisError,
  FileTooLargeError,
  InvalidInputError,
  NotFoundError,
} from '../analysis/errors';
import type { AnalysesStore } from '../store/analyses';
import { decodeUpload, type UploadedFile } from '../ingest/decode';
import { getRateLimitConfig } from '../middleware/rateLimit';
import { getRequestLogger } from '../observability/requestLogger';

/* ---------- Types ---------- */

export interface DocumentRoutesDeps {
  pipeline: AnalysisPipeline;
  store: AnalysesStore;
  upload: AppConfig['upload'];
}

interface Submission {
  text: string;
  source: DocumentSource;
}

interface PageQuery {
  limit?: string;
  offset?: string;
}

interface SearchQuery extends PageQuery {
  query?: string;
  status?: string;
}

export type BatchItemOutcome =
  | { filename: string | null; ok: true; id: string; report: ComplianceReport }
  | {
      filename: string | null;
      ok: false;
      error: { code: string; message: string };
      report?: ComplianceReport;
    };

/* ---------- Helpers ---------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new InvalidInputError(`${field} must be a string`);
  return value;
}

/** `{ text, filename? }`; `text_content` is accepted as an alias of `text` */
function textSubmission(body: unknown): Submission {
  if (!isRecord(body)) throw new InvalidInputError('Request body must be a JSON object');
  const text = optionalString(body.text, 'text') ?? optionalString(body.text_content, 'text_content');
  if (text === undefined) throw new InvalidInputError('text is required');
  const filename = optionalString(body.filename, 'filename');
  return { text, source: filename ? { kind: 'text', filename } : { kind: 'text' } };
}

function intParam(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidInputError(`${name} must be a non-negative integer`);
  }
  return n;
}

function isFileTooLarge(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'FST_REQ_FILE_TOO_LARGE';
}

async function bufferFile(part: MultipartFile, maxBytes: number): Promise<UploadedFile> {
  try {
    return { filename: part.filename, buffer: await part.toBuffer() };
  } catch (err) {
    if (isFileTooLarge(err)) throw new FileTooLargeError(part.filename, maxBytes);
    throw err;
  }
}

/** Aborts when the client goes away before the response is written */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

/* ---------- Routes ---------- */

export function createDocumentRoutes(deps: DocumentRoutesDeps): FastifyPluginAsync {
  const { pipeline, store, upload } = deps;

  async function toSubmission(file: UploadedFile): Promise<Submission> {
    const text = await decodeUpload(file, upload.maxBytes);
    return { text, source: { kind: 'upload', filename: file.filename } };
  }

  /** Multipart `file` (or `text_content` field), else the JSON body */
  async function readUploadRequest(req: FastifyRequest): Promise<Submission> {
    if (!req.isMultipart()) return textSubmission(req.body);

    let file: UploadedFile | undefined;
    let textContent: string | undefined;
    for await (const part of req.parts()) {
      if (part.type === 'file') {
        const buffered = await bufferFile(part, upload.maxBytes);
        if (part.fieldname === 'file' && !file) file = buffered;
      } else if (part.fieldname === 'text_content' && typeof part.value === 'string') {
        textContent = part.value;
      }
    }

    if (file) return toSubmission(file);
    if (textContent !== undefined) return { text: textContent, source: { kind: 'text' } };
    throw new InvalidInputError('Provide a "file" upload or a "text_content" field');
  }

  async function readBatchRequest(req: FastifyRequest): Promise<Array<UploadedFile | Submission>> {
    const items: Array<UploadedFile | Submission> = [];
    const tooMany = () =>
      new InvalidInputError(`A batch may contain at most ${upload.maxBatchFiles} documents`);

    if (req.isMultipart()) {
      for await (const part of req.parts()) {
        if (part.type !== 'file') continue;
        if (items.length >= upload.maxBatchFiles) throw tooMany();
        items.push(await bufferFile(part, upload.maxBytes));
      }
    } else {
      const body = req.body;
      if (!isRecord(body) || !Array.isArray(body.documents)) {
        throw new InvalidInputError('documents must be an array');
      }
      if (body.documents.length > upload.maxBatchFiles) throw tooMany();
      for (const doc of body.documents) items.push(textSubmission(doc));
    }

    if (items.length === 0) throw new InvalidInputError('A batch needs at least one document');
    return items;
  }

  return async (fastify) => {
    if (!fastify.hasContentTypeParser('multipart/form-data')) {
      await fastify.register(multipart, {
        limits: {
          fileSize: upload.maxBytes,
          // One over the cap so the batch count check answers first
          files: upload.maxBatchFiles + 1,
        },
      });
    }

    /**
     * POST /documents/analyze
     * Analyze directly submitted text.
     */
    fastify.post('/documents/analyze', getRateLimitConfig('analyze'), async (req, reply) => {
      const submission = textSubmission(req.body);
      const { report } = await pipeline.analyze({ ...submission, signal: disconnectSignal(reply) });
      return reply.code(200).send(report);
    });

    /**
     * POST /documents/upload
     * Analyze an uploaded file. Answers once the report is ready.
     */
    fastify.post('/documents/upload', getRateLimitConfig('upload'), async (req, reply) => {
      const submission = await readUploadRequest(req);
      const { report } = await pipeline.analyze({ ...submission, signal: disconnectSignal(reply) });
      return reply.code(200).send(report);
    });

    /**
     * POST /documents/batch
     * Analyze several documents one after another. A failing document does not
     * stop the batch; its entry carries the error instead of a report.
     */
    fastify.post('/documents/batch', getRateLimitConfig('batch'), async (req, reply) => {
      const log = getRequestLogger(req);
      const items = await readBatchRequest(req);
      const signal = disconnectSignal(reply);
      const results: BatchItemOutcome[] = [];

      for (const item of items) {
        if (signal.aborted) throw new AnalysisCancelledError();
        const filename = 'buffer' in item ? item.filename : item.source.filename ?? null;
        try {
          const submission = 'buffer' in item ? await toSubmission(item) : item;
          const { id, report } = await pipeline.analyze({ ...submission, signal });
          results.push({ filename, ok: true, id, report });
        } catch (err) {
          if (err instanceof AnalysisCancelledError) throw err;
          if (!(err instanceof AnalysisError)) {
            log.error({ err, filename }, 'batch item failed');
            results.push({
              filename,
              ok: false,
              error: { code: 'internal_error', message: 'Unexpected error while analyzing document' },
            });
            continue;
          }
          results.push({
            filename,
            ok: false,
            error: { code: err.code, message: err.message },
            ...(err instanceof AllSectionsFailedError ? { report: err.report } : {}),
          });
        }
      }

      const succeeded = results.filter((r) => r.ok).length;
      return reply.code(200).send({
        total: results.length,
        succeeded,
        failed: results.length - succeeded,
        results,
      });
    });

    /**
     * GET /documents/history
     * Stored analyses, newest first.
     */
    fastify.get<{ Querystring: PageQuery }>('/documents/history', async (req) => {
      return store.list({
        limit: intParam(req.query.limit, 'limit'),
        offset: intParam(req.query.offset, 'offset'),
      });
    });

    /**
     * GET /documents/search
     */
    fastify.get<{ Querystring: SearchQuery }>('/documents/search', async (req) => {
      return store.search({
        query: req.query.query,
        status: req.query.status || undefined,
        limit: intParam(req.query.limit, 'limit'),
        offset: intParam(req.query.offset, 'offset'),
      });
    });

    fastify.get<{ Params: { id: string } }>('/documents/:id', async (req) => {
      const stored = await store.getById(req.params.id);
      if (!stored) throw new NotFoundError(`Analysis ${req.params.id}`);
      return stored;
    });

    fastify.delete<{ Params: { id: string } }>('/documents/:id', async (req, reply) => {
      const deleted = await store.delete(req.params.id);
      if (!deleted) throw new NotFoundError(`Analysis ${req.params.id}`);
      return reply.code(204).send();
    });

    /**
     * DELETE /documents
     * Body: { ids: string[] }, at most upload.maxBulkDelete ids.
     */
    fastify.delete('/documents', async (req) => {
      const body = req.body;
      if (!isRecord(body) || !Array.isArray(body.ids) || body.ids.length === 0) {
        throw new InvalidInputError('ids must be a non-empty array');
      }
      const ids: string[] = [];
      for (const id of body.ids) {
        if (typeof id !== 'string' || id === '') throw new InvalidInputError('ids must be non-empty strings');
        ids.push(id);
      }
      if (ids.length > upload.maxBulkDelete) {
        throw new InvalidInputError(`At most ${upload.maxBulkDelete} ids can be deleted at once`);
      }
      return store.deleteMany(ids);
    });
  };
}
