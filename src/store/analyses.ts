// src/store/analyses.ts
// Store for finished document analyses.
//
// Tables: analyses
// Append-only from the pipeline's point of view (AnalysisSink.save); the API
// adds lookup, history, search and deletion on top.

import type { DbAdapter } from "../db/types";
import type { AnalysisRecord, AnalysisSink, SaveResult } from "../analysis/pipeline";
import type { ComplianceReport, DocumentSource } from "../analysis/types";
import type { AnalysisCountSource } from "../observability/metricsCollector";
import { createLogger } from "../observability/logger";

const log = createLogger("store:analyses");

/* ---------- Types ---------- */

// Domain type (camelCase, for API)
export interface AnalysisSummary {
  id: string;
  sourceKind: DocumentSource["kind"];
  filename: string | null;
  status: string;
  confidence: number;
  documentLength: number;
  sectionsTotal: number;
  sectionsWithErrors: number;
  createdAt: string; // ISO string
}

export interface StoredAnalysis extends AnalysisSummary {
  report: ComplianceReport;
}

// Row type (snake_case, matches DB)
interface AnalysisRow {
  id: string;
  source_kind: string;
  filename: string | null;
  status: string;
  confidence: number;
  document_length: number;
  sections_total: number;
  sections_with_errors: number;
  report_json: string;
  created_at: number;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface SearchOptions extends PageOptions {
  /** Substring matched against filename and report text (previews, findings) */
  query?: string;
  status?: string;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const SUMMARY_COLUMNS = `id, source_kind, filename, status, confidence, document_length,
  sections_total, sections_with_errors, created_at`;

/* ---------- Row to Domain Converters ---------- */

function toSourceKind(kind: string): DocumentSource["kind"] {
  return kind === "upload" ? "upload" : "text";
}

function rowToSummary(row: Omit<AnalysisRow, "report_json">): AnalysisSummary {
  return {
    id: row.id,
    sourceKind: toSourceKind(row.source_kind),
    filename: row.filename,
    status: row.status,
    confidence: row.confidence,
    documentLength: row.document_length,
    sectionsTotal: row.sections_total,
    sectionsWithErrors: row.sections_with_errors,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

/** Parse stored JSON; null when the column is unreadable */
function parseJson<T>(json: string | null): T | null {
  if (!json) return null;
  try {
    return JSON.parse(json) as T;
  } catch (err) {
    log.error({ err }, "corrupt report_json");
    return null;
  }
}

function clampPage(opts: PageOptions): { limit: number; offset: number } {
  const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(opts.limit ?? DEFAULT_PAGE_SIZE)));
  const offset = Math.max(0, Math.floor(opts.offset ?? 0));
  return { limit, offset };
}

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Text the search query runs against, besides the filename */
export function buildSearchText(report: ComplianceReport): string {
  return [
    ...report.sections.map((s) => s.preview),
    ...report.keyFindings.map((f) => f.context),
    ...report.citations.map((c) => c.title),
  ].join("\n");
}

/* ---------- Store ---------- */

export class AnalysesStore implements AnalysisSink, AnalysisCountSource {
  constructor(
    private readonly db: DbAdapter,
    private readonly now: () => number = Date.now
  ) {}

  /** Persist a finished report. Never throws; failures come back as { ok: false }. */
  async save(record: AnalysisRecord): Promise<SaveResult> {
    const { id, report } = record;
    try {
      await this.db.run(
        `INSERT INTO analyses (
          id, source_kind, filename, status, confidence, document_length,
          sections_total, sections_with_errors, report_json, search_text, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          id,
          report.source.kind,
          report.source.filename ?? null,
          report.status,
          report.confidence,
          report.documentLength,
          report.summary.totalSections,
          report.summary.sectionsWithErrors,
          JSON.stringify(report),
          buildSearchText(report),
          this.now(),
        ]
      );
      return { ok: true, id };
    } catch (err) {
      log.error({ err, id }, "failed to save analysis");
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  async getById(id: string): Promise<StoredAnalysis | null> {
    const row = await this.db.queryOne<AnalysisRow>(
      `SELECT ${SUMMARY_COLUMNS}, report_json FROM analyses WHERE id = ?`,
      [id]
    );
    if (!row) return null;

    const report = parseJson<ComplianceReport>(row.report_json);
    if (!report) return null;
    return { ...rowToSummary(row), report };
  }

  /** Newest first */
  async list(opts: PageOptions = {}): Promise<Page<AnalysisSummary>> {
    return this.search(opts);
  }

  async search(opts: SearchOptions = {}): Promise<Page<AnalysisSummary>> {
    const { limit, offset } = clampPage(opts);
    const where: string[] = [];
    const params: unknown[] = [];

    if (opts.status) {
      where.push("status = ?");
      params.push(opts.status);
    }
    const query = opts.query?.trim();
    if (query) {
      const pattern = `%${escapeLike(query)}%`;
      where.push("(filename LIKE ? ESCAPE '\\' OR search_text LIKE ? ESCAPE '\\')");
      params.push(pattern, pattern);
    }
    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

    const countRow = await this.db.queryOne<{ total: number }>(
      `SELECT COUNT(*) AS total FROM analyses ${clause}`,
      params
    );
    const rows = await this.db.queryAll<Omit<AnalysisRow, "report_json">>(
      `SELECT ${SUMMARY_COLUMNS} FROM analyses ${clause}
       ORDER BY created_at DESC, rowid DESC
       LIMIT ? OFFSET ?`,
      [...params, limit, offset]
    );

    return { items: rows.map(rowToSummary), total: countRow?.total ?? 0, limit, offset };
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.run("DELETE FROM analyses WHERE id = ?", [id]);
    return result.changes > 0;
  }

  /** Delete several analyses atomically; reports which ids did not exist */
  async deleteMany(ids: readonly string[]): Promise<{ deleted: string[]; notFound: string[] }> {
    const unique = [...new Set(ids)];
    return this.db.transaction(async (tx) => {
      const deleted: string[] = [];
      const notFound: string[] = [];
      for (const id of unique) {
        const result = await tx.run("DELETE FROM analyses WHERE id = ?", [id]);
        (result.changes > 0 ? deleted : notFound).push(id);
      }
      return { deleted, notFound };
    });
  }

  async countByStatus(): Promise<Record<string, number>> {
    const rows = await this.db.queryAll<{ status: string; count: number }>(
      "SELECT status, COUNT(*) AS count FROM analyses GROUP BY status"
    );
    const counts: Record<string, number> = {};
    for (const row of rows) counts[row.status] = row.count;
    return counts;
  }
}
