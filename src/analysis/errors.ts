// src/analysis/errors.ts
// Error taxonomy for document analysis.
// Each error carries a machine-readable code and the HTTP status the API answers with.

import type { ComplianceReport } from "./types";

export class AnalysisError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** No extractable text; the pipeline stops before any classifier call */
export class EmptyDocumentError extends AnalysisError {
  constructor(message = "Document contains no text to analyze") {
    super("empty_document", message, 422);
  }
}

export class InvalidInputError extends AnalysisError {
  constructor(message: string) {
    super("invalid_input", message, 400);
  }
}

/* ---------- Classifier errors (never escape classify()) ---------- */

export class ClassifierTimeoutError extends AnalysisError {
  constructor(timeoutMs: number) {
    super("classifier_timeout", `Classifier call timed out after ${timeoutMs}ms`, 504);
  }
}

/** Worth retrying: network failure, HTTP 408/429/5xx */
export class ClassifierTransientError extends AnalysisError {
  readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number) {
    super("classifier_transient", message, 503);
    this.httpStatus = httpStatus;
  }
}

/** Not worth retrying: other 4xx, malformed responses, missing credentials */
export class ClassifierPermanentError extends AnalysisError {
  readonly httpStatus?: number;
  readonly invalidResponse: boolean;

  constructor(message: string, opts: { httpStatus?: number; invalidResponse?: boolean } = {}) {
    super("classifier_permanent", message, 502);
    this.httpStatus = opts.httpStatus;
    this.invalidResponse = opts.invalidResponse ?? false;
  }
}

/* ---------- Pipeline-level ---------- */

/** Every section failed; the report holds the error verdict that was persisted */
export class AllSectionsFailedError extends AnalysisError {
  readonly report: ComplianceReport;

  constructor(report: ComplianceReport) {
    super(
      "all_sections_failed",
      `Classification failed for all ${report.summary.totalSections} section(s)`,
      502
    );
    this.report = report;
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor() {
    super("analysis_cancelled", "Analysis was cancelled", 499);
  }
}

/* ---------- Ingestion & lookup ---------- */

export class UnsupportedFileError extends AnalysisError {
  constructor(filename: string, allowed: readonly string[]) {
    super(
      "unsupported_file",
      `Unsupported file type for "${filename}". Allowed: ${allowed.join(", ")}`,
      415
    );
  }
}

export class FileTooLargeError extends AnalysisError {
  constructor(filename: string, maxBytes: number) {
    super("file_too_large", `"${filename}" exceeds the ${maxBytes} byte upload limit`, 413);
  }
}

export class NotFoundError extends AnalysisError {
  constructor(what: string) {
    super("not_found", `${what} not found`, 404);
  }
}

export class PersistenceError extends AnalysisError {
  constructor(message: string) {
    super("persistence_failed", message, 500);
  }
}

/** The file type is allowed but its contents could not be decoded */
export class UnreadableFileError extends AnalysisError {
  constructor(filename: string, detail: string) {
    super("unreadable_file", `Could not extract text from "${filename}": ${detail}`, 422);
  }
}
