// src/analysis/pipeline.ts
// Analysis pipeline: segment → classify (bounded pool) → aggregate → format → persist.
//
// The classifier client and the persistence sink are injected; nothing here is
// shared between analyses.

import { nanoid } from "nanoid";
import type { AppConfig } from "../config";
import type { ZeroShotClient } from "../ai/types";
import type {
  AggregateOptions,
  AnalysisDocument,
  ComplianceLabels,
  ComplianceReport,
  DocumentSource,
  SectionResult,
} from "./types";
import { segment } from "./segmenter";
import { classify, DEFAULT_HYPOTHESIS_TEMPLATE, DEFAULT_RETRY_POLICY, type ClassifyOptions, type RetryPolicy } from "./classifier";
import { mapWithConcurrency } from "./pool";
import { aggregate } from "./aggregator";
import { formatReport } from "./report";
import { DEFAULT_PREVIEW_LENGTH } from "./preview";
import {
  AllSectionsFailedError,
  AnalysisCancelledError,
  InvalidInputError,
  PersistenceError,
} from "./errors";
import { recordAnalysis } from "../observability/metrics";
import { createLogger } from "../observability/logger";

const log = createLogger("pipeline");

/* ============= Sink ============= */

export interface AnalysisRecord {
  id: string;
  report: ComplianceReport;
}

export type SaveResult = { ok: true; id: string } | { ok: false; error: string };

/** Append-only persistence collaborator */
export interface AnalysisSink {
  save(record: AnalysisRecord): Promise<SaveResult>;
}

/* ============= Options ============= */

export interface PipelineOptions extends AggregateOptions {
  hypothesisTemplate: string;
  maxSectionLength: number;
  concurrency: number;
  retry: RetryPolicy;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  labels: { compliant: "compliant", nonCompliant: "non-compliant" },
  hypothesisTemplate: DEFAULT_HYPOTHESIS_TEMPLATE,
  maxSectionLength: 1500,
  concurrency: 4,
  retry: DEFAULT_RETRY_POLICY,
  highRiskThreshold: 0.75,
  mediumRiskThreshold: 0.4,
  previewLength: DEFAULT_PREVIEW_LENGTH,
};

export function pipelineOptionsFromConfig(config: AppConfig): PipelineOptions {
  const { classifier, pipeline } = config;
  return {
    labels: classifier.labels,
    hypothesisTemplate: classifier.hypothesisTemplate,
    maxSectionLength: pipeline.maxSectionLength,
    concurrency: classifier.concurrency,
    retry: {
      timeoutMs: classifier.timeoutMs,
      maxAttempts: classifier.maxAttempts,
      baseDelayMs: classifier.baseDelayMs,
      maxDelayMs: classifier.maxDelayMs,
      maxElapsedMs: classifier.maxElapsedMs,
    },
    highRiskThreshold: pipeline.highRiskThreshold,
    mediumRiskThreshold: pipeline.mediumRiskThreshold,
    previewLength: pipeline.previewLength,
  };
}

/** Trimmed copy of the label pair; rejects blank, equal or reserved labels */
function validateLabels(labels: ComplianceLabels): ComplianceLabels {
  const compliant = labels.compliant.trim();
  const nonCompliant = labels.nonCompliant.trim();
  if (!compliant || !nonCompliant) {
    throw new InvalidInputError("Compliance labels must be non-blank");
  }
  if (compliant === nonCompliant) {
    throw new InvalidInputError("Compliant and non-compliant labels must differ");
  }
  if (compliant === "error" || nonCompliant === "error") {
    throw new InvalidInputError('"error" is reserved and cannot be used as a label');
  }
  return { compliant, nonCompliant };
}

/* ============= Pipeline ============= */

export interface AnalyzeInput {
  text: string;
  source: DocumentSource;
  signal?: AbortSignal;
}

export interface AnalysisOutcome {
  id: string;
  report: ComplianceReport;
}

export interface AnalysisPipelineDeps {
  client: ZeroShotClient;
  sink: AnalysisSink;
  options?: Partial<PipelineOptions>;
  generateId?: () => string;
  now?: () => Date;
  /** Passed through to classify(); tests use these to skip real backoff sleeps */
  classifyOverrides?: Pick<ClassifyOptions, "sleep" | "random">;
}

export interface AnalysisPipeline {
  readonly options: PipelineOptions;
  analyze(input: AnalyzeInput): Promise<AnalysisOutcome>;
}

export function createAnalysisPipeline(deps: AnalysisPipelineDeps): AnalysisPipeline {
  const merged: PipelineOptions = { ...DEFAULT_PIPELINE_OPTIONS, ...deps.options };
  const options: PipelineOptions = { ...merged, labels: validateLabels(merged.labels) };

  const generateId = deps.generateId ?? (() => nanoid());
  const now = deps.now ?? (() => new Date());
  const candidateLabels = [options.labels.compliant, options.labels.nonCompliant];

  async function analyze(input: AnalyzeInput): Promise<AnalysisOutcome> {
    const { signal } = input;
    const started = Date.now();
    const doc: AnalysisDocument = {
      id: generateId(),
      text: input.text,
      source: input.source,
      length: input.text.length,
    };

    const sections = segment(doc.text, options.maxSectionLength);
    log.debug({ documentId: doc.id, sections: sections.length }, "document segmented");

    const results: SectionResult[] = await mapWithConcurrency(
      sections,
      options.concurrency,
      async (section) => ({
        section,
        result: await classify(section.text, candidateLabels, {
          client: deps.client,
          hypothesisTemplate: options.hypothesisTemplate,
          signal,
          ...options.retry,
          ...deps.classifyOverrides,
        }),
      })
    );

    if (signal?.aborted) {
      log.info({ documentId: doc.id }, "analysis cancelled");
      throw new AnalysisCancelledError();
    }

    const verdict = aggregate(results, options);
    const report = formatReport(
      {
        documentId: doc.id,
        source: doc.source,
        documentLength: doc.length,
        analyzedAt: now().toISOString(),
        text: doc.text,
      },
      verdict,
      results,
      options
    );

    const saved = await deps.sink.save({ id: doc.id, report });
    if (!saved.ok) {
      log.error({ documentId: doc.id, error: saved.error }, "failed to persist analysis");
      throw new PersistenceError(`Failed to persist analysis: ${saved.error}`);
    }

    recordAnalysis(verdict.status, {
      succeeded: verdict.totalSections - verdict.sectionsWithErrors,
      failed: verdict.sectionsWithErrors,
    });
    log.info(
      {
        documentId: doc.id,
        status: verdict.status,
        sections: verdict.totalSections,
        sectionsWithErrors: verdict.sectionsWithErrors,
        durationMs: Date.now() - started,
      },
      "analysis complete"
    );

    if (verdict.outcome === "error") throw new AllSectionsFailedError(report);
    return { id: saved.id, report };
  }

  return { options, analyze };
}
