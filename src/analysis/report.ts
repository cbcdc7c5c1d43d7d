// src/analysis/report.ts
// Report formatter: verdict + section results → persisted ComplianceReport.
// Pure; the analysis timestamp comes in through the metadata.

import type {
  AggregateOptions,
  AggregateVerdict,
  ComplianceReport,
  ReportMetadata,
  ReportSection,
  SectionResult,
} from "./types";
import { isCompliant, nonCompliantScore, riskLevelFor } from "./aggregator";
import { cleanTextForPreview } from "./preview";
import { extractKeyFindings } from "./findings";
import { findCitations } from "./citations";
import { ruleRecommendations } from "./recommendations";

function toReportSection(
  { section, result }: SectionResult,
  options: AggregateOptions
): ReportSection {
  const base = {
    index: section.index,
    start: section.start,
    end: section.end,
    truncated: result.truncated,
    preview: cleanTextForPreview(section.text, options.previewLength),
  };

  if (result.status === "error") {
    return {
      ...base,
      status: "error",
      label: "error",
      confidence: 0,
      scores: {},
      riskLevel: null,
      error: { code: result.errorCode, reason: result.reason },
    };
  }

  return {
    ...base,
    status: "success",
    label: result.label,
    confidence: result.confidence,
    scores: result.scores,
    riskLevel: isCompliant(result, options.labels)
      ? null
      : riskLevelFor(nonCompliantScore(result, options.labels), options),
    error: null,
  };
}

export function formatReport(
  metadata: ReportMetadata,
  verdict: AggregateVerdict,
  sectionResults: readonly SectionResult[],
  options: AggregateOptions
): ComplianceReport {
  const recommendations = [...verdict.recommendations];
  if (verdict.outcome === "decided" && !verdict.compliant) {
    for (const rec of ruleRecommendations(metadata.text)) {
      if (!recommendations.includes(rec)) recommendations.push(rec);
    }
  }

  return {
    documentId: metadata.documentId,
    source: metadata.source,
    documentLength: metadata.documentLength,
    analyzedAt: metadata.analyzedAt,
    status: verdict.status,
    compliant: verdict.compliant,
    confidence: verdict.confidence,
    allScores: verdict.labelScores,
    summary: {
      totalSections: verdict.totalSections,
      compliantSections: verdict.compliantSections,
      nonCompliantSections: verdict.nonCompliantSections,
      sectionsWithErrors: verdict.sectionsWithErrors,
      truncatedSections: verdict.truncatedSections,
    },
    sections: sectionResults.map((r) => toReportSection(r, options)),
    riskDistribution: verdict.riskDistribution,
    problematicSections: verdict.problematicSections,
    keyFindings: extractKeyFindings(metadata.text),
    citations: findCitations(metadata.text, metadata.analyzedAt.slice(0, 10)),
    recommendations,
    error:
      verdict.outcome === "error"
        ? { code: "all_sections_failed", message: verdict.reason }
        : null,
  };
}
