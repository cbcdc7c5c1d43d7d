// src/analysis/aggregator.ts
// Rolls section classifications up into one document verdict.

import type {
  AggregateOptions,
  AggregateVerdict,
  ClassificationSuccess,
  ComplianceLabels,
  ProblematicSection,
  RiskDistribution,
  RiskLevel,
  Section,
  SectionResult,
} from "./types";
import { cleanTextForPreview } from "./preview";

/* ============= Scoring helpers ============= */

/** A successful section is compliant only when its top label is the compliant label */
export function isCompliant(result: ClassificationSuccess, labels: ComplianceLabels): boolean {
  return result.label === labels.compliant;
}

/** Non-compliant score, falling back to the top score when the provider omitted it */
export function nonCompliantScore(result: ClassificationSuccess, labels: ComplianceLabels): number {
  return result.scores[labels.nonCompliant] ?? result.confidence;
}

export function riskLevelFor(
  score: number,
  thresholds: Pick<AggregateOptions, "highRiskThreshold" | "mediumRiskThreshold">
): RiskLevel {
  if (score >= thresholds.highRiskThreshold) return "high";
  if (score >= thresholds.mediumRiskThreshold) return "medium";
  return "low";
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function meanScoresByLabel(results: ClassificationSuccess[]): Record<string, number> {
  const sums = new Map<string, { total: number; count: number }>();
  for (const r of results) {
    for (const [label, score] of Object.entries(r.scores)) {
      const acc = sums.get(label) ?? { total: 0, count: 0 };
      acc.total += score;
      acc.count += 1;
      sums.set(label, acc);
    }
  }
  const out: Record<string, number> = {};
  for (const [label, { total, count }] of sums) out[label] = total / count;
  return out;
}

/* ============= Recommendations ============= */

interface RecommendationInput {
  decided: boolean;
  compliant: boolean;
  totalSections: number;
  sectionsWithErrors: number;
  truncatedSections: number;
  risk: RiskDistribution;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function verdictRecommendations(input: RecommendationInput): string[] {
  const { risk } = input;

  if (!input.decided) {
    return [
      `Classification failed for ${plural(input.totalSections, "section")}; retry the analysis once the classifier is available.`,
    ];
  }

  const recs: string[] = [];
  if (risk.high > 0) {
    recs.push(`Review ${plural(risk.high, "high-risk section")} before relying on this document.`);
  }
  if (risk.medium > 0) {
    recs.push(`Revise ${plural(risk.medium, "medium-risk section")} to address potential compliance gaps.`);
  }
  if (risk.low > 0) {
    recs.push(`${plural(risk.low, "low-risk section")} flagged for optional review.`);
  }
  if (input.sectionsWithErrors > 0) {
    recs.push(
      `Re-run the analysis: ${plural(input.sectionsWithErrors, "section")} could not be classified.`
    );
  }
  if (input.truncatedSections > 0) {
    recs.push(
      `${plural(input.truncatedSections, "section")} exceeded the classifier input limit and ${input.truncatedSections === 1 ? "was" : "were"} analyzed in truncated form.`
    );
  }
  if (input.compliant && risk.high + risk.medium + risk.low === 0 && input.sectionsWithErrors === 0) {
    recs.push("No compliance issues detected.");
  }
  return recs;
}

/* ============= aggregate ============= */

/**
 * Majority vote over successful sections; ties go to non-compliant.
 * Error sections are left out of the vote and counted in sectionsWithErrors.
 * When no section succeeded the verdict is the error variant.
 */
export function aggregate(
  results: readonly SectionResult[],
  options: AggregateOptions
): AggregateVerdict {
  const { labels } = options;

  const successes: Array<{ section: Section; result: ClassificationSuccess }> = [];
  for (const { section, result } of results) {
    if (result.status === "success") successes.push({ section, result });
  }

  const compliantSections = successes.filter((s) => isCompliant(s.result, labels));
  const nonCompliantSections = successes.filter((s) => !isCompliant(s.result, labels));
  const sectionsWithErrors = results.length - successes.length;
  const truncatedSections = results.filter((r) => r.result.truncated).length;

  const riskDistribution: RiskDistribution = { high: 0, medium: 0, low: 0 };
  const problematicSections: ProblematicSection[] = nonCompliantSections.map(({ section, result }) => {
    const confidence = nonCompliantScore(result, labels);
    const riskLevel = riskLevelFor(confidence, options);
    riskDistribution[riskLevel] += 1;
    return {
      index: section.index,
      start: section.start,
      end: section.end,
      label: result.label,
      confidence,
      riskLevel,
      preview: cleanTextForPreview(section.text, options.previewLength),
    };
  });
  problematicSections.sort((a, b) => b.confidence - a.confidence || a.index - b.index);

  const base = {
    totalSections: results.length,
    compliantSections: compliantSections.length,
    nonCompliantSections: nonCompliantSections.length,
    sectionsWithErrors,
    truncatedSections,
    riskDistribution,
    problematicSections,
    labelScores: meanScoresByLabel(successes.map((s) => s.result)),
  };

  if (successes.length === 0) {
    return {
      ...base,
      outcome: "error",
      status: "error",
      compliant: false,
      confidence: 0,
      reason:
        results.length === 0
          ? "No sections to aggregate"
          : `Classification failed for all ${results.length} section(s)`,
      recommendations: verdictRecommendations({
        decided: false,
        compliant: false,
        totalSections: results.length,
        sectionsWithErrors,
        truncatedSections,
        risk: riskDistribution,
      }),
    };
  }

  const compliant = compliantSections.length > nonCompliantSections.length;
  const confidence = compliant
    ? mean(compliantSections.map((s) => s.result.scores[labels.compliant] ?? s.result.confidence))
    : mean(nonCompliantSections.map((s) => nonCompliantScore(s.result, labels)));

  return {
    ...base,
    outcome: "decided",
    status: compliant ? labels.compliant : labels.nonCompliant,
    compliant,
    confidence,
    recommendations: verdictRecommendations({
      decided: true,
      compliant,
      totalSections: results.length,
      sectionsWithErrors,
      truncatedSections,
      risk: riskDistribution,
    }),
  };
}
