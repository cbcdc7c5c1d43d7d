// src/analysis/types.ts
// Document analysis: type definitions for the segment → classify → aggregate → report pipeline
//
// Section results and verdicts are tagged unions so the error variant can never
// be read as a compliant/non-compliant call.

/* ============= Document & Sections ============= */

/** Where the analysed text came from */
export type DocumentSource =
  | { kind: "upload"; filename: string }
  | { kind: "text"; filename?: string };

/** Raw submitted content. Immutable once ingested. */
export interface AnalysisDocument {
  id: string;
  text: string;
  source: DocumentSource;
  length: number;
}

/**
 * A bounded slice of a document's text.
 * `start` is inclusive, `end` exclusive; `text === doc.text.slice(start, end)`.
 */
export interface Section {
  index: number;
  text: string;
  start: number;
  end: number;
}

/* ============= Classification ============= */

export type ClassificationErrorCode =
  | "timeout"
  | "transient"
  | "permanent"
  | "invalid_response"
  | "cancelled"
  | "empty_section";

export interface ClassificationSuccess {
  status: "success";
  /** Top-scoring label */
  label: string;
  /** Score of the top label */
  confidence: number;
  /** label → score in [0,1], one entry per candidate label */
  scores: Record<string, number>;
  truncated: boolean;
  attempts: number;
  provider: string;
  model: string;
}

export interface ClassificationFailure {
  status: "error";
  label: "error";
  confidence: 0;
  reason: string;
  errorCode: ClassificationErrorCode;
  truncated: boolean;
  attempts: number;
}

export type ClassificationResult = ClassificationSuccess | ClassificationFailure;

/** One section paired with its classification, in section order */
export interface SectionResult {
  section: Section;
  result: ClassificationResult;
}

/* ============= Aggregation ============= */

export type RiskLevel = "high" | "medium" | "low";

export interface RiskDistribution {
  high: number;
  medium: number;
  low: number;
}

export interface ProblematicSection {
  index: number;
  start: number;
  end: number;
  label: string;
  /** Non-compliant score of the section */
  confidence: number;
  riskLevel: RiskLevel;
  preview: string;
}

interface VerdictCounts {
  totalSections: number;
  compliantSections: number;
  nonCompliantSections: number;
  sectionsWithErrors: number;
  truncatedSections: number;
  riskDistribution: RiskDistribution;
  problematicSections: ProblematicSection[];
  /** Mean score per label over successful sections */
  labelScores: Record<string, number>;
  recommendations: string[];
}

export interface DecidedVerdict extends VerdictCounts {
  outcome: "decided";
  /** Overall label (compliant or non-compliant label) */
  status: string;
  compliant: boolean;
  /** Mean of the winning label's score over the sections that agree with it */
  confidence: number;
}

export interface ErrorVerdict extends VerdictCounts {
  outcome: "error";
  status: "error";
  compliant: false;
  confidence: 0;
  reason: string;
}

export type AggregateVerdict = DecidedVerdict | ErrorVerdict;

/** Label pair the vote is taken over */
export interface ComplianceLabels {
  compliant: string;
  nonCompliant: string;
}

export interface AggregateOptions {
  labels: ComplianceLabels;
  highRiskThreshold: number;
  mediumRiskThreshold: number;
  previewLength: number;
}

/* ============= Report ============= */

export interface KeyFinding {
  finding: string;
  keyword: string;
  riskLevel: RiskLevel;
  /** Text around the first occurrence, with "..." where it was cut */
  context: string;
}

export interface Citation {
  number: number;
  title: string;
  url: string;
  description: string;
  /** Keyword/category/title match score in [0,1] */
  relevance: number;
  matchedCategories: string[];
  organization: string;
  publicationYear: string | null;
  accessDate: string;
  citationText: string;
}

export interface ReportSection {
  index: number;
  start: number;
  end: number;
  status: "success" | "error";
  label: string;
  confidence: number;
  scores: Record<string, number>;
  /** Null for compliant and error sections */
  riskLevel: RiskLevel | null;
  truncated: boolean;
  preview: string;
  error: { code: ClassificationErrorCode; reason: string } | null;
}

export interface ReportMetadata {
  documentId: string;
  source: DocumentSource;
  documentLength: number;
  analyzedAt: string;
  /** Full document text; used for findings and citations, not copied into the report */
  text: string;
}

/** The externally consumed, persisted analysis record */
export interface ComplianceReport {
  documentId: string;
  source: DocumentSource;
  documentLength: number;
  analyzedAt: string;
  status: string;
  compliant: boolean;
  confidence: number;
  allScores: Record<string, number>;
  summary: {
    totalSections: number;
    compliantSections: number;
    nonCompliantSections: number;
    sectionsWithErrors: number;
    truncatedSections: number;
  };
  sections: ReportSection[];
  riskDistribution: RiskDistribution;
  problematicSections: ProblematicSection[];
  keyFindings: KeyFinding[];
  citations: Citation[];
  recommendations: string[];
  error: { code: "all_sections_failed"; message: string } | null;
}
