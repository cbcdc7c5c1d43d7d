import type {
  AggregateOptions,
  ClassificationFailure,
  ClassificationSuccess,
  Section,
  SectionResult,
} from '../types';

export const LABELS = { compliant: 'compliant', nonCompliant: 'non-compliant' };

export const AGG_OPTIONS: AggregateOptions = {
  labels: LABELS,
  highRiskThreshold: 0.75,
  mediumRiskThreshold: 0.4,
  previewLength: 150,
};

export function makeSection(index: number, text = `Section ${index} text.`): Section {
  const start = index * 100;
  return { index, text, start, end: start + text.length };
}

/** Success result from the compliant score; non-compliant gets the remainder */
export function success(compliantScore: number, overrides: Partial<ClassificationSuccess> = {}): ClassificationSuccess {
  const nonCompliantScore = 1 - compliantScore;
  const compliant = compliantScore >= nonCompliantScore;
  return {
    status: 'success',
    label: compliant ? LABELS.compliant : LABELS.nonCompliant,
    confidence: compliant ? compliantScore : nonCompliantScore,
    scores: { [LABELS.compliant]: compliantScore, [LABELS.nonCompliant]: nonCompliantScore },
    truncated: false,
    attempts: 1,
    provider: 'fake',
    model: 'fake-model',
    ...overrides,
  };
}

export function failed(overrides: Partial<ClassificationFailure> = {}): ClassificationFailure {
  return {
    status: 'error',
    label: 'error',
    confidence: 0,
    reason: 'HTTP 503',
    errorCode: 'transient',
    truncated: false,
    attempts: 3,
    ...overrides,
  };
}

export function pair(index: number, result: SectionResult['result'], text?: string): SectionResult {
  return { section: makeSection(index, text), result };
}
