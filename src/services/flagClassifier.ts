import { InvalidCriteriaError } from '../shared/errors.js';
import type {
  FlagCounts,
  FlaggedBatch,
  FlaggedRecord,
  FlagReason,
  FlagResult,
  FlagSeverity,
} from '../types/metricsTypes.js';
import type { Evaluation, JoinedRecord } from '../types/recordTypes.js';

export const DEFAULT_FAITHFULNESS_THRESHOLD = 0.7;

export function assertValidThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidCriteriaError(
      `Faithfulness threshold must be between 0 and 1, got ${threshold}`
    );
  }
}

export function severityOf(reasons: FlagReason[]): FlagSeverity | null {
  if (reasons.length === 0) return null;

  const hasHallucination = reasons.some((reason) => {
    switch (reason) {
      case 'hallucination':
      case 'capability_hallucination':
        return true;
      case 'low_faithfulness':
      case 'inaccurate_citation':
        return false;
    }
  });

  return hasHallucination ? 'error' : 'warning';
}

function reasonsFor(evaluation: Evaluation, threshold: number): FlagReason[] {
  const reasons: FlagReason[] = [];

  if (evaluation.hallucination_detected) {
    reasons.push('hallucination');
  }
  if (evaluation.capability_hallucination) {
    reasons.push('capability_hallucination');
  }
  // An unscored evaluation counts as fully faithful
  if ((evaluation.faithfulness_score ?? 1) < threshold) {
    reasons.push('low_faithfulness');
  }
  if (evaluation.citation_accurate === false) {
    reasons.push('inaccurate_citation');
  }

  return reasons;
}

export function classifyEvaluation(evaluation: Evaluation | null, threshold: number): FlagResult {
  assertValidThreshold(threshold);

  const reasons = evaluation ? reasonsFor(evaluation, threshold) : [];

  return {
    flagged: reasons.length > 0,
    reasons,
    severity: severityOf(reasons),
  };
}

// Records without an evaluation are never flagged
export function classify(record: JoinedRecord, threshold: number): FlagResult {
  return classifyEvaluation(record.evaluation, threshold);
}

export function emptyFlagCounts(): FlagCounts {
  return {
    hallucination: 0,
    capability_hallucination: 0,
    low_faithfulness: 0,
    inaccurate_citation: 0,
  };
}

// Keeps only flagged records, in input order, with per-reason totals
export function classifyBatch(records: JoinedRecord[], threshold: number): FlaggedBatch {
  assertValidThreshold(threshold);

  const counts = emptyFlagCounts();
  const flagged: FlaggedRecord[] = [];

  for (const record of records) {
    const result = classify(record, threshold);
    if (!result.flagged || result.severity === null) continue;

    for (const reason of result.reasons) {
      counts[reason] += 1;
    }
    flagged.push({ ...record, reasons: result.reasons, severity: result.severity });
  }

  return { flagged, counts };
}
