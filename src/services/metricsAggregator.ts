import type {
  Distributions,
  HistogramBin,
  MetricsSummary,
} from '../types/metricsTypes.js';
import type { Evaluation, JoinedRecord } from '../types/recordTypes.js';
import { utcDateKey } from '../utils/dateRange.js';
import { isPresent, mean, percentage, roundTo } from '../utils/stats.js';

export const FAITHFULNESS_BINS = 10;

export const UNKNOWN_CATEGORY = 'unknown';

export function evaluationsOf(records: JoinedRecord[]): Evaluation[] {
  return records.map((record) => record.evaluation).filter(isPresent);
}

/**
 * KPI summary for the dashboard header.
 *
 * Averages with nothing to average are reported as 0 here. The daily series
 * reports the same situation as null; both conventions have consumers.
 */
export function summarize(records: JoinedRecord[], now: Date = new Date()): MetricsSummary {
  const today = utcDateKey(now);
  const evaluations = evaluationsOf(records);

  const responseTimes = records
    .map((record) => record.message.response_time_ms)
    .filter(isPresent);
  const faithfulnessScores = evaluations
    .map((evaluation) => evaluation.faithfulness_score)
    .filter(isPresent);
  const hallucinations = evaluations.filter((evaluation) => evaluation.hallucination_detected).length;

  return {
    totalMessages: records.length,
    messagesToday: records.filter((record) => utcDateKey(record.message.created_at) === today).length,
    avgResponseTimeMs: roundTo(mean(responseTimes) ?? 0),
    avgFaithfulness: roundTo(mean(faithfulnessScores) ?? 0, 3),
    hallucinationRate: roundTo(percentage(hallucinations, evaluations.length), 1),
  };
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function emptyHistogram(): HistogramBin[] {
  return Array.from({ length: FAITHFULNESS_BINS }, (_, i) => ({
    from: roundTo(i / FAITHFULNESS_BINS, 2),
    to: roundTo((i + 1) / FAITHFULNESS_BINS, 2),
    count: 0,
  }));
}

// A perfect 1.0 belongs to the last bin; out-of-range scores are clamped
function histogramBin(score: number): number {
  const bin = Math.floor(score * FAITHFULNESS_BINS);
  return Math.min(Math.max(bin, 0), FAITHFULNESS_BINS - 1);
}

// Breakdowns behind the question-type, complexity, high-risk and
// faithfulness charts. Only evaluated records contribute.
export function distributions(records: JoinedRecord[]): Distributions {
  const evaluations = evaluationsOf(records);
  const result: Distributions = {
    evaluatedCount: evaluations.length,
    questionTypes: {},
    complexities: {},
    highRiskCategories: {},
    faithfulnessHistogram: emptyHistogram(),
  };

  for (const evaluation of evaluations) {
    if (evaluation.question_type) {
      increment(result.questionTypes, evaluation.question_type);
    }
    if (evaluation.question_complexity) {
      increment(result.complexities, evaluation.question_complexity);
    }
    if (evaluation.is_high_risk_topic) {
      increment(result.highRiskCategories, evaluation.high_risk_category ?? UNKNOWN_CATEGORY);
    }
    if (evaluation.faithfulness_score !== null) {
      const bin = result.faithfulnessHistogram[histogramBin(evaluation.faithfulness_score)];
      if (bin) bin.count += 1;
    }
  }

  return result;
}
