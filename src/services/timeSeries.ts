import type { DayBucket } from '../types/metricsTypes.js';
import type { JoinedRecord } from '../types/recordTypes.js';
import { DAY_MS, utcDateKey } from '../utils/dateRange.js';
import { isPresent, mean, percentage } from '../utils/stats.js';
import { evaluationsOf } from './metricsAggregator.js';

export function withinWindow(
  records: JoinedRecord[],
  windowDays: number,
  now: Date = new Date()
): JoinedRecord[] {
  const cutoff = now.getTime() - windowDays * DAY_MS;
  return records.filter((record) => Date.parse(record.message.created_at) >= cutoff);
}

function bucketFor(date: string, records: JoinedRecord[]): DayBucket {
  const evaluations = evaluationsOf(records);
  const responseTimes = records
    .map((record) => record.message.response_time_ms)
    .filter(isPresent);
  const faithfulnessScores = evaluations
    .map((evaluation) => evaluation.faithfulness_score)
    .filter(isPresent);
  const hallucinations = evaluations.filter((evaluation) => evaluation.hallucination_detected).length;

  return {
    date,
    messageCount: records.length,
    avgResponseTimeMs: mean(responseTimes),
    avgFaithfulness: mean(faithfulnessScores),
    hallucinationRatePct: percentage(hallucinations, evaluations.length),
  };
}

/**
 * Groups records by the UTC day of `created_at`, oldest day first.
 * Days without records are left out rather than zero-filled, and a day with
 * no scored evaluation has a null `avgFaithfulness`.
 */
export function dailySeries(
  records: JoinedRecord[],
  windowDays?: number,
  now: Date = new Date()
): DayBucket[] {
  const inWindow = windowDays === undefined ? records : withinWindow(records, windowDays, now);
  const days = new Map<string, JoinedRecord[]>();

  for (const record of inWindow) {
    const date = utcDateKey(record.message.created_at);
    const bucket = days.get(date);
    if (bucket) {
      bucket.push(record);
    } else {
      days.set(date, [record]);
    }
  }

  return Array.from(days.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, dayRecords]) => bucketFor(date, dayRecords));
}
