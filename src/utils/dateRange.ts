import type { DateRange, DateRangeKey } from '../types/recordTypes.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

const RANGE_DAYS: Record<DateRangeKey, number | null> = {
  '7d': 7,
  '30d': 30,
  '90d': 90,
  all: null,
};

export const DATE_RANGE_LABELS: Record<DateRangeKey, string> = {
  '7d': 'Last 7 days',
  '30d': 'Last 30 days',
  '90d': 'Last 90 days',
  all: 'All time',
};

// Trend charts for "all time" still show the last 90 days
const ALL_TIME_SERIES_WINDOW_DAYS = 90;

// [now - N days, now), anchored to the instant of the call
export function resolveDateRange(key: DateRangeKey, now: Date = new Date()): DateRange {
  const days = RANGE_DAYS[key];

  return {
    start: days === null ? null : new Date(now.getTime() - days * DAY_MS),
    end: now,
  };
}

export function seriesWindowDays(key: DateRangeKey): number {
  return RANGE_DAYS[key] ?? ALL_TIME_SERIES_WINDOW_DAYS;
}

// YYYY-MM-DD of the UTC calendar day
export function utcDateKey(value: string | Date): string {
  const date = typeof value === 'string' ? new Date(value) : value;
  return date.toISOString().slice(0, 10);
}
