import type { JoinedRecord, QuestionComplexity, QuestionType } from './recordTypes.js';

export interface MetricsSummary {
  totalMessages: number;
  messagesToday: number;
  avgResponseTimeMs: number;
  avgFaithfulness: number;
  hallucinationRate: number; // 0-100
}

export interface DayBucket {
  date: string; // YYYY-MM-DD (UTC)
  messageCount: number;
  avgResponseTimeMs: number | null;
  avgFaithfulness: number | null;
  hallucinationRatePct: number;
}

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

export interface Distributions {
  evaluatedCount: number;
  questionTypes: Partial<Record<QuestionType, number>>;
  complexities: Partial<Record<QuestionComplexity, number>>;
  highRiskCategories: Record<string, number>;
  faithfulnessHistogram: HistogramBin[];
}

export const FLAG_REASONS = [
  'hallucination',
  'capability_hallucination',
  'low_faithfulness',
  'inaccurate_citation',
] as const;

export type FlagReason = (typeof FLAG_REASONS)[number];

export type FlagSeverity = 'error' | 'warning';

export interface FlagResult {
  flagged: boolean;
  reasons: FlagReason[];
  severity: FlagSeverity | null;
}

export interface FlaggedRecord extends JoinedRecord {
  reasons: FlagReason[];
  severity: FlagSeverity;
}

export type FlagCounts = Record<FlagReason, number>;

export interface FlaggedBatch {
  flagged: FlaggedRecord[];
  counts: FlagCounts;
}
