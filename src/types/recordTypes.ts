export const QUESTION_TYPES = [
  'how_to',
  'can_we',
  'what_is',
  'troubleshooting',
  'pricing',
  'integration',
  'other',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const QUESTION_COMPLEXITIES = ['simple', 'moderate', 'complex'] as const;

export type QuestionComplexity = (typeof QUESTION_COMPLEXITIES)[number];

export type RecordId = string | number;

export type SourceCitation = string | { title?: string | null; url?: string | null };

export interface Message {
  id: RecordId;
  created_at: string; // ISO timestamp, the only time axis
  question: string | null;
  response: string | null;
  response_time_ms: number | null;
  model_used: string | null;
  sources_cited: SourceCitation[] | null;
  slack_channel: string | null;
  slack_thread_ts: string | null;
}

export interface Evaluation {
  message_id: RecordId;
  faithfulness_score: number | null; // 0-1
  completeness_score: number | null; // 0-1
  clarity_score: number | null; // 0-1
  hallucination_detected: boolean;
  capability_hallucination: boolean;
  citation_accurate: boolean | null;
  hallucination_reasoning: string | null;
  faithfulness_reasoning: string | null;
  overall_assessment: string | null;
  question_type: QuestionType | null;
  question_complexity: QuestionComplexity | null;
  is_high_risk_topic: boolean;
  high_risk_category: string | null;
}

// A message left-joined with one of its evaluations
export interface JoinedRecord {
  message: Message;
  evaluation: Evaluation | null;
}

export interface FilterCriteria {
  search?: string | null;
  questionType?: QuestionType | null;
  complexity?: QuestionComplexity | null;
  highRiskOnly?: boolean;
}

export interface Pagination {
  limit: number;
  offset: number;
}

export const DATE_RANGE_KEYS = ['7d', '30d', '90d', 'all'] as const;

export type DateRangeKey = (typeof DATE_RANGE_KEYS)[number];

// Half-open interval [start, end); a null start means no lower bound
export interface DateRange {
  start: Date | null;
  end: Date;
}
