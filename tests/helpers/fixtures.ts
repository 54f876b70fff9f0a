import type { Evaluation, JoinedRecord, Message, RecordId } from '../../src/types/recordTypes.js';

export const NOW = new Date('2026-10-19T15:00:00.000Z');

export function makeMessage(id: RecordId, overrides: Partial<Message> = {}): Message {
  return {
    id,
    created_at: '2026-10-19T09:00:00.000Z',
    question: `How do I export report ${id}?`,
    response: 'Open Reports and choose Export.',
    response_time_ms: 1200,
    model_used: 'test-model',
    sources_cited: [{ title: 'Exporting reports', url: 'https://docs.example.com/export' }],
    slack_channel: 'C0TEST',
    slack_thread_ts: '1700000000.000100',
    ...overrides,
  };
}

export function makeEvaluation(messageId: RecordId, overrides: Partial<Evaluation> = {}): Evaluation {
  return {
    message_id: messageId,
    faithfulness_score: 0.9,
    completeness_score: 0.8,
    clarity_score: 0.85,
    hallucination_detected: false,
    capability_hallucination: false,
    citation_accurate: true,
    hallucination_reasoning: null,
    faithfulness_reasoning: null,
    overall_assessment: 'Accurate and complete.',
    question_type: 'how_to',
    question_complexity: 'simple',
    is_high_risk_topic: false,
    high_risk_category: null,
    ...overrides,
  };
}

export function joined(message: Message, evaluation: Evaluation | null = null): JoinedRecord {
  return { message, evaluation };
}
