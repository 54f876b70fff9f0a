import { describe, expect, it } from 'vitest';

import { distributions, summarize } from '../src/services/metricsAggregator.js';
import { NOW, joined, makeEvaluation, makeMessage } from './helpers/fixtures.js';

describe('summarize', () => {
  it('returns an all-zero summary for no records', () => {
    expect(summarize([], NOW)).toEqual({
      totalMessages: 0,
      messagesToday: 0,
      avgResponseTimeMs: 0,
      avgFaithfulness: 0,
      hallucinationRate: 0,
    });
  });

  it('reports zero faithfulness and hallucination rate when nothing is evaluated', () => {
    const records = [joined(makeMessage(1, { created_at: '2026-10-01T08:00:00.000Z', response_time_ms: 200 }))];

    expect(summarize(records, NOW)).toEqual({
      totalMessages: 1,
      messagesToday: 0,
      avgResponseTimeMs: 200,
      avgFaithfulness: 0,
      hallucinationRate: 0,
    });
  });

  it('averages only present values and rounds each metric', () => {
    const records = [
      joined(
        makeMessage(1, { response_time_ms: 100 }),
        makeEvaluation(1, { faithfulness_score: 0.9, hallucination_detected: true })
      ),
      joined(
        makeMessage(2, { created_at: '2026-10-18T23:59:59.999Z', response_time_ms: 250 }),
        makeEvaluation(2, { faithfulness_score: 0.7 })
      ),
      joined(makeMessage(3, { response_time_ms: null })),
      joined(makeMessage(4, { response_time_ms: 301 }), makeEvaluation(4, { faithfulness_score: null })),
    ];

    expect(summarize(records, NOW)).toEqual({
      totalMessages: 4,
      messagesToday: 3,
      avgResponseTimeMs: 217,
      avgFaithfulness: 0.8,
      hallucinationRate: 33.3,
    });
  });

  it('counts today by UTC calendar date', () => {
    const records = [
      joined(makeMessage(1, { created_at: '2026-10-19T00:00:00.000Z' })),
      joined(makeMessage(2, { created_at: '2026-10-18T23:59:59.999Z' })),
      joined(makeMessage(3, { created_at: '2026-10-19T14:59:59.000+00:00' })),
    ];

    expect(summarize(records, NOW).messagesToday).toBe(2);
  });

  it('keeps the hallucination rate within 0-100', () => {
    const allBad = [1, 2, 3].map((id) =>
      joined(makeMessage(id), makeEvaluation(id, { hallucination_detected: true }))
    );
    const twoOfThree = allBad.map((record, i) =>
      i === 0 ? joined(record.message, makeEvaluation(1)) : record
    );

    expect(summarize(allBad, NOW).hallucinationRate).toBe(100);
    expect(summarize(twoOfThree, NOW).hallucinationRate).toBe(66.7);
  });

  it('rounds a tied hallucination rate to the even digit', () => {
    const records = Array.from({ length: 16 }, (_, i) =>
      joined(makeMessage(i + 1), makeEvaluation(i + 1, { hallucination_detected: i < 1 }))
    );
    const threeOfSixteen = records.map((record, i) =>
      i < 3 ? joined(record.message, makeEvaluation(i + 1, { hallucination_detected: true })) : record
    );

    expect(summarize(records, NOW).hallucinationRate).toBe(6.2);
    expect(summarize(threeOfSixteen, NOW).hallucinationRate).toBe(18.8);
  });

  it('rounds a tied average response time to the even millisecond', () => {
    const down = [200, 201].map((ms, i) => joined(makeMessage(i + 1, { response_time_ms: ms })));
    const up = [201, 202].map((ms, i) => joined(makeMessage(i + 1, { response_time_ms: ms })));

    expect(summarize(down, NOW).avgResponseTimeMs).toBe(200);
    expect(summarize(up, NOW).avgResponseTimeMs).toBe(202);
  });

  it('rounds a tied average faithfulness to the even third decimal', () => {
    const down = [joined(makeMessage(1), makeEvaluation(1, { faithfulness_score: 0.0625 }))];
    const up = [
      joined(makeMessage(1), makeEvaluation(1, { faithfulness_score: 0.125 })),
      joined(makeMessage(2), makeEvaluation(2, { faithfulness_score: 0.25 })),
    ];

    expect(summarize(down, NOW).avgFaithfulness).toBe(0.062);
    expect(summarize(up, NOW).avgFaithfulness).toBe(0.188);
  });

  it('counts totalMessages as the number of input records', () => {
    const records = Array.from({ length: 12 }, (_, i) => joined(makeMessage(i + 1)));

    expect(summarize(records, NOW).totalMessages).toBe(12);
  });
});

describe('distributions', () => {
  it('counts only evaluated records', () => {
    const records = [
      joined(makeMessage(1), makeEvaluation(1, { question_type: 'pricing', question_complexity: 'simple' })),
      joined(makeMessage(2), makeEvaluation(2, { question_type: 'pricing', question_complexity: 'complex' })),
      joined(makeMessage(3), makeEvaluation(3, { question_type: 'troubleshooting', question_complexity: null })),
      joined(makeMessage(4)),
    ];

    const result = distributions(records);

    expect(result.evaluatedCount).toBe(3);
    expect(result.questionTypes).toEqual({ pricing: 2, troubleshooting: 1 });
    expect(result.complexities).toEqual({ simple: 1, complex: 1 });
  });

  it('groups high-risk records by category', () => {
    const records = [
      joined(makeMessage(1), makeEvaluation(1, { is_high_risk_topic: true, high_risk_category: 'security' })),
      joined(makeMessage(2), makeEvaluation(2, { is_high_risk_topic: true, high_risk_category: 'security' })),
      joined(makeMessage(3), makeEvaluation(3, { is_high_risk_topic: true, high_risk_category: null })),
      joined(makeMessage(4), makeEvaluation(4, { is_high_risk_topic: false, high_risk_category: 'legal' })),
    ];

    expect(distributions(records).highRiskCategories).toEqual({ security: 2, unknown: 1 });
  });

  it('bins faithfulness scores into ten buckets with 1.0 in the last', () => {
    const scores = [0.05, 0.3, 0.7, 0.95, 1, null];
    const records = scores.map((score, i) =>
      joined(makeMessage(i + 1), makeEvaluation(i + 1, { faithfulness_score: score }))
    );

    const histogram = distributions(records).faithfulnessHistogram;

    expect(histogram).toHaveLength(10);
    expect(histogram[0]).toEqual({ from: 0, to: 0.1, count: 1 });
    expect(histogram[3]).toEqual({ from: 0.3, to: 0.4, count: 1 });
    expect(histogram[7]?.count).toBe(1);
    expect(histogram[9]).toEqual({ from: 0.9, to: 1, count: 2 });
    expect(histogram.reduce((sum, bin) => sum + bin.count, 0)).toBe(5);
  });
});
