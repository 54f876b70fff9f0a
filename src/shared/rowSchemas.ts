import { z } from 'zod';
import { QUESTION_COMPLEXITIES, QUESTION_TYPES } from '../types/recordTypes.js';
import type { Evaluation, Message } from '../types/recordTypes.js';

// Nullable columns come back as null, or are missing from narrowed selects.
// Both read as null here, and as false for boolean flags.
const nullableText = z.string().nullish().transform((value) => value ?? null);
const nullableNumber = z.number().nullish().transform((value) => value ?? null);
const nullableBoolean = z.boolean().nullish().transform((value) => value ?? null);
const flag = z.boolean().nullish().transform((value) => value === true);

const recordIdSchema = z.union([z.string().min(1), z.number()]);

// `timestamp` columns arrive without an offset; they hold UTC wall time
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

const timestampSchema = z
  .string()
  .transform((value) => (NAIVE_DATETIME.test(value) ? `${value.replace(' ', 'T')}Z` : value))
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

const sourceCitationSchema = z.union([
  z.string(),
  z.object({
    title: z.string().nullish(),
    url: z.string().nullish(),
  }),
]);

export const messageRowSchema: z.ZodType<Message, z.ZodTypeDef, unknown> = z.object({
  id: recordIdSchema,
  created_at: timestampSchema,
  question: nullableText,
  response: nullableText,
  response_time_ms: nullableNumber,
  model_used: nullableText,
  sources_cited: z.array(sourceCitationSchema).nullish().transform((value) => value ?? null),
  slack_channel: nullableText,
  slack_thread_ts: nullableText,
});

export const evaluationRowSchema: z.ZodType<Evaluation, z.ZodTypeDef, unknown> = z.object({
  message_id: recordIdSchema,
  faithfulness_score: nullableNumber,
  completeness_score: nullableNumber,
  clarity_score: nullableNumber,
  hallucination_detected: flag,
  capability_hallucination: flag,
  citation_accurate: nullableBoolean,
  hallucination_reasoning: nullableText,
  faithfulness_reasoning: nullableText,
  overall_assessment: nullableText,
  question_type: z.enum(QUESTION_TYPES).nullish().transform((value) => value ?? null),
  question_complexity: z.enum(QUESTION_COMPLEXITIES).nullish().transform((value) => value ?? null),
  is_high_risk_topic: flag,
  high_risk_category: nullableText,
});
