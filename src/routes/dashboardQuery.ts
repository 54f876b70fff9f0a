import { z } from 'zod';
import type { AppConfig } from '../shared/config.js';
import { InvalidCriteriaError } from '../shared/errors.js';
import {
  DATE_RANGE_KEYS,
  QUESTION_COMPLEXITIES,
  QUESTION_TYPES,
} from '../types/recordTypes.js';

type DashboardDefaults = AppConfig['dashboard'];

const ALL = 'All';

const booleanParam = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const searchParam = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const questionTypeParam = z
  .union([z.literal(ALL), z.enum(QUESTION_TYPES)])
  .optional()
  .transform((value) => (value === undefined || value === ALL ? null : value));

const complexityParam = z
  .union([z.literal(ALL), z.enum(QUESTION_COMPLEXITIES)])
  .optional()
  .transform((value) => (value === undefined || value === ALL ? null : value));

// `?threshold=` is a missing value, not zero
function numberParam(schema: z.ZodNumber, fallback: number) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema.default(fallback)
  );
}

export function buildQuerySchemas(defaults: DashboardDefaults) {
  const range = z.enum(DATE_RANGE_KEYS).default(defaults.defaultRange);

  return {
    range: z.object({ range }),

    messages: z.object({
      range,
      search: searchParam,
      question_type: questionTypeParam,
      complexity: complexityParam,
      high_risk: booleanParam,
      page: numberParam(z.coerce.number().int().min(1), 1),
      limit: numberParam(z.coerce.number().int().min(1).max(100), defaults.pageSize),
    }),

    flagged: z.object({
      range,
      threshold: numberParam(z.coerce.number().min(0).max(1), defaults.faithfulnessThreshold),
      limit: numberParam(z.coerce.number().int().min(1).max(1000), defaults.flaggedLimit),
    }),
  };
}

export type QuerySchemas = ReturnType<typeof buildQuerySchemas>;

export function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const parsed = schema.safeParse(query);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
      .join('; ');
    throw new InvalidCriteriaError(`Invalid query parameters: ${issues}`, { cause: parsed.error });
  }

  return parsed.data;
}
