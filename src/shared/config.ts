import dotenv from 'dotenv';
import { z } from 'zod';
import { DATE_RANGE_KEYS } from '../types/recordTypes.js';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  // Supabase
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  SUPABASE_MESSAGES_TABLE: z.string().min(1).default('qa_messages'),
  SUPABASE_EVALUATIONS_TABLE: z.string().min(1).default('qa_evaluations'),

  // Server
  PORT: z.coerce.number().int().positive().default(8080),

  // Dashboard defaults
  DEFAULT_RANGE: z.enum(DATE_RANGE_KEYS).default('30d'),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(25),
  FLAGGED_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
  FAITHFULNESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;

  return {
    supabase: {
      url: vars.SUPABASE_URL,
      serviceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY,
      messagesTable: vars.SUPABASE_MESSAGES_TABLE,
      evaluationsTable: vars.SUPABASE_EVALUATIONS_TABLE,
    },

    server: {
      port: vars.PORT,
    },

    dashboard: {
      defaultRange: vars.DEFAULT_RANGE,
      pageSize: vars.PAGE_SIZE,
      flaggedLimit: vars.FLAGGED_LIMIT,
      faithfulnessThreshold: vars.FAITHFULNESS_THRESHOLD,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
