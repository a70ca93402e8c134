import cron from 'node-cron';
import { z } from 'zod';
import { ConfigError } from '../domain/errors.js';

export const DEFAULT_CATEGORIES = [
  'Food',
  'Salary',
  'Needs',
  'Water',
  'Laundry',
  'Transportation',
  'Utilities',
  'Rent',
  'Bills',
] as const;

// Telegram caps callback_data at 64 bytes and categories travel as button payloads
const MAX_CATEGORY_BYTES = 64;

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).default(3000),

  // Bot credential and the single authorized account
  API_TOKEN: z
    .string({ required_error: 'API_TOKEN is required' })
    .regex(/^\d+:[A-Za-z0-9_-]+$/, { message: 'API_TOKEN must look like <bot id>:<secret>' }),
  ALLOWED_USER_ID: z.coerce.number().int().positive(),

  // Data storage
  DB_PATH: z.preprocess(emptyToUndefined, z.string().default('./data/ledger.db')),

  CATEGORIES: z.preprocess(
    (value) =>
      typeof value === 'string'
        ? value
            .split(',')
            .map((category) => category.trim())
            .filter((category) => category.length > 0)
        : [],
    z
      .array(
        z.string().refine((category) => Buffer.byteLength(category, 'utf8') <= MAX_CATEGORY_BYTES, {
          message: `Category names must fit in ${MAX_CATEGORY_BYTES} bytes`,
        })
      )
      .transform((categories) => (categories.length > 0 ? categories : [...DEFAULT_CATEGORIES]))
  ),

  // Reports
  LATEST_REPORT_COMMAND: z.preprocess(emptyToUndefined, z.string().optional()),
  WEEKLY_EXPENSE_REPORT_COMMAND: z.preprocess(emptyToUndefined, z.string().optional()),
  REPORT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000, { message: 'REPORT_TIMEOUT_MS must be at least 1000' })
    .default(60000),
  WEEKLY_REPORT_CRON: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .refine((expression) => cron.validate(expression), {
        message: 'WEEKLY_REPORT_CRON is not a valid cron expression',
      })
      .optional()
  ),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

export type EnvResult = { ok: true; env: Env } | { ok: false; error: ConfigError };

/**
 * Validates and parses environment variables.
 * Never exits; the process entry point decides what a failure means.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvResult {
  const parsed = envSchema.safeParse(source);
  if (parsed.success) {
    return { ok: true, env: parsed.data };
  }

  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return {
    ok: false,
    error: new ConfigError(`Environment validation failed:\n  - ${issues.join('\n  - ')}`, {
      issues,
    }),
  };
}
