import { config } from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';
import { DEFAULT_LIMITS } from './shared/constants.js';
import { ConfigError } from './shared/errors.js';

// Load .env file before validation
config();

/** Treats empty strings (e.g. `TELEGRAM_BOT_TOKEN=`) as unset. */
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional(),
);

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

/**
 * Schema for all environment variables consumed by the scout.
 * Every variable has a default except the Telegram pair, which
 * enables chat delivery when both are present.
 */
const envSchema = z
  .object({
    // ---------- General ----------
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    // ---------- Scheduling ----------
    SCHEDULE_CRON: z
      .string()
      .default(DEFAULT_LIMITS.RUN_SCHEDULE)
      .refine((expr) => cron.validate(expr), 'SCHEDULE_CRON must be a valid cron expression'),
    RUN_ON_START: booleanFlag('true'),

    // ---------- Pipeline ----------
    VALIDATE_COUPONS: booleanFlag('true'),
    API_PAGE_COUNT: z.coerce.number().int().min(1).max(20).default(1),
    HISTORY_CAPACITY: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.HISTORY_CAPACITY),
    VALIDATION_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.VALIDATION_TIMEOUT_MS),
    REQUEST_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.REQUEST_TIMEOUT_MS),

    // ---------- Delivery ----------
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHANNEL_ID: optionalString,
    DELIVERY_DELAY_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_LIMITS.DELIVERY_DELAY_MS),
  })
  .refine(
    (e) => (e.TELEGRAM_BOT_TOKEN === undefined) === (e.TELEGRAM_CHANNEL_ID === undefined),
    {
      message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHANNEL_ID must be set together',
      path: ['TELEGRAM_CHANNEL_ID'],
    },
  );

export type Env = z.infer<typeof envSchema>;

/**
 * Parses and validates an environment map. Throws a ConfigError listing
 * every offending variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(
      `Invalid environment variables:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues,
    );
  }

  return result.data;
}
