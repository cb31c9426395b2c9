/**
 * Bot Configuration
 *
 * Read from environment variables (.env is loaded by the entry point) and
 * validated with zod. Every problem is reported at once in a ConfigError.
 */

import { z } from 'zod';
import { ConfigError } from './utils/errors.ts';

// ============================================================
// Schema
// ============================================================

const TELEGRAM_TOKEN_PATTERN = /^\d+:[A-Za-z0-9_-]{35}$/;
const TRUTHY = new Set(['true', '1', 't', 'y', 'yes']);

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const intFromEnv = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().default(fallback));

const numberFromEnv = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().default(fallback));

const periodsFromEnv = z.preprocess(
  value => (typeof value === 'string' && value.trim() !== '' ? value.split(',').map(p => p.trim()) : undefined),
  z.array(z.coerce.number().int().positive()).nonempty().default([25, 50, 75, 100])
);

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string({ required_error: 'TELEGRAM_BOT_TOKEN is required' })
    .regex(TELEGRAM_TOKEN_PATTERN, "TELEGRAM_BOT_TOKEN must look like '123456:<35 characters>'"),
  TELEGRAM_CHAT_ID: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().refine(id => id !== 0, 'TELEGRAM_CHAT_ID must be a non-zero integer').optional()
  ),
  SYMBOL: z.preprocess(blankToUndefined, z.string().default('SPY')),
  SMA_PERIODS: periodsFromEnv,
  HISTORY_DAYS: intFromEnv(100).pipe(z.number().positive()),
  MONITORING_INTERVAL_MINUTES: intFromEnv(5).pipe(z.number().positive()),
  RETRY_MAX_ATTEMPTS: intFromEnv(5).pipe(z.number().positive()),
  RETRY_INITIAL_DELAY_SECONDS: numberFromEnv(30).pipe(z.number().positive()),
  RETRY_MAX_DELAY_SECONDS: numberFromEnv(300).pipe(z.number().positive()),
  TIMEZONE: z.preprocess(blankToUndefined, z.string().default('America/New_York')),
  SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  SUPABASE_ANON_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  DEBUG: z.preprocess(
    value => (typeof value === 'string' ? TRUTHY.has(value.trim().toLowerCase()) : value),
    z.boolean().default(false)
  ),
})
  .superRefine((env, ctx) => {
    const longest = Math.max(...env.SMA_PERIODS);
    if (env.HISTORY_DAYS < longest) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HISTORY_DAYS'],
        message: `HISTORY_DAYS (${env.HISTORY_DAYS}) must be at least the longest SMA period (${longest})`,
      });
    }
    if (env.RETRY_MAX_DELAY_SECONDS < env.RETRY_INITIAL_DELAY_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRY_MAX_DELAY_SECONDS'],
        message: 'RETRY_MAX_DELAY_SECONDS must not be smaller than RETRY_INITIAL_DELAY_SECONDS',
      });
    }
    if (!isValidTimeZone(env.TIMEZONE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TIMEZONE'],
        message: `Unknown time zone: ${env.TIMEZONE}`,
      });
    }
  });

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// ============================================================
// Config
// ============================================================

export interface BotConfig {
  telegramToken: string;
  /** Subscribed automatically at startup when set */
  defaultChatId: number | null;
  symbol: string;
  smaPeriods: number[];
  historyDays: number;
  monitoringIntervalMinutes: number;
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  timezone: string;
  supabase: { url: string; key: string } | null;
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => {
      const key = issue.path.join('.');
      return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
    }));
  }

  const values = parsed.data;
  const supabaseKey = values.SUPABASE_SERVICE_KEY ?? values.SUPABASE_ANON_KEY;

  return {
    telegramToken: values.TELEGRAM_BOT_TOKEN,
    defaultChatId: values.TELEGRAM_CHAT_ID ?? null,
    symbol: values.SYMBOL.trim().toUpperCase(),
    smaPeriods: Array.from(new Set(values.SMA_PERIODS)).sort((a, b) => a - b),
    historyDays: values.HISTORY_DAYS,
    monitoringIntervalMinutes: values.MONITORING_INTERVAL_MINUTES,
    retry: {
      maxAttempts: values.RETRY_MAX_ATTEMPTS,
      initialDelayMs: values.RETRY_INITIAL_DELAY_SECONDS * 1000,
      maxDelayMs: values.RETRY_MAX_DELAY_SECONDS * 1000,
    },
    timezone: values.TIMEZONE,
    supabase: values.SUPABASE_URL && supabaseKey ? { url: values.SUPABASE_URL, key: supabaseKey } : null,
    debug: values.DEBUG,
  };
}
