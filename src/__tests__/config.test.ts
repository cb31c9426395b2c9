import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.ts';
import { ConfigError } from '../utils/errors.ts';

const TOKEN = `123456:${'x'.repeat(35)}`;

function configErrorFor(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ TELEGRAM_BOT_TOKEN: TOKEN })).toEqual({
      telegramToken: TOKEN,
      defaultChatId: null,
      symbol: 'SPY',
      smaPeriods: [25, 50, 75, 100],
      historyDays: 100,
      monitoringIntervalMinutes: 5,
      retry: { maxAttempts: 5, initialDelayMs: 30_000, maxDelayMs: 300_000 },
      timezone: 'America/New_York',
      supabase: null,
      debug: false,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: TOKEN,
      TELEGRAM_CHAT_ID: '-100123',
      SYMBOL: ' qqq ',
      SMA_PERIODS: '50, 10,50',
      HISTORY_DAYS: '60',
      MONITORING_INTERVAL_MINUTES: '10',
      RETRY_MAX_ATTEMPTS: '2',
      RETRY_INITIAL_DELAY_SECONDS: '1.5',
      RETRY_MAX_DELAY_SECONDS: '10',
      TIMEZONE: 'Europe/London',
      DEBUG: 'yes',
    });

    expect(config).toMatchObject({
      defaultChatId: -100123,
      symbol: 'QQQ',
      smaPeriods: [10, 50],
      historyDays: 60,
      monitoringIntervalMinutes: 10,
      retry: { maxAttempts: 2, initialDelayMs: 1_500, maxDelayMs: 10_000 },
      timezone: 'Europe/London',
      debug: true,
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ TELEGRAM_BOT_TOKEN: TOKEN, TELEGRAM_CHAT_ID: '', SMA_PERIODS: ' ', HISTORY_DAYS: '' });

    expect(config.defaultChatId).toBeNull();
    expect(config.smaPeriods).toEqual([25, 50, 75, 100]);
    expect(config.historyDays).toBe(100);
  });

  it('prefers the service key for Supabase', () => {
    const base = { TELEGRAM_BOT_TOKEN: TOKEN, SUPABASE_URL: 'http://localhost:54321' };

    expect(loadConfig({ ...base, SUPABASE_ANON_KEY: 'test-anon-key' }).supabase).toEqual({
      url: 'http://localhost:54321',
      key: 'test-anon-key',
    });
    expect(loadConfig({ ...base, SUPABASE_ANON_KEY: 'test-anon-key', SUPABASE_SERVICE_KEY: 'test-service-key' }).supabase)
      .toEqual({ url: 'http://localhost:54321', key: 'test-service-key' });
    expect(loadConfig(base).supabase).toBeNull();
  });

  it('requires the bot token', () => {
    const error = configErrorFor({});

    expect(error.issues).toContain('TELEGRAM_BOT_TOKEN is required');
    expect(error.message.startsWith('Invalid configuration:\n  - ')).toBe(true);
  });

  it('rejects a malformed token', () => {
    expect(configErrorFor({ TELEGRAM_BOT_TOKEN: 'not-a-token' }).issues).toEqual([
      "TELEGRAM_BOT_TOKEN must look like '123456:<35 characters>'",
    ]);
  });

  it('rejects a zero chat id', () => {
    expect(configErrorFor({ TELEGRAM_BOT_TOKEN: TOKEN, TELEGRAM_CHAT_ID: '0' }).issues).toEqual([
      'TELEGRAM_CHAT_ID must be a non-zero integer',
    ]);
  });

  it('requires enough history for the longest period', () => {
    expect(configErrorFor({ TELEGRAM_BOT_TOKEN: TOKEN, HISTORY_DAYS: '50' }).issues).toEqual([
      'HISTORY_DAYS (50) must be at least the longest SMA period (100)',
    ]);
  });

  it('rejects a max delay below the initial delay', () => {
    expect(configErrorFor({
      TELEGRAM_BOT_TOKEN: TOKEN,
      RETRY_INITIAL_DELAY_SECONDS: '60',
      RETRY_MAX_DELAY_SECONDS: '30',
    }).issues).toEqual(['RETRY_MAX_DELAY_SECONDS must not be smaller than RETRY_INITIAL_DELAY_SECONDS']);
  });

  it('prefixes issues with the variable name', () => {
    expect(configErrorFor({ TELEGRAM_BOT_TOKEN: TOKEN, TIMEZONE: 'Mars/Olympus' }).issues).toEqual([
      'TIMEZONE: Unknown time zone: Mars/Olympus',
    ]);
  });

  it('rejects non-numeric intervals', () => {
    const { issues } = configErrorFor({ TELEGRAM_BOT_TOKEN: TOKEN, MONITORING_INTERVAL_MINUTES: 'often' });

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('MONITORING_INTERVAL_MINUTES: ')).toBe(true);
  });
});
