/**
 * Application Wiring
 *
 * Builds the bot and the monitoring service from a BotConfig. Collaborators
 * can be overridden (tests, alternative data sources).
 */

import { createClient } from '@supabase/supabase-js';
import { Bot } from 'grammy';
import { AlertDispatcher } from './alerts/alert-dispatcher.ts';
import { SvgChartRenderer, type ChartRenderer } from './alerts/chart-generator.ts';
import { createCommandHandlers, registerCommands } from './bot/commands.ts';
import type { BotConfig } from './config.ts';
import { YahooPriceDataService, type PriceDataProvider } from './market/price-data.ts';
import { MonitoringService } from './monitoring/monitoring-service.ts';
import { InMemorySubscriptionStore } from './subscriptions/memory-store.ts';
import { UserSubscriptionManager } from './subscriptions/subscription-manager.ts';
import { SupabaseSubscriptionStore } from './subscriptions/supabase-store.ts';
import type { SubscriptionStore } from './subscriptions/types.ts';
import { errorMessage } from './utils/errors.ts';

export interface AppOverrides {
  store?: SubscriptionStore;
  priceData?: PriceDataProvider;
  charts?: ChartRenderer;
}

export interface App {
  bot: Bot;
  subscriptions: UserSubscriptionManager;
  monitoring: MonitoringService;
  start(): Promise<void>;
  stop(): Promise<void>;
}

function createStore(config: BotConfig): SubscriptionStore {
  if (!config.supabase) {
    console.log('[App] Supabase not configured, subscriptions kept in memory');
    return new InMemorySubscriptionStore();
  }
  const supabase = createClient(config.supabase.url, config.supabase.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return new SupabaseSubscriptionStore(supabase);
}

export function createApp(config: BotConfig, overrides: AppOverrides = {}): App {
  const bot = new Bot(config.telegramToken);
  const subscriptions = new UserSubscriptionManager(overrides.store ?? createStore(config));
  const priceData = overrides.priceData ?? new YahooPriceDataService({ symbol: config.symbol });
  const charts = overrides.charts ?? new SvgChartRenderer({ symbol: config.symbol, periods: config.smaPeriods });

  registerCommands(bot, createCommandHandlers({
    subscriptions,
    priceData,
    charts,
    symbol: config.symbol,
    periods: config.smaPeriods,
    historyDays: config.historyDays,
  }));

  bot.catch(err => {
    console.error('[App] Bot error caught:', errorMessage(err.error));
  });

  const dispatcher = new AlertDispatcher(bot.api, subscriptions, charts);
  const monitoring = new MonitoringService(priceData, dispatcher, {
    periods: config.smaPeriods,
    historyDays: config.historyDays,
    maxRetries: config.retry.maxAttempts,
    initialBackoffMs: config.retry.initialDelayMs,
    maxBackoffMs: config.retry.maxDelayMs,
    format: { symbol: config.symbol, timezone: config.timezone },
    debug: config.debug,
  });

  const controller = new AbortController();
  let polling: Promise<void> | null = null;
  let monitoringLoop: Promise<void> | null = null;

  return {
    bot,
    subscriptions,
    monitoring,

    async start() {
      if (config.defaultChatId !== null) {
        await subscriptions.subscribeUser(config.defaultChatId);
      }

      polling = bot.start({
        onStart: info => console.log(`[App] Bot @${info.username} is running`),
      });
      monitoringLoop = monitoring.startMonitoring(config.monitoringIntervalMinutes, {
        signal: controller.signal,
      });

      await Promise.all([polling, monitoringLoop]);
    },

    async stop() {
      console.log('[App] Shutting down...');
      controller.abort();
      if (bot.isInited()) {
        await bot.stop();
      }
      await Promise.allSettled([polling, monitoringLoop].filter((p): p is Promise<void> => p !== null));
    },
  };
}
