/**
 * Bot Commands
 *
 * /start  - subscribe the chat to crossover alerts
 * /stop   - unsubscribe
 * /status - subscription state, current price, SMAs and chart
 * /help   - command list
 */

import { InputFile, type Bot } from 'grammy';
import type { ChartRenderer } from '../alerts/chart-generator.ts';
import {
  formatAlreadySubscribed,
  formatDataUnavailable,
  formatHelpMessage,
  formatNotSubscribed,
  formatStatusMessage,
  formatSubscribeConfirmation,
  formatUnsubscribeConfirmation,
} from '../alerts/message-formatter.ts';
import { isValidPrice, validatePriceData, type PriceDataProvider } from '../market/price-data.ts';
import { calculateAllSMAs } from '../market/sma-calculator.ts';
import type { PricePoint } from '../market/types.ts';
import type { UserSubscriptionManager } from '../subscriptions/subscription-manager.ts';
import { errorMessage } from '../utils/errors.ts';

// ============================================================
// Types
// ============================================================

/** The part of a grammy Context the handlers use */
export interface CommandContext {
  chat?: { id: number };
  reply(text: string): Promise<unknown>;
  replyWithPhoto(photo: InputFile, other?: { caption?: string }): Promise<unknown>;
}

export interface CommandDeps {
  subscriptions: UserSubscriptionManager;
  priceData: PriceDataProvider;
  charts: ChartRenderer;
  symbol: string;
  periods: readonly number[];
  historyDays: number;
}

export type CommandHandler = (ctx: CommandContext) => Promise<void>;

export interface CommandHandlers {
  start: CommandHandler;
  stop: CommandHandler;
  status: CommandHandler;
  help: CommandHandler;
}

// ============================================================
// Handlers
// ============================================================

export function createCommandHandlers(deps: CommandDeps): CommandHandlers {
  const { subscriptions, priceData, charts, symbol, periods, historyDays } = deps;

  return {
    async start(ctx) {
      if (!ctx.chat) return;
      const added = await subscriptions.subscribeUser(ctx.chat.id);
      await ctx.reply(added ? formatSubscribeConfirmation(symbol) : formatAlreadySubscribed(symbol));
    },

    async stop(ctx) {
      if (!ctx.chat) return;
      const removed = await subscriptions.unsubscribeUser(ctx.chat.id);
      await ctx.reply(removed ? formatUnsubscribeConfirmation(symbol) : formatNotSubscribed(symbol));
    },

    async status(ctx) {
      if (!ctx.chat) return;
      const subscribed = await subscriptions.isSubscribed(ctx.chat.id);

      let currentPrice: number;
      let series: PricePoint[];
      try {
        currentPrice = await priceData.fetchCurrentPrice();
        series = await priceData.fetchHistoricalPrices(historyDays);
      } catch (error) {
        console.warn('[Commands] /status price fetch failed:', errorMessage(error));
        await ctx.reply(formatDataUnavailable(symbol));
        return;
      }
      if (!isValidPrice(currentPrice) || !validatePriceData(series)) {
        console.warn('[Commands] /status received invalid price data');
        await ctx.reply(formatDataUnavailable(symbol));
        return;
      }

      const smas = calculateAllSMAs(series.map(p => p.close), periods);
      const caption = formatStatusMessage(subscribed, currentPrice, smas, { symbol, periods });

      let chart: Buffer;
      try {
        chart = await charts.render(series);
      } catch (error) {
        console.error('[Commands] /status chart generation failed:', errorMessage(error));
        await ctx.reply(caption);
        return;
      }
      await ctx.replyWithPhoto(new InputFile(chart, 'chart.png'), { caption });
    },

    async help(ctx) {
      await ctx.reply(formatHelpMessage(symbol, periods));
    },
  };
}

export function registerCommands(bot: Bot, handlers: CommandHandlers): void {
  bot.command('start', ctx => handlers.start(ctx));
  bot.command('stop', ctx => handlers.stop(ctx));
  bot.command('status', ctx => handlers.status(ctx));
  bot.command('help', ctx => handlers.help(ctx));
}
