/**
 * Alert Dispatcher
 *
 * Sends crossover alerts (chart photo + caption) to one chat or to every
 * subscriber:
 * - Bounded retries per recipient with a fresh upload payload each attempt
 * - Plain-text fallback when the chart cannot be rendered
 * - One recipient's failure never blocks the others
 */

import { InputFile } from 'grammy';
import type { PricePoint } from '../market/types.ts';
import type { UserSubscriptionManager } from '../subscriptions/subscription-manager.ts';
import { DispatchError, errorMessage } from '../utils/errors.ts';
import { retryWithBackoff, type SleepFn } from '../utils/retry.ts';
import type { ChartRenderer } from './chart-generator.ts';

/** The slice of grammy's bot.api the dispatcher needs */
export interface AlertSender {
  sendPhoto(chatId: number, photo: InputFile, other?: { caption?: string }): Promise<unknown>;
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

export interface AlertDispatcherOptions {
  /** Attempts per recipient (default: 3) */
  maxRetries?: number;
  /** Pause between attempts (default: 100ms) */
  retryDelayMs?: number;
  sleep?: SleepFn;
}

export class AlertDispatcher {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: SleepFn;

  constructor(
    private readonly sender: AlertSender,
    private readonly subscriptions: UserSubscriptionManager,
    private readonly charts: ChartRenderer,
    options: AlertDispatcherOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.sleep = options.sleep;
  }

  /**
   * Send one alert to one chat. Returns false (never throws) when every
   * attempt failed.
   */
  async sendAlert(chatId: number, message: string, series: readonly PricePoint[]): Promise<boolean> {
    const chart = await this.renderChart(series);
    return this.deliver(chatId, message, chart);
  }

  /**
   * Broadcast to every subscriber. The chart is rendered once and shared.
   */
  async sendAlertToAll(message: string, series: readonly PricePoint[]): Promise<Map<number, boolean>> {
    const results = new Map<number, boolean>();
    const chatIds = await this.subscriptions.getAllSubscribers();
    if (chatIds.length === 0) {
      console.log('[AlertDispatcher] No subscribers, alert not sent');
      return results;
    }

    const chart = await this.renderChart(series);
    for (const chatId of chatIds) {
      results.set(chatId, await this.deliver(chatId, message, chart));
    }

    const delivered = Array.from(results.values()).filter(Boolean).length;
    console.log(`[AlertDispatcher] Alert delivered to ${delivered}/${chatIds.length} subscribers`);
    return results;
  }

  private async renderChart(series: readonly PricePoint[]): Promise<Buffer | null> {
    try {
      return await this.charts.render(series);
    } catch (error) {
      console.error('[AlertDispatcher] Chart generation failed, sending text only:', errorMessage(error));
      return null;
    }
  }

  private async deliver(chatId: number, message: string, chart: Buffer | null): Promise<boolean> {
    const result = await retryWithBackoff(
      async () => {
        try {
          if (chart) {
            // InputFile streams are single-use; build a new one per attempt
            await this.sender.sendPhoto(chatId, new InputFile(chart, 'chart.png'), { caption: message });
          } else {
            await this.sender.sendMessage(chatId, message);
          }
        } catch (error) {
          throw new DispatchError(chatId, errorMessage(error), { cause: error });
        }
      },
      {
        maxAttempts: this.maxRetries,
        initialDelayMs: this.retryDelayMs,
        maxDelayMs: this.retryDelayMs,
        multiplier: 1,
        sleep: this.sleep,
        onRetry: (attempt, error) => {
          console.warn(
            `[AlertDispatcher] Send failed (attempt ${attempt}/${this.maxRetries}) for chat ${chatId}: ${errorMessage(error)}`
          );
        },
      }
    );

    if (!result.ok) {
      console.error(
        `[AlertDispatcher] Giving up on chat ${chatId} after ${result.attempts} attempts: ${errorMessage(result.error)}`
      );
    }
    return result.ok;
  }
}
