/**
 * Monitoring Service
 *
 * Periodically samples the price and its SMAs, classifies crossovers and
 * hands them to the alert dispatcher.
 *
 * One instance monitors one instrument and exclusively owns its
 * PositionState and last observed series. State is committed only after a
 * successful classify step; a failed or cancelled fetch leaves it untouched.
 *
 * Phases: idle -> fetching -> classifying -> dispatching -> sleeping -> fetching ...
 * The loop only ends when the caller's signal aborts (phase 'stopped');
 * an AbortError raised by a provider on its own is an ordinary failure.
 */

import { formatCrossoverMessage, type FormatOptions } from '../alerts/message-formatter.ts';
import { detectCrossovers, updateCrossoverState } from '../market/crossover-detector.ts';
import { isValidPrice, validatePriceData, type PriceDataProvider } from '../market/price-data.ts';
import { calculateAllSMAs, DEFAULT_SMA_PERIODS, presentSMAs } from '../market/sma-calculator.ts';
import type { CrossoverEvent, PositionState, PricePoint } from '../market/types.ts';
import { errorMessage } from '../utils/errors.ts';
import { defaultSleep, retryWithBackoff, type RetryResult, type SleepFn } from '../utils/retry.ts';

// ============================================================
// Types
// ============================================================

export type MonitoringPhase = 'idle' | 'fetching' | 'classifying' | 'dispatching' | 'sleeping' | 'stopped';

/** The slice of AlertDispatcher the loop needs */
export interface AlertBroadcaster {
  sendAlertToAll(message: string, series: readonly PricePoint[]): Promise<Map<number, boolean>>;
}

export interface DispatchReport {
  event: CrossoverEvent;
  message: string;
  /** chat id -> delivered; empty when the broadcast itself failed */
  results: Map<number, boolean>;
  error?: string;
}

export interface MonitoringOptions {
  periods?: readonly number[];
  /** Daily closes requested per cycle (default: 100) */
  historyDays?: number;
  /** Fetch attempts per operation (default: 5) */
  maxRetries?: number;
  /** First backoff delay (default: 30s) */
  initialBackoffMs?: number;
  /** Backoff cap (default: 300s) */
  maxBackoffMs?: number;
  format?: FormatOptions;
  sleep?: SleepFn;
  now?: () => Date;
  debug?: boolean;
}

export interface StartMonitoringOptions {
  signal?: AbortSignal;
  /** Stop after this many iterations (tests and one-shot runs) */
  iterations?: number;
}

export interface MonitoringStats {
  iterations: number;
  skippedIterations: number;
  crossoversDetected: number;
  lastCheck: Date | null;
  lastError: string | null;
}

export const MIN_INTERVAL_MINUTES = 1;
export const MAX_INTERVAL_MINUTES = 15;

export function clampIntervalMinutes(minutes: number): number {
  if (!Number.isFinite(minutes)) return MAX_INTERVAL_MINUTES;
  return Math.max(MIN_INTERVAL_MINUTES, Math.min(MAX_INTERVAL_MINUTES, minutes));
}

// ============================================================
// Monitoring Service
// ============================================================

export class MonitoringService {
  private previousStates: PositionState = new Map();
  private lastSeries: PricePoint[] = [];
  private phase: MonitoringPhase = 'idle';
  private running = false;

  private readonly periods: readonly number[];
  private readonly historyDays: number;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly format: FormatOptions;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly debug: boolean;

  private stats: MonitoringStats = {
    iterations: 0,
    skippedIterations: 0,
    crossoversDetected: 0,
    lastCheck: null,
    lastError: null,
  };

  constructor(
    private readonly priceData: PriceDataProvider,
    private readonly dispatcher: AlertBroadcaster,
    options: MonitoringOptions = {}
  ) {
    this.periods = options.periods ?? DEFAULT_SMA_PERIODS;
    this.historyDays = options.historyDays ?? 100;
    this.maxRetries = options.maxRetries ?? 5;
    this.initialBackoffMs = options.initialBackoffMs ?? 30_000;
    this.maxBackoffMs = options.maxBackoffMs ?? 300_000;
    this.format = { ...options.format, periods: this.periods };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.debug = options.debug ?? false;
  }

  getPhase(): MonitoringPhase {
    return this.phase;
  }

  getPreviousStates(): PositionState {
    return this.previousStates;
  }

  getLastSeries(): readonly PricePoint[] {
    return this.lastSeries;
  }

  getStats(): MonitoringStats {
    return { ...this.stats };
  }

  /**
   * Fetch, validate and classify one observation. Returns [] without
   * touching state when data cannot be fetched or fails validation.
   * Only cancellation propagates, as `signal.reason`.
   */
  async checkForCrossovers(signal?: AbortSignal): Promise<CrossoverEvent[]> {
    this.phase = 'fetching';
    this.stats.lastCheck = this.now();

    const priceResult = await this.withBackoff('current price', s => this.priceData.fetchCurrentPrice(s), signal);
    if (!priceResult.ok) {
      return this.skip(`Error fetching current price: ${errorMessage(priceResult.error)}`);
    }

    const historyResult = await this.withBackoff(
      'historical prices',
      s => this.priceData.fetchHistoricalPrices(this.historyDays, s),
      signal
    );
    if (!historyResult.ok) {
      return this.skip(`Error fetching historical prices: ${errorMessage(historyResult.error)}`);
    }
    // The provider may have ignored the signal; nothing is committed after an abort
    signal?.throwIfAborted();

    const currentPrice = priceResult.value;
    const series = historyResult.value;
    if (!isValidPrice(currentPrice) || !validatePriceData(series, this.now())) {
      return this.skip('Invalid or incomplete price data received; skipping check');
    }

    this.phase = 'classifying';
    const smas = presentSMAs(calculateAllSMAs(series.map(p => p.close), this.periods));
    const events = detectCrossovers(currentPrice, smas, this.previousStates);

    this.previousStates = updateCrossoverState(smas, currentPrice);
    this.lastSeries = series;

    if (this.debug) {
      const summary = Array.from(this.previousStates, ([period, position]) => `${period}:${position}`).join(' ');
      console.log(`[MonitoringService] Price ${currentPrice} positions ${summary}`);
    }
    if (events.length > 0) {
      this.stats.crossoversDetected += events.length;
      console.log(`[MonitoringService] Detected ${events.length} crossover(s)`);
    }
    return events;
  }

  /**
   * Stamp, format and broadcast each event with the retained series as
   * chart context. A failed broadcast is recorded and the next event still goes out.
   */
  async processCrossovers(events: readonly CrossoverEvent[], signal?: AbortSignal): Promise<DispatchReport[]> {
    if (events.length === 0) return [];
    this.phase = 'dispatching';

    const reports: DispatchReport[] = [];
    for (const detected of events) {
      signal?.throwIfAborted();

      const stampedAt = this.now();
      const event: CrossoverEvent = Object.freeze({ ...detected, timestamp: stampedAt });
      const message = formatCrossoverMessage(event, stampedAt, this.format);
      try {
        const results = await this.dispatcher.sendAlertToAll(message, this.lastSeries);
        reports.push({ event, message, results });
      } catch (error) {
        console.error('[MonitoringService] Error dispatching alert:', errorMessage(error));
        reports.push({ event, message, results: new Map(), error: errorMessage(error) });
      }
    }
    return reports;
  }

  async runIteration(signal?: AbortSignal): Promise<DispatchReport[]> {
    const events = await this.checkForCrossovers(signal);
    return this.processCrossovers(events, signal);
  }

  /**
   * Run until `signal` aborts (or `iterations` have run). Never rejects
   * because of a failed cycle.
   */
  async startMonitoring(intervalMinutes: number, options: StartMonitoringOptions = {}): Promise<void> {
    if (this.running) {
      console.log('[MonitoringService] Already running');
      return;
    }

    const { signal, iterations } = options;
    const interval = clampIntervalMinutes(intervalMinutes);
    this.running = true;
    console.log(`[MonitoringService] Started (interval: ${interval}min, periods: ${this.periods.join(', ')})`);

    try {
      for (let i = 0; iterations === undefined || i < iterations; i++) {
        if (signal?.aborted) break;

        try {
          await this.runIteration(signal);
        } catch (error) {
          if (signal?.aborted) break;
          this.stats.lastError = errorMessage(error);
          console.error('[MonitoringService] Unexpected error during monitoring:', error);
        } finally {
          this.stats.iterations++;
        }

        this.phase = 'sleeping';
        try {
          await this.sleep(interval * 60 * 1000, signal);
        } catch (error) {
          if (signal?.aborted) break;
          throw error;
        }
      }
    } finally {
      this.running = false;
      this.phase = signal?.aborted ? 'stopped' : 'idle';
      console.log(`[MonitoringService] Stopped after ${this.stats.iterations} iterations`);
    }
  }

  private skip(reason: string): CrossoverEvent[] {
    this.stats.skippedIterations++;
    this.stats.lastError = reason;
    console.warn(`[MonitoringService] ${reason}`);
    return [];
  }

  private withBackoff<T>(
    label: string,
    operation: (signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    return retryWithBackoff(() => operation(signal), {
      maxAttempts: this.maxRetries,
      initialDelayMs: this.initialBackoffMs,
      maxDelayMs: this.maxBackoffMs,
      sleep: this.sleep,
      signal,
      onRetry: (attempt, error, delayMs) => {
        console.warn(
          `[MonitoringService] Price provider error fetching ${label} (attempt ${attempt}/${this.maxRetries}): ` +
          `${errorMessage(error)}; retrying in ${Math.round(delayMs / 1000)}s`
        );
      },
    });
  }
}
