/**
 * Price Data Service
 *
 * Fetches the current price and daily closing history of one instrument
 * from the Yahoo Finance chart endpoint.
 * - Historical series cached per request size (5 minutes)
 * - Every fetch or shape failure surfaces as DataUnavailableError
 * - No retries here; the monitoring loop owns the retry policy
 */

import { z } from 'zod';
import { DataUnavailableError, errorMessage } from '../utils/errors.ts';
import type { PricePoint } from './types.ts';

// ============================================================
// Provider Contract
// ============================================================

export interface PriceDataProvider {
  fetchCurrentPrice(signal?: AbortSignal): Promise<number>;
  /** At least `minDays` daily closes, oldest-first */
  fetchHistoricalPrices(minDays: number, signal?: AbortSignal): Promise<PricePoint[]>;
}

export function isValidPrice(price: number): boolean {
  return Number.isFinite(price) && price > 0;
}

/**
 * Reject empty series, timestamps in the future, and closes that are
 * not positive finite numbers (NaN included).
 */
export function validatePriceData(series: readonly PricePoint[], now: Date = new Date()): boolean {
  if (series.length === 0) return false;

  const nowMs = now.getTime();
  for (const point of series) {
    const time = point.timestamp.getTime();
    if (Number.isNaN(time) || time > nowMs) return false;
    if (!isValidPrice(point.close)) return false;
  }
  return true;
}

// ============================================================
// Yahoo Finance Chart API
// ============================================================

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({
        symbol: z.string().optional(),
        regularMarketPrice: z.number().optional(),
      }),
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({
        quote: z.array(z.object({
          close: z.array(z.number().nullable()).optional(),
        })),
      }),
    })).nullable(),
    error: z.object({
      code: z.string(),
      description: z.string(),
    }).nullable().optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>['chart']['result']>[number];

const DAY_MS = 24 * 60 * 60 * 1000;
const MIN_HISTORY_DAYS = 100;

interface CachedSeries {
  data: PricePoint[];
  fetchedAt: number;
}

export interface YahooPriceDataOptions {
  symbol?: string;
  baseUrl?: string;
  /** Historical cache lifetime (default: 5 minutes) */
  cacheTtlMs?: number;
  fetchFn?: typeof fetch;
  now?: () => Date;
}

export class YahooPriceDataService implements PriceDataProvider {
  readonly symbol: string;
  private readonly baseUrl: string;
  private readonly cacheTtlMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;
  private cache = new Map<number, CachedSeries>();

  constructor(options: YahooPriceDataOptions = {}) {
    this.symbol = options.symbol ?? 'SPY';
    this.baseUrl = options.baseUrl ?? 'https://query1.finance.yahoo.com';
    this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60 * 1000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  async fetchCurrentPrice(signal?: AbortSignal): Promise<number> {
    const result = await this.fetchChart({ range: '1d', interval: '1m' }, signal);

    let price = result.meta.regularMarketPrice;
    if (price === undefined) {
      const closes = (result.indicators.quote[0]?.close ?? []).filter((c): c is number => c !== null);
      price = closes.at(-1);
    }
    if (price === undefined) {
      throw new DataUnavailableError(`No current price available for ${this.symbol}`);
    }
    return price;
  }

  async fetchHistoricalPrices(minDays: number, signal?: AbortSignal): Promise<PricePoint[]> {
    const days = Math.max(MIN_HISTORY_DAYS, minDays);

    const cached = this.cache.get(days);
    if (cached && this.now().getTime() - cached.fetchedAt < this.cacheTtlMs) {
      return cached.data;
    }

    // Trading days are ~5/7 of calendar days; pad for holidays
    const extraDays = Math.max(20, Math.floor(days * 0.2));
    const calendarDays = Math.ceil(((days + extraDays) * 7) / 5);
    const period2 = Math.floor(this.now().getTime() / 1000);
    const period1 = period2 - Math.floor((calendarDays * DAY_MS) / 1000);

    const result = await this.fetchChart(
      { period1: String(period1), period2: String(period2), interval: '1d' },
      signal
    );

    const timestamps = result.timestamp ?? [];
    const closes = result.indicators.quote[0]?.close ?? [];
    const points: PricePoint[] = [];
    for (let i = 0; i < timestamps.length; i++) {
      const close = closes[i];
      if (close === null || close === undefined) continue;
      points.push({ timestamp: new Date(timestamps[i] * 1000), close });
    }
    points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    if (points.length < days) {
      throw new DataUnavailableError(
        `Only ${points.length} daily closes available for ${this.symbol}, need ${days}`
      );
    }

    const data = points.slice(-days);
    this.cache.set(days, { data, fetchedAt: this.now().getTime() });
    return data;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async fetchChart(params: Record<string, string>, signal?: AbortSignal): Promise<ChartResult> {
    const url = new URL(`/v8/finance/chart/${encodeURIComponent(this.symbol)}`, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let body: unknown;
    try {
      const response = await this.fetchFn(url, { signal });
      if (!response.ok) {
        throw new DataUnavailableError(`Yahoo chart request failed: HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof DataUnavailableError || signal?.aborted) throw error;
      throw new DataUnavailableError(`Yahoo chart request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = ChartResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataUnavailableError(`Unexpected Yahoo chart response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    const { result, error } = parsed.data.chart;
    const first = result?.[0];
    if (!first) {
      throw new DataUnavailableError(
        `No chart data for ${this.symbol}${error ? `: ${error.description}` : ''}`
      );
    }
    return first;
  }
}
