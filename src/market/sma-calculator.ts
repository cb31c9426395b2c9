/**
 * SMA Calculator
 *
 * Simple Moving Averages over a closing-price series (oldest-first).
 * No smoothing, no weighting: the arithmetic mean of the last N closes.
 */

import { InvalidArgumentError } from '../utils/errors.ts';
import type { SmaResults, SmaValues } from './types.ts';

export const DEFAULT_SMA_PERIODS: readonly number[] = [25, 50, 75, 100];

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidArgumentError(`SMA period must be an integer >= 1, got ${period}`);
  }
}

/**
 * SMA of the last `period` closes, or null when there are fewer than `period`.
 * NaN closes propagate into the result; validating the series is the caller's job.
 */
export function calculateSMA(closes: readonly number[], period: number): number | null {
  assertPeriod(period);
  if (closes.length === 0 || closes.length < period) return null;

  let sum = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    sum += closes[i];
  }
  return sum / period;
}

export function calculateAllSMAs(
  closes: readonly number[],
  periods: readonly number[] = DEFAULT_SMA_PERIODS
): SmaResults {
  const results: SmaResults = new Map();
  for (const period of periods) {
    results.set(period, calculateSMA(closes, period));
  }
  return results;
}

/**
 * Sliding-window SMA aligned with `closes`: entry i is the SMA ending at i,
 * null until `period` closes are available. Used for chart overlays.
 */
export function calculateSMASeries(closes: readonly number[], period: number): (number | null)[] {
  assertPeriod(period);
  const series: (number | null)[] = [];
  for (let i = 0; i < closes.length; i++) {
    series.push(i + 1 < period ? null : calculateSMA(closes.slice(0, i + 1), period));
  }
  return series;
}

/** Drop periods without enough history */
export function presentSMAs(results: SmaResults): SmaValues {
  const values = new Map<number, number>();
  for (const [period, value] of results) {
    if (value !== null) values.set(period, value);
  }
  return values;
}
