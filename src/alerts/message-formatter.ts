/**
 * Message Formatter
 *
 * Pure text builders for alerts and command replies. No side effects.
 */

import { DEFAULT_SMA_PERIODS } from '../market/sma-calculator.ts';
import type { CrossoverEvent, SmaResults } from '../market/types.ts';

export interface FormatOptions {
  /** Instrument ticker shown in messages (default: SPY) */
  symbol?: string;
  /** IANA time zone for alert timestamps (default: UTC) */
  timezone?: string;
  /** SMA periods listed in status messages */
  periods?: readonly number[];
}

function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * "YYYY-MM-DD HH:mm:ss" in the given time zone
 */
export function formatTimestamp(timestamp: Date, timezone: string = 'UTC'): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(timestamp);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '00';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

export function formatCrossoverMessage(
  event: CrossoverEvent,
  timestamp: Date,
  options: FormatOptions = {}
): string {
  const symbol = options.symbol ?? 'SPY';
  const ts = formatTimestamp(timestamp, options.timezone);
  return (
    `${symbol} crossed ${event.direction} the ${event.smaPeriod}-day SMA at ${ts}. ` +
    `Price: ${formatUsd(event.price)}, SMA ${event.smaPeriod}: ${formatUsd(event.smaValue)}`
  );
}

export function formatStatusMessage(
  subscribed: boolean,
  currentPrice: number,
  smas: SmaResults,
  options: FormatOptions = {}
): string {
  const symbol = options.symbol ?? 'SPY';
  const periods = options.periods ?? DEFAULT_SMA_PERIODS;

  const parts = [
    `Status: ${subscribed ? 'Subscribed' : 'Unsubscribed'}`,
    `Current ${symbol} Price: ${formatUsd(currentPrice)}`,
  ];
  for (const period of periods) {
    const value = smas.get(period);
    parts.push(`SMA ${period}: ${typeof value === 'number' ? formatUsd(value) : 'N/A'}`);
  }
  return parts.join('; ');
}

export function formatSubscribeConfirmation(symbol: string = 'SPY'): string {
  return `You are now subscribed to ${symbol} SMA alerts.`;
}

export function formatAlreadySubscribed(symbol: string = 'SPY'): string {
  return `You are already subscribed to ${symbol} SMA alerts.`;
}

export function formatUnsubscribeConfirmation(symbol: string = 'SPY'): string {
  return `You have unsubscribed from ${symbol} SMA alerts.`;
}

export function formatNotSubscribed(symbol: string = 'SPY'): string {
  return `You are not subscribed to ${symbol} SMA alerts.`;
}

export function formatDataUnavailable(symbol: string = 'SPY'): string {
  return `${symbol} price data is temporarily unavailable. Please try again later.`;
}

export function formatHelpMessage(symbol: string = 'SPY', periods: readonly number[] = DEFAULT_SMA_PERIODS): string {
  return (
    `I watch ${symbol} against its ${periods.join('/')}-day simple moving averages ` +
    `and send an alert with a chart whenever the price crosses one of them.\n\n` +
    `/start - Subscribe to alerts\n` +
    `/stop - Unsubscribe\n` +
    `/status - Current price, SMAs and chart\n` +
    `/help - Show this message`
  );
}
