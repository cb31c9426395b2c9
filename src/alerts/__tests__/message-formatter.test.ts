import { describe, it, expect } from 'vitest';
import {
  formatCrossoverMessage,
  formatHelpMessage,
  formatStatusMessage,
  formatSubscribeConfirmation,
  formatTimestamp,
  formatUnsubscribeConfirmation,
} from '../message-formatter.ts';
import type { CrossoverEvent } from '../../market/types.ts';

const AT = new Date('2024-03-01T15:30:05Z');

const upward: CrossoverEvent = {
  smaPeriod: 25,
  direction: 'above',
  price: 102,
  smaValue: 100,
  timestamp: null,
};

describe('formatTimestamp', () => {
  it('formats in UTC by default', () => {
    expect(formatTimestamp(AT)).toBe('2024-03-01 15:30:05');
  });

  it('converts to the requested time zone', () => {
    expect(formatTimestamp(AT, 'America/New_York')).toBe('2024-03-01 10:30:05');
  });

  it('uses 00 for midnight', () => {
    expect(formatTimestamp(new Date('2024-03-02T00:05:00Z'))).toBe('2024-03-02 00:05:00');
  });
});

describe('formatCrossoverMessage', () => {
  it('describes an upward crossover', () => {
    expect(formatCrossoverMessage(upward, AT)).toBe(
      'SPY crossed above the 25-day SMA at 2024-03-01 15:30:05. Price: $102.00, SMA 25: $100.00'
    );
  });

  it('describes a downward crossover for another symbol and zone', () => {
    const downward: CrossoverEvent = { smaPeriod: 100, direction: 'below', price: 389.4, smaValue: 390.1, timestamp: null };
    expect(formatCrossoverMessage(downward, AT, { symbol: 'QQQ', timezone: 'America/New_York' })).toBe(
      'QQQ crossed below the 100-day SMA at 2024-03-01 10:30:05. Price: $389.40, SMA 100: $390.10'
    );
  });
});

describe('formatStatusMessage', () => {
  it('lists every default period with N/A for missing values', () => {
    const smas = new Map<number, number | null>([[25, 440.1], [50, 435.5], [75, null]]);
    expect(formatStatusMessage(true, 450.25, smas)).toBe(
      'Status: Subscribed; Current SPY Price: $450.25; SMA 25: $440.10; SMA 50: $435.50; SMA 75: N/A; SMA 100: N/A'
    );
  });

  it('reports unsubscribed chats and custom periods', () => {
    const smas = new Map<number, number | null>([[10, 99.5]]);
    expect(formatStatusMessage(false, 100, smas, { symbol: 'IWM', periods: [10, 20] })).toBe(
      'Status: Unsubscribed; Current IWM Price: $100.00; SMA 10: $99.50; SMA 20: N/A'
    );
  });

  it('formats whole-number SMA values', () => {
    const smas = new Map<number, number | null>([[25, 100], [50, 101], [75, 102], [100, 103]]);
    expect(formatStatusMessage(true, 104, smas)).toBe(
      'Status: Subscribed; Current SPY Price: $104.00; SMA 25: $100.00; SMA 50: $101.00; SMA 75: $102.00; SMA 100: $103.00'
    );
  });
});

describe('confirmations', () => {
  it('confirms subscribe and unsubscribe', () => {
    expect(formatSubscribeConfirmation()).toBe('You are now subscribed to SPY SMA alerts.');
    expect(formatUnsubscribeConfirmation('QQQ')).toBe('You have unsubscribed from QQQ SMA alerts.');
  });

  it('lists the commands in help', () => {
    const help = formatHelpMessage('SPY', [25, 50]);
    expect(help.split('\n')[0]).toBe(
      'I watch SPY against its 25/50-day simple moving averages and send an alert with a chart whenever the price crosses one of them.'
    );
    expect(help).toContain('/status - Current price, SMAs and chart');
  });
});
