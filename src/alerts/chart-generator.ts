/**
 * Chart Generator
 *
 * Draws the closing price with SMA overlays as an SVG and rasterises it to
 * PNG (sharp) for Telegram photo uploads.
 */

import sharp from 'sharp';
import { calculateSMASeries, DEFAULT_SMA_PERIODS } from '../market/sma-calculator.ts';
import type { PricePoint } from '../market/types.ts';
import { InvalidArgumentError } from '../utils/errors.ts';

export interface ChartRenderer {
  render(series: readonly PricePoint[]): Promise<Buffer>;
}

export interface ChartOptions {
  symbol?: string;
  periods?: readonly number[];
  /** Trailing points drawn (default: 100) */
  displayPoints?: number;
  width?: number;
  height?: number;
}

const CLOSE_COLOR = '#000000';
const SMA_COLORS = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b'];

const MARGIN = { top: 50, right: 30, bottom: 50, left: 70 };
const X_LABELS = 6;
const Y_TICKS = 5;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function polyline(values: readonly (number | null)[], x: (i: number) => number, y: (v: number) => number): string {
  const coords: string[] = [];
  values.forEach((value, i) => {
    if (value !== null) coords.push(`${x(i).toFixed(1)},${y(value).toFixed(1)}`);
  });
  return coords.join(' ');
}

/**
 * SVG of the last `displayPoints` closes plus one SMA line per period.
 * SMAs are computed over the whole series so the overlays start at the
 * left edge when enough history precedes the window.
 */
export function buildChartSvg(series: readonly PricePoint[], options: ChartOptions = {}): string {
  if (series.length < 2) {
    throw new InvalidArgumentError(`Chart needs at least 2 price points, got ${series.length}`);
  }

  const symbol = options.symbol ?? 'SPY';
  const periods = options.periods ?? DEFAULT_SMA_PERIODS;
  const displayPoints = Math.max(2, options.displayPoints ?? 100);
  const width = options.width ?? 1200;
  const height = options.height ?? 600;

  const closes = series.map(p => p.close);
  const start = Math.max(0, series.length - displayPoints);
  const visible = series.slice(start);
  const visibleCloses = closes.slice(start);
  const overlays = periods.map(period => calculateSMASeries(closes, period).slice(start));

  const allValues = [
    ...visibleCloses,
    ...overlays.flat().filter((v): v is number => v !== null),
  ];
  let min = Math.min(...allValues);
  let max = Math.max(...allValues);
  if (min === max) {
    min -= 1;
    max += 1;
  }
  const pad = (max - min) * 0.05;
  min -= pad;
  max += pad;

  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const x = (i: number): number => MARGIN.left + (i / (visible.length - 1)) * plotWidth;
  const y = (v: number): number => MARGIN.top + ((max - v) / (max - min)) * plotHeight;

  const lines: string[] = [];
  lines.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${width / 2}" y="30" text-anchor="middle" font-family="sans-serif" font-size="20">${escapeXml(symbol)} Price with SMA Overlays</text>`
  );

  // Grid and price axis
  for (let t = 0; t <= Y_TICKS; t++) {
    const value = min + ((max - min) * t) / Y_TICKS;
    const ty = y(value).toFixed(1);
    lines.push(
      `<line x1="${MARGIN.left}" y1="${ty}" x2="${width - MARGIN.right}" y2="${ty}" stroke="#e0e0e0" stroke-width="1"/>`,
      `<text x="${MARGIN.left - 8}" y="${ty}" text-anchor="end" dominant-baseline="middle" font-family="sans-serif" font-size="12">${value.toFixed(2)}</text>`
    );
  }

  // Date axis
  for (let l = 0; l < X_LABELS; l++) {
    const i = Math.round((l * (visible.length - 1)) / (X_LABELS - 1));
    const label = visible[i].timestamp.toISOString().slice(0, 10);
    lines.push(
      `<text x="${x(i).toFixed(1)}" y="${height - MARGIN.bottom + 20}" text-anchor="middle" font-family="sans-serif" font-size="12">${label}</text>`
    );
  }

  lines.push(
    `<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${plotHeight}" fill="none" stroke="#808080" stroke-width="1"/>`,
    `<polyline fill="none" stroke="${CLOSE_COLOR}" stroke-width="1.5" points="${polyline(visibleCloses, x, y)}"/>`
  );
  overlays.forEach((values, idx) => {
    const points = polyline(values, x, y);
    if (!points) return;
    lines.push(
      `<polyline fill="none" stroke="${SMA_COLORS[idx % SMA_COLORS.length]}" stroke-width="1.5" points="${points}"/>`
    );
  });

  // Legend
  const legend = [
    { label: `${symbol} Close`, color: CLOSE_COLOR },
    ...periods.map((period, idx) => ({ label: `SMA ${period}`, color: SMA_COLORS[idx % SMA_COLORS.length] })),
  ];
  legend.forEach((entry, idx) => {
    const ly = MARGIN.top + 18 + idx * 18;
    const lx = MARGIN.left + 12;
    lines.push(
      `<line x1="${lx}" y1="${ly}" x2="${lx + 24}" y2="${ly}" stroke="${entry.color}" stroke-width="2"/>`,
      `<text x="${lx + 30}" y="${ly}" dominant-baseline="middle" font-family="sans-serif" font-size="12">${escapeXml(entry.label)}</text>`
    );
  });

  lines.push('</svg>');
  return lines.join('\n');
}

export class SvgChartRenderer implements ChartRenderer {
  constructor(private readonly options: ChartOptions = {}) {}

  async render(series: readonly PricePoint[]): Promise<Buffer> {
    const svg = buildChartSvg(series, this.options);
    return sharp(Buffer.from(svg)).png().toBuffer();
  }
}
