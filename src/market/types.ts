/**
 * Market Types
 * Shared interfaces and types for SMA crossover monitoring
 */

// ============================================================
// Price Data
// ============================================================

/** A single daily close. Series are ordered oldest-first. */
export interface PricePoint {
  timestamp: Date;
  close: number;
}

// ============================================================
// Moving Averages
// ============================================================

/** SMA period -> value, or null when the series is shorter than the period */
export type SmaResults = Map<number, number | null>;

/** SMA period -> value, only periods that have one */
export type SmaValues = ReadonlyMap<number, number>;

// ============================================================
// Crossover State
// ============================================================

export type Position = 'above' | 'below' | 'unknown';
export type CrossoverDirection = Exclude<Position, 'unknown'>;

/** Last classified position per SMA period */
export type PositionState = ReadonlyMap<number, Position>;

export interface CrossoverEvent {
  readonly smaPeriod: number;
  readonly direction: CrossoverDirection;
  readonly price: number;
  readonly smaValue: number;
  /** Stamped by the consumer at dispatch time, null when produced by the classifier */
  readonly timestamp: Date | null;
}
