/**
 * Crossover Detector
 *
 * Classifies where the price sits relative to each SMA and reports the
 * periods whose position flipped strictly between 'above' and 'below'
 * since the previous observation.
 *
 * Both functions are pure. The caller owns the PositionState and must feed
 * the mapping returned by updateCrossoverState() back in on the next call.
 *
 * An exact touch (price === SMA) classifies as 'unknown': nothing is emitted
 * and the next observation cannot emit either, because a transition out of
 * 'unknown' is never a crossover.
 */

import type { CrossoverDirection, CrossoverEvent, Position, PositionState, SmaValues } from './types.ts';

export function classifyPosition(price: number, smaValue: number): Position {
  if (price > smaValue) return 'above';
  if (price < smaValue) return 'below';
  return 'unknown';
}

function crossingDirection(previous: Position, current: Position): CrossoverDirection | null {
  if (previous === 'below' && current === 'above') return 'above';
  if (previous === 'above' && current === 'below') return 'below';
  return null;
}

/**
 * Crossover events for every period in `smas`. A period missing from
 * `previousStates` is treated as 'unknown'. Event order carries no meaning.
 */
export function detectCrossovers(
  currentPrice: number,
  smas: SmaValues,
  previousStates: PositionState
): CrossoverEvent[] {
  const events: CrossoverEvent[] = [];

  for (const [smaPeriod, smaValue] of smas) {
    const previous = previousStates.get(smaPeriod) ?? 'unknown';
    const direction = crossingDirection(previous, classifyPosition(currentPrice, smaValue));
    if (direction === null) continue;

    events.push(Object.freeze({
      smaPeriod,
      direction,
      price: currentPrice,
      smaValue,
      timestamp: null,
    }));
  }

  return events;
}

export function updateCrossoverState(smas: SmaValues, currentPrice: number): PositionState {
  const states = new Map<number, Position>();
  for (const [smaPeriod, smaValue] of smas) {
    states.set(smaPeriod, classifyPosition(currentPrice, smaValue));
  }
  return states;
}
