import type { PriceBar } from '../types/market.types.js';
import type { IndicatorPoint } from './indicator.interface.js';

/**
 * Relative Strength Index from rolling mean gains and losses
 *
 * RSI = 100 - 100 / (1 + avgGain / avgLoss) = 100 × avgGain / (avgGain + avgLoss)
 *
 * A window without any price change divides zero by zero and yields NaN.
 *
 * @param bars - Bars in chronological order
 * @param period - Number of close-to-close changes per window
 * @returns RSI points, starting at bar `period` (needs period + 1 bars)
 */
export function calculateRSI(bars: PriceBar[], period: number = 14): IndicatorPoint[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error('RSI period must be a positive integer');
  }

  if (bars.length < period + 1) {
    return [];
  }

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    const delta = bars[i].close - bars[i - 1].close;
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
  }

  const results: IndicatorPoint[] = [];
  for (let end = period; end <= gains.length; end++) {
    // Summed per window so a flat window is exactly 0/0
    const avgGain = sum(gains, end - period, end) / period;
    const avgLoss = sum(losses, end - period, end) / period;
    results.push({
      timestamp: bars[end].timestamp,
      value: (100 * avgGain) / (avgGain + avgLoss),
    });
  }

  return results;
}

function sum(values: number[], from: number, to: number): number {
  let total = 0;
  for (let i = from; i < to; i++) {
    total += values[i];
  }
  return total;
}

export function rsiRequiredBars(period: number): number {
  return period + 1;
}
