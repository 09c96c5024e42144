import type { PriceBar } from '../types/market.types.js';
import type { IndicatorPoint } from './indicator.interface.js';

/**
 * Calculate True Range for a single bar
 *
 * True Range = MAX(
 *   High - Low,
 *   |High - Previous Close|,
 *   |Low - Previous Close|
 * )
 */
export function calculateTrueRange(current: PriceBar, previous?: PriceBar): number {
  if (!previous) {
    // For the first bar, True Range is simply High - Low
    return current.high - current.low;
  }

  const range1 = current.high - current.low;
  const range2 = Math.abs(current.high - previous.close);
  const range3 = Math.abs(current.low - previous.close);

  return Math.max(range1, range2, range3);
}

/**
 * Calculate Average True Range (ATR)
 *
 * Seeded with the simple average of the first `period` true ranges, then
 * Wilder-smoothed: ATR(n) = ((ATR(n-1) × (period - 1)) + TR(n)) / period
 */
export function calculateATR(bars: PriceBar[], period: number = 14): IndicatorPoint[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error('ATR period must be a positive integer');
  }

  if (bars.length < period) {
    return [];
  }

  const trueRanges = bars.map((bar, i) => calculateTrueRange(bar, i > 0 ? bars[i - 1] : undefined));

  let atr = trueRanges.slice(0, period).reduce((sum, tr) => sum + tr, 0) / period;
  const results: IndicatorPoint[] = [{ timestamp: bars[period - 1].timestamp, value: atr }];

  for (let i = period; i < bars.length; i++) {
    atr = (atr * (period - 1) + trueRanges[i]) / period;
    results.push({ timestamp: bars[i].timestamp, value: atr });
  }

  return results;
}

export function atrRequiredBars(period: number): number {
  return period;
}
