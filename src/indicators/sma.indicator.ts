import type { PriceBar } from '../types/market.types.js';
import type { IndicatorPoint } from './indicator.interface.js';

/**
 * Rolling simple moving average of bar closes.
 */
export function calculateSMA(bars: PriceBar[], period: number): IndicatorPoint[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error('SMA period must be a positive integer');
  }

  if (bars.length < period) {
    return [];
  }

  const results: IndicatorPoint[] = [];
  for (let end = period; end <= bars.length; end++) {
    let windowSum = 0;
    for (let i = end - period; i < end; i++) {
      windowSum += bars[i].close;
    }
    results.push({ timestamp: bars[end - 1].timestamp, value: windowSum / period });
  }

  return results;
}

export function smaRequiredBars(period: number): number {
  return period;
}
