import type { PriceBar } from '../types/market.types.js';
import type { IndicatorPoint } from './indicator.interface.js';

/**
 * Calculate Exponential Moving Average (EMA) over a value series
 *
 * Formula: EMA = (Value × α) + (Previous EMA × (1 - α))
 * Where α = 2 / (period + 1)
 *
 * The first EMA is the simple average of the first `period` values.
 *
 * @param points - Values in chronological order
 * @param period - EMA period
 * @returns EMA points, starting at the `period`-th input
 */
export function calculateEMASeries(
  points: IndicatorPoint[],
  period: number
): IndicatorPoint[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error('EMA period must be a positive integer');
  }

  if (points.length < period) {
    return [];
  }

  const alpha = 2 / (period + 1);
  const initialSum = points.slice(0, period).reduce((sum, point) => sum + point.value, 0);
  let ema = initialSum / period;

  const results: IndicatorPoint[] = [
    { timestamp: points[period - 1].timestamp, value: ema },
  ];

  for (let i = period; i < points.length; i++) {
    ema = points[i].value * alpha + ema * (1 - alpha);
    results.push({ timestamp: points[i].timestamp, value: ema });
  }

  return results;
}

/**
 * EMA of bar closes
 */
export function calculateEMA(bars: PriceBar[], period: number): IndicatorPoint[] {
  return calculateEMASeries(
    bars.map(bar => ({ timestamp: bar.timestamp, value: bar.close })),
    period
  );
}

export function emaRequiredBars(period: number): number {
  return period;
}
