import type { PriceBar } from '../types/market.types.js';
import type { IndicatorPoint } from './indicator.interface.js';
import { calculateEMA, calculateEMASeries } from './ema.indicator.js';

export interface MACDPoint {
  timestamp: Date;
  macd: number;
  signal: number;
  histogram: number;
}

/**
 * Moving Average Convergence Divergence
 *
 * MACD line = EMA(fast) - EMA(slow); signal line = EMA(signal) of the MACD line.
 *
 * @returns Points from the first bar where the signal line exists
 */
export function calculateMACD(
  bars: PriceBar[],
  fast: number = 12,
  slow: number = 26,
  signal: number = 9
): MACDPoint[] {
  if (fast >= slow) {
    throw new Error('MACD fast period must be shorter than the slow period');
  }

  const fastSeries = calculateEMA(bars, fast);
  const slowSeries = calculateEMA(bars, slow);
  if (slowSeries.length === 0) {
    return [];
  }

  // Both series end on the last bar; align the fast one to the slow one's start
  const offset = fastSeries.length - slowSeries.length;
  const macdLine: IndicatorPoint[] = slowSeries.map((slowPoint, i) => ({
    timestamp: slowPoint.timestamp,
    value: fastSeries[i + offset].value - slowPoint.value,
  }));

  const signalLine = calculateEMASeries(macdLine, signal);
  const signalOffset = macdLine.length - signalLine.length;

  return signalLine.map((signalPoint, i) => {
    const macd = macdLine[i + signalOffset].value;
    return {
      timestamp: signalPoint.timestamp,
      macd,
      signal: signalPoint.value,
      histogram: macd - signalPoint.value,
    };
  });
}

export function macdRequiredBars(slow: number, signal: number): number {
  return slow + signal - 1;
}
