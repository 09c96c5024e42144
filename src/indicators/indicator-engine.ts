import type { BarHistory, PriceBar } from '../types/market.types.js';
import type { IndicatorPoint, IndicatorSnapshot, IndicatorSpec } from './indicator.interface.js';
import { InsufficientHistory } from '../errors/trading.errors.js';
import { calculateSMA, smaRequiredBars } from './sma.indicator.js';
import { calculateEMA, emaRequiredBars } from './ema.indicator.js';
import { calculateRSI, rsiRequiredBars } from './rsi.indicator.js';
import { calculateMACD, macdRequiredBars } from './macd.indicator.js';
import { calculateATR, atrRequiredBars } from './atr.indicator.js';

// Names every snapshot exposes in addition to the configured indicators
export const PRICE_OPERANDS = ['close'] as const;

interface NamedSeries {
  name: string;
  points: IndicatorPoint[];
}

export function requiredBars(spec: IndicatorSpec): number {
  switch (spec.kind) {
    case 'sma':
      return smaRequiredBars(spec.period);
    case 'ema':
      return emaRequiredBars(spec.period);
    case 'rsi':
      return rsiRequiredBars(spec.period);
    case 'macd':
      return macdRequiredBars(spec.slow, spec.signal);
    case 'atr':
      return atrRequiredBars(spec.period);
  }
}

/**
 * Names a spec contributes to a snapshot.
 */
export function outputNames(spec: IndicatorSpec): string[] {
  if (spec.kind === 'macd') {
    return [spec.name, `${spec.name}.signal`, `${spec.name}.histogram`];
  }
  return [spec.name];
}

function computeSeries(spec: IndicatorSpec, bars: PriceBar[]): NamedSeries[] {
  switch (spec.kind) {
    case 'sma':
      return [{ name: spec.name, points: calculateSMA(bars, spec.period) }];
    case 'ema':
      return [{ name: spec.name, points: calculateEMA(bars, spec.period) }];
    case 'rsi':
      return [{ name: spec.name, points: calculateRSI(bars, spec.period) }];
    case 'atr':
      return [{ name: spec.name, points: calculateATR(bars, spec.period) }];
    case 'macd': {
      const points = calculateMACD(bars, spec.fast, spec.slow, spec.signal);
      return [
        { name: spec.name, points: points.map(p => ({ timestamp: p.timestamp, value: p.macd })) },
        { name: `${spec.name}.signal`, points: points.map(p => ({ timestamp: p.timestamp, value: p.signal })) },
        {
          name: `${spec.name}.histogram`,
          points: points.map(p => ({ timestamp: p.timestamp, value: p.histogram })),
        },
      ];
    }
  }
}

/**
 * Computes the configured indicator set from a bar history.
 *
 * Stateless across calls and instruments: the snapshot depends only on the
 * history it is given.
 */
export class IndicatorEngine {
  readonly lookback: number;

  constructor(private readonly specs: readonly IndicatorSpec[]) {
    const longest = specs.reduce((max, spec) => Math.max(max, requiredBars(spec)), 1);
    // One extra bar so every indicator also has its previous value
    this.lookback = longest + 1;
  }

  getSpecs(): readonly IndicatorSpec[] {
    return this.specs;
  }

  compute(instrument: string, history: BarHistory): IndicatorSnapshot {
    const { bars } = history;
    if (bars.length < this.lookback) {
      throw new InsufficientHistory(instrument, this.lookback, bars.length);
    }

    const values: Record<string, number> = {};
    const previous: Record<string, number> = {};

    for (const spec of this.specs) {
      for (const series of computeSeries(spec, bars)) {
        const count = series.points.length;
        if (count < 2) {
          throw new InsufficientHistory(instrument, this.lookback, bars.length);
        }
        values[series.name] = series.points[count - 1].value;
        previous[series.name] = series.points[count - 2].value;
      }
    }

    const last = bars[bars.length - 1];
    const beforeLast = bars[bars.length - 2];

    return Object.freeze({
      instrument,
      sequence: history.sequence,
      timestamp: new Date(last.timestamp.getTime()),
      close: last.close,
      previousClose: beforeLast.close,
      values: Object.freeze(values),
      previous: Object.freeze(previous),
    });
  }
}
