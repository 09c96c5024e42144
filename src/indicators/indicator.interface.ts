// One computed value, stamped with the bar that produced it
export interface IndicatorPoint {
  timestamp: Date;
  value: number;
}

export interface SmaSpec {
  kind: 'sma';
  name: string;
  period: number;
}

export interface EmaSpec {
  kind: 'ema';
  name: string;
  period: number;
}

export interface RsiSpec {
  kind: 'rsi';
  name: string;
  period: number;
}

// Produces `<name>`, `<name>.signal` and `<name>.histogram`
export interface MacdSpec {
  kind: 'macd';
  name: string;
  fast: number;
  slow: number;
  signal: number;
}

export interface AtrSpec {
  kind: 'atr';
  name: string;
  period: number;
}

export type IndicatorSpec = SmaSpec | EmaSpec | RsiSpec | MacdSpec | AtrSpec;

export type IndicatorValues = Readonly<Record<string, number>>;

/**
 * Latest indicator outputs for one instrument, produced by one bar.
 * `previous` holds the same names one bar earlier.
 */
export interface IndicatorSnapshot {
  readonly instrument: string;
  readonly sequence: number;
  readonly timestamp: Date;
  readonly close: number;
  readonly previousClose: number;
  readonly values: IndicatorValues;
  readonly previous: IndicatorValues;
}
