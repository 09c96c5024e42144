import type { IndicatorSpec } from '../indicators/indicator.interface.js';
import type { StrategyRule } from './strategy.types.js';

export interface StrategyPreset {
  description: string;
  indicators: IndicatorSpec[];
  rules: StrategyRule[];
}

export type StrategyPresetName = 'trend-rsi' | 'sma-crossover' | 'macd-trend';

/**
 * Built-in rule sets. Rules are listed in priority order; exits come first so
 * an open position is managed before any entry rule is considered.
 */
export const STRATEGY_PRESETS: Record<StrategyPresetName, StrategyPreset> = {
  'trend-rsi': {
    description: 'Buy RSI dips in an uptrend, sell RSI rallies in a downtrend',
    indicators: [
      { kind: 'sma', name: 'sma20', period: 20 },
      { kind: 'rsi', name: 'rsi14', period: 14 },
    ],
    rules: [
      { name: 'long-stop-loss', action: 'EXIT', states: ['LONG'], conditions: [{ kind: 'stopLoss', percent: 0.03 }] },
      { name: 'long-take-profit', action: 'EXIT', states: ['LONG'], conditions: [{ kind: 'takeProfit', percent: 0.06 }] },
      {
        name: 'long-rsi-overbought',
        action: 'EXIT',
        states: ['LONG'],
        conditions: [{ kind: 'threshold', operand: 'rsi14', comparator: '>', value: 70 }],
      },
      { name: 'short-stop-loss', action: 'EXIT', states: ['SHORT'], conditions: [{ kind: 'stopLoss', percent: 0.03 }] },
      { name: 'short-take-profit', action: 'EXIT', states: ['SHORT'], conditions: [{ kind: 'takeProfit', percent: 0.06 }] },
      {
        name: 'short-rsi-oversold',
        action: 'EXIT',
        states: ['SHORT'],
        conditions: [{ kind: 'threshold', operand: 'rsi14', comparator: '<', value: 30 }],
      },
      {
        name: 'uptrend-dip-entry',
        action: 'ENTER_LONG',
        conditions: [
          { kind: 'compare', left: 'close', comparator: '>', right: 'sma20' },
          { kind: 'threshold', operand: 'rsi14', comparator: '<', value: 30 },
        ],
      },
      {
        name: 'downtrend-rally-entry',
        action: 'ENTER_SHORT',
        conditions: [
          { kind: 'compare', left: 'close', comparator: '<', right: 'sma20' },
          { kind: 'threshold', operand: 'rsi14', comparator: '>', value: 70 },
        ],
      },
    ],
  },

  'sma-crossover': {
    description: 'Golden cross goes long, death cross goes short',
    indicators: [
      { kind: 'sma', name: 'sma5', period: 5 },
      { kind: 'sma', name: 'sma10', period: 10 },
    ],
    rules: [
      {
        name: 'golden-cross-cover',
        action: 'EXIT',
        states: ['SHORT'],
        conditions: [{ kind: 'crossover', fast: 'sma5', slow: 'sma10', direction: 'above' }],
      },
      {
        name: 'death-cross-exit',
        action: 'EXIT',
        states: ['LONG'],
        conditions: [{ kind: 'crossover', fast: 'sma5', slow: 'sma10', direction: 'below' }],
      },
      {
        name: 'golden-cross-entry',
        action: 'ENTER_LONG',
        conditions: [{ kind: 'crossover', fast: 'sma5', slow: 'sma10', direction: 'above' }],
      },
      {
        name: 'death-cross-entry',
        action: 'ENTER_SHORT',
        conditions: [{ kind: 'crossover', fast: 'sma5', slow: 'sma10', direction: 'below' }],
      },
    ],
  },

  'macd-trend': {
    description: 'MACD signal-line crossovers filtered by SMA trend and RSI',
    indicators: [
      { kind: 'sma', name: 'sma5', period: 5 },
      { kind: 'sma', name: 'sma10', period: 10 },
      { kind: 'rsi', name: 'rsi14', period: 14 },
      { kind: 'macd', name: 'macd', fast: 12, slow: 26, signal: 9 },
    ],
    rules: [
      {
        name: 'macd-bear-cross-exit',
        action: 'EXIT',
        states: ['LONG'],
        conditions: [{ kind: 'crossover', fast: 'macd', slow: 'macd.signal', direction: 'below' }],
      },
      {
        name: 'macd-bull-cross-cover',
        action: 'EXIT',
        states: ['SHORT'],
        conditions: [{ kind: 'crossover', fast: 'macd', slow: 'macd.signal', direction: 'above' }],
      },
      {
        name: 'macd-long-entry',
        action: 'ENTER_LONG',
        conditions: [
          { kind: 'compare', left: 'sma5', comparator: '>', right: 'sma10' },
          { kind: 'crossover', fast: 'macd', slow: 'macd.signal', direction: 'above' },
          { kind: 'threshold', operand: 'rsi14', comparator: '<', value: 70 },
        ],
      },
      {
        name: 'macd-short-entry',
        action: 'ENTER_SHORT',
        conditions: [
          { kind: 'compare', left: 'sma5', comparator: '<', right: 'sma10' },
          { kind: 'crossover', fast: 'macd', slow: 'macd.signal', direction: 'below' },
          { kind: 'threshold', operand: 'rsi14', comparator: '>', value: 30 },
        ],
      },
    ],
  },
};

export function isStrategyPresetName(name: string): name is StrategyPresetName {
  return Object.prototype.hasOwnProperty.call(STRATEGY_PRESETS, name);
}
