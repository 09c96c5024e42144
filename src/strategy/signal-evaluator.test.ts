import { describe, it, expect } from 'vitest';
import type { IndicatorSnapshot } from '../indicators/indicator.interface.js';
import type { PositionView } from '../execution/types/execution.types.js';
import type { StrategyRule } from './strategy.types.js';
import { SignalEvaluator } from './signal-evaluator.js';
import { StaleSignal } from '../errors/trading.errors.js';
import { STRATEGY_PRESETS } from './strategy.config.js';
import { IndicatorEngine } from '../indicators/indicator-engine.js';
import { barsFromCloses } from '../test-support/fixtures.js';

const FLAT: PositionView = { side: 'FLAT', size: 0, avgEntryPrice: 0 };
const LONG: PositionView = { side: 'LONG', size: 1, avgEntryPrice: 100 };
const SHORT: PositionView = { side: 'SHORT', size: 1, avgEntryPrice: 100 };

function snapshot(
  sequence: number,
  values: Record<string, number>,
  previous: Record<string, number> = values,
  close = 100,
  previousClose = close
): IndicatorSnapshot {
  return {
    instrument: 'X',
    sequence,
    timestamp: new Date(0),
    close,
    previousClose,
    values,
    previous,
  };
}

const crossover: StrategyRule[] = STRATEGY_PRESETS['sma-crossover'].rules;
const goldenCross = () => snapshot(5, { sma5: 11, sma10: 10 }, { sma5: 9, sma10: 10 });
const deathCross = () => snapshot(5, { sma5: 9, sma10: 10 }, { sma5: 11, sma10: 10 });

describe('SignalEvaluator', () => {
  it('should emit ENTER_LONG on a golden cross while flat', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(goldenCross(), FLAT);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('ENTER_LONG');
      expect(outcome.signal.rule).toBe('golden-cross-entry');
      expect(outcome.signal.sequence).toBe(5);
    }
  });

  it('should emit EXIT on a golden cross while short', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(goldenCross(), SHORT);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('EXIT');
      expect(outcome.signal.rule).toBe('golden-cross-cover');
    }
  });

  it('should suppress an entry while a position is open', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(goldenCross(), LONG);

    expect(outcome.kind).toBe('SUPPRESSED');
    if (outcome.kind === 'SUPPRESSED') {
      expect(outcome.signal.action).toBe('ENTER_LONG');
      expect(outcome.state).toBe('LONG');
    }
    expect(evaluator.state('X')).toBe('LONG');
  });

  it('should emit EXIT on a death cross while long', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(deathCross(), LONG);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('EXIT');
    }
  });

  it('should hold when no rule matches', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(snapshot(1, { sma5: 11, sma10: 10 }), FLAT);

    expect(outcome).toMatchObject({ kind: 'HOLD', reason: 'NO_MATCH' });
  });

  it('should not treat equal averages as a crossover', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(snapshot(1, { sma5: 10, sma10: 10 }, { sma5: 9, sma10: 10 }), FLAT);

    expect(outcome.kind).toBe('HOLD');
  });

  it('should hold on a non-finite indicator value', () => {
    const evaluator = new SignalEvaluator(crossover);

    const outcome = evaluator.evaluate(snapshot(1, { sma5: 11, sma10: 10 }, { sma5: NaN, sma10: 10 }), FLAT);

    expect(outcome).toMatchObject({ kind: 'HOLD', reason: 'NON_FINITE_INPUT' });
  });

  it('should discard snapshots at or below the last sequence', () => {
    const evaluator = new SignalEvaluator(crossover);
    evaluator.evaluate(snapshot(3, { sma5: 1, sma10: 1 }), FLAT);

    const repeated = evaluator.evaluate(goldenCross(), FLAT);
    const older = evaluator.evaluate(snapshot(2, { sma5: 11, sma10: 10 }, { sma5: 9, sma10: 10 }), FLAT);

    expect(repeated.kind).toBe('ACTIONABLE');
    expect(older.kind).toBe('STALE');
    if (older.kind === 'STALE') {
      expect(older.error).toBeInstanceOf(StaleSignal);
    }
    expect(evaluator.evaluate(goldenCross(), FLAT).kind).toBe('STALE');
  });

  it('should advance the last sequence on HOLD as well', () => {
    const evaluator = new SignalEvaluator(crossover);

    evaluator.evaluate(snapshot(7, { sma5: 1, sma10: 1 }), FLAT);

    expect(evaluator.lastSequence('X')).toBe(7);
    expect(evaluator.lastSequence('Y')).toBe(0);
  });

  it('should keep sequences independent per instrument', () => {
    const evaluator = new SignalEvaluator(crossover);
    evaluator.evaluate(snapshot(9, { sma5: 1, sma10: 1 }), FLAT);

    const other = evaluator.evaluate({ ...goldenCross(), instrument: 'Y' }, FLAT);

    expect(other.kind).toBe('ACTIONABLE');
  });

  it('should prefer per-instrument rule overrides', () => {
    const override: StrategyRule[] = [
      {
        name: 'always-short',
        action: 'ENTER_SHORT',
        conditions: [{ kind: 'threshold', operand: 'close', comparator: '>', value: 0 }],
      },
    ];
    const evaluator = new SignalEvaluator(crossover, { X: override });

    const outcome = evaluator.evaluate(goldenCross(), FLAT);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('ENTER_SHORT');
    }
  });
});

describe('trend-rsi preset', () => {
  const rules = STRATEGY_PRESETS['trend-rsi'].rules;

  it('should enter long on an RSI dip above the average', () => {
    const evaluator = new SignalEvaluator(rules);

    const outcome = evaluator.evaluate(snapshot(1, { sma20: 95, rsi14: 25 }), FLAT);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('ENTER_LONG');
    }
  });

  it('should exit a long on the stop loss', () => {
    const evaluator = new SignalEvaluator(rules);

    const outcome = evaluator.evaluate(snapshot(1, { sma20: 95, rsi14: 50 }, undefined, 96), LONG);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.rule).toBe('long-stop-loss');
    }
  });

  it('should exit a short on the take profit', () => {
    const evaluator = new SignalEvaluator(rules);

    const outcome = evaluator.evaluate(snapshot(1, { sma20: 95, rsi14: 50 }, undefined, 93), SHORT);

    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.rule).toBe('short-take-profit');
    }
  });

  it('should hold a long inside its band', () => {
    const evaluator = new SignalEvaluator(rules);

    const outcome = evaluator.evaluate(snapshot(1, { sma20: 95, rsi14: 50 }, undefined, 101), LONG);

    expect(outcome.kind).toBe('HOLD');
  });

  it('should fire the stop loss when only an unused previous value is non-finite', () => {
    const preset = STRATEGY_PRESETS['trend-rsi'];
    const engine = new IndicatorEngine(preset.indicators);
    const closes = [...Array.from({ length: 21 }, () => 100), 96];
    const computed = engine.compute('X', { instrument: 'X', bars: barsFromCloses(closes), sequence: 22 });
    const evaluator = new SignalEvaluator(preset.rules);

    const outcome = evaluator.evaluate(computed, LONG);

    expect(computed.previous.rsi14).toBeNaN();
    expect(outcome.kind).toBe('ACTIONABLE');
    if (outcome.kind === 'ACTIONABLE') {
      expect(outcome.signal.action).toBe('EXIT');
      expect(outcome.signal.rule).toBe('long-stop-loss');
    }
  });

  it('should hold with NON_FINITE_INPUT when a NaN operand leaves no rule able to fire', () => {
    const evaluator = new SignalEvaluator(rules);

    const outcome = evaluator.evaluate(snapshot(1, { sma20: 95, rsi14: NaN }, undefined, 101), LONG);

    expect(outcome).toMatchObject({ kind: 'HOLD', reason: 'NON_FINITE_INPUT' });
  });
});
