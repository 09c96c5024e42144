import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadAgentConfig, parseAgentConfig } from './agent-config.js';
import { ConfigurationError } from '../errors/trading.errors.js';
import { STRATEGY_PRESETS } from '../strategy/strategy.config.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config/agent.config.json', import.meta.url));

function minimalConfig(overrides: Record<string, unknown> = {}) {
  return {
    instruments: [
      {
        id: 'BTC-USDT',
        tickSize: 0.1,
        lotSize: 0.001,
        minOrderSize: 0.001,
        limits: { maxPositionSize: 1, maxNotional: 1000 },
      },
    ],
    globalLimits: { maxConcurrentPositions: 2, maxGlobalNotional: 5000 },
    ...overrides,
  };
}

function issuesOf(raw: unknown): string[] {
  try {
    parseAgentConfig(raw);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe('parseAgentConfig', () => {
  it('should fill defaults and resolve the default preset', () => {
    const config = parseAgentConfig(minimalConfig());

    expect(config.rules).toEqual(STRATEGY_PRESETS['sma-crossover'].rules);
    expect(config.indicators.map(spec => spec.name)).toEqual(['sma5', 'sma10']);
    expect(config.retryPolicy).toEqual({
      maxAttempts: 3,
      baseDelayMs: 500,
      maxDelayMs: 5000,
      multiplier: 2,
      attemptTimeoutMs: 5000,
    });
    expect(config.cacheCapacity).toBe(500);
    expect(config.lookback).toBe(11);
    expect(config.scheduler).toEqual({
      maxConcurrentCycles: 4,
      orderCooldownMs: 0,
      historyWindow: 200,
      evaluationIntervalMs: 0,
    });
  });

  it('should split instrument limits out of the instrument list', () => {
    const config = parseAgentConfig(minimalConfig());

    expect(config.instruments).toEqual([
      { id: 'BTC-USDT', tickSize: 0.1, lotSize: 0.001, minOrderSize: 0.001 },
    ]);
    expect(config.instrumentLimits).toEqual({ 'BTC-USDT': { maxPositionSize: 1, maxNotional: 1000 } });
  });

  it('should freeze the result without freezing the shared presets', () => {
    const config = parseAgentConfig(minimalConfig());

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.instruments[0])).toBe(true);
    expect(Object.isFrozen(config.rules[0].conditions[0])).toBe(true);
    expect(Object.isFrozen(STRATEGY_PRESETS['sma-crossover'].rules[0])).toBe(false);
  });

  it('should merge the indicators of every preset in use', () => {
    const config = parseAgentConfig(
      minimalConfig({ instrumentStrategies: { 'BTC-USDT': { kind: 'preset', name: 'trend-rsi' } } })
    );

    expect(config.indicators.map(spec => spec.name)).toEqual(['sma5', 'sma10', 'sma20', 'rsi14']);
    expect(config.instrumentRules['BTC-USDT']).toEqual(STRATEGY_PRESETS['trend-rsi'].rules);
  });

  it('should accept inline rules against inline indicators', () => {
    const config = parseAgentConfig(
      minimalConfig({
        indicators: [{ kind: 'ema', name: 'fast', period: 3 }],
        strategy: {
          kind: 'rules',
          rules: [
            {
              name: 'above-ema',
              action: 'ENTER_LONG',
              conditions: [{ kind: 'compare', left: 'close', comparator: '>', right: 'fast' }],
            },
          ],
        },
        cacheCapacity: 10,
      })
    );

    expect(config.rules[0].name).toBe('above-ema');
    expect(config.lookback).toBe(4);
  });

  it('should report schema violations with their path', () => {
    const issues = issuesOf(minimalConfig({ globalLimits: { maxConcurrentPositions: 0, maxGlobalNotional: 5000 } }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^globalLimits\.maxConcurrentPositions: /);
  });

  it('should reject an unknown indicator kind', () => {
    const issues = issuesOf(minimalConfig({ indicators: [{ kind: 'vwap', name: 'v', period: 3 }] }));

    expect(issues[0]).toMatch(/^indicators\.0\.kind: /);
  });

  it('should list every cross-field issue at once', () => {
    const issues = issuesOf(
      minimalConfig({
        indicators: [{ kind: 'sma', name: 'fast', period: 20 }],
        strategy: {
          kind: 'rules',
          rules: [
            {
              name: 'cross',
              action: 'ENTER_LONG',
              conditions: [{ kind: 'crossover', fast: 'fast', slow: 'slow', direction: 'above' }],
            },
          ],
        },
        instrumentStrategies: { 'ETH-USDT': { kind: 'preset', name: 'trend-rsi' } },
        cacheCapacity: 10,
        retryPolicy: { multiplier: 0.5 },
      })
    );

    expect(issues).toEqual([
      'instrumentStrategies: "ETH-USDT" is not a configured instrument',
      'strategy: rule "cross" references unknown operand "slow"',
      'instrumentStrategies.ETH-USDT: rule "long-rsi-overbought" references unknown operand "rsi14"',
      'instrumentStrategies.ETH-USDT: rule "short-rsi-oversold" references unknown operand "rsi14"',
      'instrumentStrategies.ETH-USDT: rule "uptrend-dip-entry" references unknown operand "sma20"',
      'instrumentStrategies.ETH-USDT: rule "uptrend-dip-entry" references unknown operand "rsi14"',
      'instrumentStrategies.ETH-USDT: rule "downtrend-rally-entry" references unknown operand "sma20"',
      'instrumentStrategies.ETH-USDT: rule "downtrend-rally-entry" references unknown operand "rsi14"',
      'cacheCapacity: 10 is below the indicator lookback of 21 bars',
      'retryPolicy: multiplier must be at least 1',
    ]);
  });

  it('should reject duplicate instruments and indicator names', () => {
    const base = minimalConfig();
    const issues = issuesOf({
      ...base,
      instruments: [base.instruments[0], base.instruments[0]],
      indicators: [
        { kind: 'sma', name: 'sma5', period: 5 },
        { kind: 'ema', name: 'sma5', period: 5 },
      ],
      strategy: {
        kind: 'rules',
        rules: [{ name: 'r', action: 'EXIT', conditions: [{ kind: 'stopLoss', percent: 0.02 }] }],
      },
    });

    expect(issues).toEqual([
      'instruments: duplicate instrument "BTC-USDT"',
      'indicators: output name "sma5" is defined more than once',
    ]);
  });
});

describe('loadAgentConfig', () => {
  it('should load the shipped configuration', () => {
    const config = loadAgentConfig(SHIPPED_CONFIG);

    expect(config.instruments.map(instrument => instrument.id)).toEqual(['BTC-USDT', 'ETH-USDT']);
    expect(config.indicators.map(spec => spec.name)).toEqual(['sma5', 'sma10', 'sma20', 'rsi14']);
    expect(config.paperExchange.fillChunks).toBe(2);
  });

  it('should wrap a missing file in a ConfigurationError', () => {
    expect(() => loadAgentConfig('/nonexistent/agent.config.json')).toThrow(ConfigurationError);
  });
});
