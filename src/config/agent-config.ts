import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Instrument } from '../types/market.types.js';
import type { IndicatorSpec } from '../indicators/indicator.interface.js';
import type { StrategyRule } from '../strategy/strategy.types.js';
import type {
  GlobalRiskLimits,
  InstrumentRiskLimits,
  RetryPolicy,
} from '../execution/types/execution.types.js';
import type { SchedulerOptions } from '../scheduler/execution-scheduler.js';
import { IndicatorEngine, PRICE_OPERANDS, outputNames } from '../indicators/indicator-engine.js';
import { referencedOperands } from '../strategy/strategy-rules.js';
import { STRATEGY_PRESETS } from '../strategy/strategy.config.js';
import { DEFAULT_RETRY_POLICY, validateRetryPolicy } from '../execution/services/retry-policy.js';
import { ConfigurationError } from '../errors/trading.errors.js';

const positive = z.number().positive();
const nonNegative = z.number().nonnegative();
const period = z.number().int().positive();

const instrumentSchema = z.object({
  id: z.string().min(1),
  tickSize: positive,
  lotSize: positive,
  minOrderSize: positive,
  orderSize: positive.optional(),
  limits: z.object({
    maxPositionSize: positive,
    maxNotional: positive,
  }),
});

const indicatorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sma'), name: z.string().min(1), period }),
  z.object({ kind: z.literal('ema'), name: z.string().min(1), period }),
  z.object({ kind: z.literal('rsi'), name: z.string().min(1), period }),
  z.object({ kind: z.literal('atr'), name: z.string().min(1), period }),
  z.object({
    kind: z.literal('macd'),
    name: z.string().min(1),
    fast: period,
    slow: period,
    signal: period,
  }),
]);

const comparator = z.enum(['>', '<', '>=', '<=']);
const operand = z.string().min(1);
const fraction = z.number().positive().lt(1);

const conditionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('crossover'),
    fast: operand,
    slow: operand,
    direction: z.enum(['above', 'below']),
  }),
  z.object({ kind: z.literal('threshold'), operand, comparator, value: z.number() }),
  z.object({ kind: z.literal('compare'), left: operand, comparator, right: operand }),
  z.object({ kind: z.literal('stopLoss'), percent: fraction }),
  z.object({ kind: z.literal('takeProfit'), percent: fraction }),
]);

const ruleSchema = z.object({
  name: z.string().min(1),
  action: z.enum(['ENTER_LONG', 'ENTER_SHORT', 'EXIT']),
  states: z.array(z.enum(['FLAT', 'LONG', 'SHORT'])).min(1).optional(),
  conditions: z.array(conditionSchema).min(1),
});

const ruleSetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('preset'), name: z.enum(['trend-rsi', 'sma-crossover', 'macd-trend']) }),
  z.object({ kind: z.literal('rules'), rules: z.array(ruleSchema).min(1) }),
]);

const agentConfigSchema = z.object({
  instruments: z.array(instrumentSchema).min(1),
  globalLimits: z.object({
    maxConcurrentPositions: z.number().int().positive(),
    maxGlobalNotional: positive,
  }),
  // Defaults to the indicators of every preset in use
  indicators: z.array(indicatorSchema).optional(),
  strategy: ruleSetSchema.default({ kind: 'preset', name: 'sma-crossover' }),
  instrumentStrategies: z.record(ruleSetSchema).default({}),
  retryPolicy: z
    .object({
      maxAttempts: z.number().int(),
      baseDelayMs: z.number(),
      maxDelayMs: z.number(),
      multiplier: z.number(),
      attemptTimeoutMs: z.number(),
    })
    .partial()
    .default({}),
  cacheCapacity: z.number().int().positive().default(500),
  scheduler: z
    .object({
      maxConcurrentCycles: z.number().int().positive().default(4),
      orderCooldownMs: nonNegative.default(0),
      historyWindow: z.number().int().positive().default(200),
      // 0 disables periodic evaluation
      evaluationIntervalMs: nonNegative.default(0),
    })
    .default({}),
  paperExchange: z
    .object({
      latencyMs: nonNegative.default(50),
      fillDelayMs: nonNegative.default(100),
      fillChunks: z.number().int().positive().default(1),
      slippageBps: nonNegative.default(0),
    })
    .default({}),
  feed: z
    .object({
      intervalMs: positive.default(1000),
      barMs: positive.default(60_000),
      volatility: positive.default(0.002),
      startPrices: z.record(positive).default({}),
    })
    .default({}),
});

type RuleSetReference = z.infer<typeof ruleSetSchema>;

export type PaperExchangeSettings = z.infer<typeof agentConfigSchema>['paperExchange'];
export type FeedSettings = z.infer<typeof agentConfigSchema>['feed'];

export interface AgentSchedulerSettings extends SchedulerOptions {
  evaluationIntervalMs: number;
}

/**
 * Validated agent configuration. Every nested object is frozen.
 */
export interface AgentConfig {
  instruments: Instrument[];
  instrumentLimits: Record<string, InstrumentRiskLimits>;
  globalLimits: GlobalRiskLimits;
  indicators: IndicatorSpec[];
  rules: StrategyRule[];
  instrumentRules: Record<string, StrategyRule[]>;
  retryPolicy: RetryPolicy;
  cacheCapacity: number;
  lookback: number;
  scheduler: AgentSchedulerSettings;
  paperExchange: PaperExchangeSettings;
  feed: FeedSettings;
}

function resolveRules(reference: RuleSetReference): StrategyRule[] {
  return reference.kind === 'preset' ? STRATEGY_PRESETS[reference.name].rules : reference.rules;
}

function presetIndicators(references: RuleSetReference[]): IndicatorSpec[] {
  const byName = new Map<string, IndicatorSpec>();
  for (const reference of references) {
    if (reference.kind !== 'preset') continue;
    for (const spec of STRATEGY_PRESETS[reference.name].indicators) {
      byName.set(spec.name, spec);
    }
  }
  return Array.from(byName.values());
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function checkOperands(
  scope: string,
  rules: StrategyRule[],
  available: ReadonlySet<string>
): string[] {
  const issues: string[] = [];
  for (const rule of rules) {
    for (const name of referencedOperands(rule)) {
      if (!available.has(name)) {
        issues.push(`${scope}: rule "${rule.name}" references unknown operand "${name}"`);
      }
    }
  }
  return issues;
}

/**
 * Validate raw configuration. Collects every schema and cross-field issue
 * before throwing a single ConfigurationError.
 */
export function parseAgentConfig(raw: unknown): AgentConfig {
  const parsed = agentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const input = parsed.data;
  const issues: string[] = [];

  const instrumentIds = new Set<string>();
  for (const instrument of input.instruments) {
    if (instrumentIds.has(instrument.id)) {
      issues.push(`instruments: duplicate instrument "${instrument.id}"`);
    }
    instrumentIds.add(instrument.id);
  }

  for (const id of Object.keys(input.instrumentStrategies)) {
    if (!instrumentIds.has(id)) {
      issues.push(`instrumentStrategies: "${id}" is not a configured instrument`);
    }
  }

  const indicators =
    input.indicators ??
    presetIndicators([input.strategy, ...Object.values(input.instrumentStrategies)]);

  const available = new Set<string>(PRICE_OPERANDS);
  for (const spec of indicators) {
    for (const name of outputNames(spec)) {
      if (available.has(name)) {
        issues.push(`indicators: output name "${name}" is defined more than once`);
      }
      available.add(name);
    }
    if (spec.kind === 'macd' && spec.fast >= spec.slow) {
      issues.push(`indicators: "${spec.name}" fast period must be shorter than slow period`);
    }
  }

  const rules = resolveRules(input.strategy);
  issues.push(...checkOperands('strategy', rules, available));

  const instrumentRules: Record<string, StrategyRule[]> = {};
  for (const [id, reference] of Object.entries(input.instrumentStrategies)) {
    instrumentRules[id] = resolveRules(reference);
    issues.push(...checkOperands(`instrumentStrategies.${id}`, instrumentRules[id], available));
  }

  const lookback = new IndicatorEngine(indicators).lookback;
  if (input.cacheCapacity < lookback) {
    issues.push(`cacheCapacity: ${input.cacheCapacity} is below the indicator lookback of ${lookback} bars`);
  }

  const retryPolicy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...input.retryPolicy };
  issues.push(...validateRetryPolicy(retryPolicy).map(message => `retryPolicy: ${message}`));

  for (const id of Object.keys(input.feed.startPrices)) {
    if (!instrumentIds.has(id)) {
      issues.push(`feed.startPrices: "${id}" is not a configured instrument`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const instrumentLimits: Record<string, InstrumentRiskLimits> = {};
  const instruments: Instrument[] = input.instruments.map(({ limits, ...instrument }) => {
    instrumentLimits[instrument.id] = limits;
    return instrument;
  });

  return deepFreeze({
    instruments,
    instrumentLimits,
    globalLimits: input.globalLimits,
    // Preset rule sets are shared; copy them so freezing never reaches the presets
    indicators: structuredClone(indicators),
    rules: structuredClone(rules),
    instrumentRules: structuredClone(instrumentRules),
    retryPolicy,
    cacheCapacity: input.cacheCapacity,
    lookback,
    scheduler: input.scheduler,
    paperExchange: input.paperExchange,
    feed: input.feed,
  });
}

/**
 * Read and validate the agent configuration file. Loaded once at startup.
 */
export function loadAgentConfig(path: string): AgentConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError([
      `${path}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return parseAgentConfig(raw);
}
