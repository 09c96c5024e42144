import type { IndicatorSnapshot } from '../indicators/indicator.interface.js';
import type { PositionSide } from '../execution/types/execution.types.js';
import type { StaleSignal } from '../errors/trading.errors.js';

// Core decision types
export type SignalAction = 'ENTER_LONG' | 'ENTER_SHORT' | 'EXIT' | 'HOLD';
export type TradeAction = Exclude<SignalAction, 'HOLD'>;

export type Comparator = '>' | '<' | '>=' | '<=';

// Indicator output name, or `close`
export type Operand = string;

/**
 * Conditions a rule may combine. Closed set: the evaluator switches on `kind`.
 */
export type Condition =
  | { kind: 'crossover'; fast: Operand; slow: Operand; direction: 'above' | 'below' }
  | { kind: 'threshold'; operand: Operand; comparator: Comparator; value: number }
  | { kind: 'compare'; left: Operand; comparator: Comparator; right: Operand }
  // Fractions of the average entry price, e.g. 0.03 for 3%
  | { kind: 'stopLoss'; percent: number }
  | { kind: 'takeProfit'; percent: number };

export interface StrategyRule {
  name: string;
  action: TradeAction;
  // States the rule is considered in; every state when omitted
  states?: PositionSide[];
  // All must hold
  conditions: Condition[];
}

export interface Signal {
  instrument: string;
  action: SignalAction;
  sequence: number;
  snapshot: IndicatorSnapshot;
  rule?: string;
  createdAt: Date;
}

export type EvaluationOutcome =
  | { kind: 'STALE'; error: StaleSignal }
  | { kind: 'HOLD'; signal: Signal; reason: 'NO_MATCH' | 'NON_FINITE_INPUT' }
  | { kind: 'SUPPRESSED'; signal: Signal; state: PositionSide }
  | { kind: 'ACTIONABLE'; signal: Signal };
