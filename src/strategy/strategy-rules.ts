import type { IndicatorSnapshot } from '../indicators/indicator.interface.js';
import type { PositionView } from '../execution/types/execution.types.js';
import type { Comparator, Condition, Operand, StrategyRule } from './strategy.types.js';

/**
 * Value of an operand, or undefined when it is missing or non-finite. A
 * condition that cannot resolve every operand it reads is false.
 */
function resolve(snapshot: IndicatorSnapshot, operand: Operand, previous = false): number | undefined {
  let value: number | undefined;
  if (operand === 'close') {
    value = previous ? snapshot.previousClose : snapshot.close;
  } else {
    value = previous ? snapshot.previous[operand] : snapshot.values[operand];
  }
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

export function compare(left: number, comparator: Comparator, right: number): boolean {
  switch (comparator) {
    case '>':
      return left > right;
    case '<':
      return left < right;
    case '>=':
      return left >= right;
    case '<=':
      return left <= right;
  }
}

export function evaluateCondition(
  condition: Condition,
  snapshot: IndicatorSnapshot,
  position: PositionView
): boolean {
  switch (condition.kind) {
    case 'crossover': {
      const fast = resolve(snapshot, condition.fast);
      const slow = resolve(snapshot, condition.slow);
      const prevFast = resolve(snapshot, condition.fast, true);
      const prevSlow = resolve(snapshot, condition.slow, true);
      if (fast === undefined || slow === undefined || prevFast === undefined || prevSlow === undefined) {
        return false;
      }
      return condition.direction === 'above'
        ? prevFast <= prevSlow && fast > slow
        : prevFast >= prevSlow && fast < slow;
    }

    case 'threshold': {
      const value = resolve(snapshot, condition.operand);
      return value !== undefined && compare(value, condition.comparator, condition.value);
    }

    case 'compare': {
      const left = resolve(snapshot, condition.left);
      const right = resolve(snapshot, condition.right);
      return left !== undefined && right !== undefined && compare(left, condition.comparator, right);
    }

    case 'stopLoss':
      if (!Number.isFinite(snapshot.close)) return false;
      if (position.side === 'LONG') {
        return snapshot.close <= position.avgEntryPrice * (1 - condition.percent);
      }
      if (position.side === 'SHORT') {
        return snapshot.close >= position.avgEntryPrice * (1 + condition.percent);
      }
      return false;

    case 'takeProfit':
      if (!Number.isFinite(snapshot.close)) return false;
      if (position.side === 'LONG') {
        return snapshot.close >= position.avgEntryPrice * (1 + condition.percent);
      }
      if (position.side === 'SHORT') {
        return snapshot.close <= position.avgEntryPrice * (1 - condition.percent);
      }
      return false;
  }
}

/**
 * First rule (in priority order) whose conditions all hold for the position's state.
 */
export function findMatchingRule(
  rules: readonly StrategyRule[],
  snapshot: IndicatorSnapshot,
  position: PositionView
): StrategyRule | undefined {
  return rules.find(
    rule =>
      (rule.states === undefined || rule.states.includes(position.side)) &&
      rule.conditions.length > 0 &&
      rule.conditions.every(condition => evaluateCondition(condition, snapshot, position))
  );
}

/**
 * Operands a rule reads from the snapshot, for configuration checks.
 */
export function referencedOperands(rule: StrategyRule): Operand[] {
  return rule.conditions.flatMap(condition => {
    switch (condition.kind) {
      case 'crossover':
        return [condition.fast, condition.slow];
      case 'threshold':
        return [condition.operand];
      case 'compare':
        return [condition.left, condition.right];
      case 'stopLoss':
      case 'takeProfit':
        return [];
    }
  });
}
