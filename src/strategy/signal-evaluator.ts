import type { IndicatorSnapshot } from '../indicators/indicator.interface.js';
import type { PositionSide, PositionView } from '../execution/types/execution.types.js';
import type { EvaluationOutcome, Signal, SignalAction, StrategyRule } from './strategy.types.js';
import { StaleSignal } from '../errors/trading.errors.js';
import { getComponentLogger } from '../config/logger.js';
import { findMatchingRule } from './strategy-rules.js';

const PERMITTED_ACTIONS: Record<PositionSide, readonly SignalAction[]> = {
  FLAT: ['ENTER_LONG', 'ENTER_SHORT'],
  LONG: ['EXIT'],
  SHORT: ['EXIT'],
};

interface InstrumentState {
  lastSequence: number;
  state: PositionSide;
}

export function isPermitted(state: PositionSide, action: SignalAction): boolean {
  return action === 'HOLD' || PERMITTED_ACTIONS[state].includes(action);
}

function hasNonFiniteInput(snapshot: IndicatorSnapshot): boolean {
  const numbers = [
    snapshot.close,
    snapshot.previousClose,
    ...Object.values(snapshot.values),
    ...Object.values(snapshot.previous),
  ];
  return numbers.some(value => !Number.isFinite(value));
}

/**
 * Turns indicator snapshots into trading signals.
 *
 * Keeps one `{ lastSequence, state }` record per instrument. The state mirrors
 * the tracker's position side and is refreshed from the position passed to
 * every evaluation; the evaluator never changes positions itself.
 */
export class SignalEvaluator {
  private readonly instruments = new Map<string, InstrumentState>();
  private readonly logger = getComponentLogger('signal-evaluator');

  constructor(
    private readonly rules: readonly StrategyRule[],
    private readonly overrides: Readonly<Record<string, readonly StrategyRule[]>> = {}
  ) {}

  evaluate(snapshot: IndicatorSnapshot, position: PositionView): EvaluationOutcome {
    const entry = this.entryFor(snapshot.instrument);

    if (snapshot.sequence <= entry.lastSequence) {
      return {
        kind: 'STALE',
        error: new StaleSignal(snapshot.instrument, snapshot.sequence, entry.lastSequence),
      };
    }

    entry.lastSequence = snapshot.sequence;
    entry.state = position.side;

    const rule = findMatchingRule(this.rulesFor(snapshot.instrument), snapshot, position);
    if (!rule) {
      if (hasNonFiniteInput(snapshot)) {
        this.logger.debug(
          { instrument: snapshot.instrument, sequence: snapshot.sequence },
          'Non-finite indicator value, holding'
        );
        return { kind: 'HOLD', signal: this.signal(snapshot, 'HOLD'), reason: 'NON_FINITE_INPUT' };
      }
      return { kind: 'HOLD', signal: this.signal(snapshot, 'HOLD'), reason: 'NO_MATCH' };
    }

    const signal = this.signal(snapshot, rule.action, rule.name);

    if (!isPermitted(entry.state, rule.action)) {
      this.logger.info(
        { instrument: snapshot.instrument, sequence: snapshot.sequence, action: rule.action, state: entry.state },
        'Signal suppressed by position state'
      );
      return { kind: 'SUPPRESSED', signal, state: entry.state };
    }

    this.logger.info(
      { instrument: snapshot.instrument, sequence: snapshot.sequence, action: rule.action, rule: rule.name },
      'Actionable signal'
    );
    return { kind: 'ACTIONABLE', signal };
  }

  lastSequence(instrument: string): number {
    return this.instruments.get(instrument)?.lastSequence ?? 0;
  }

  state(instrument: string): PositionSide {
    return this.instruments.get(instrument)?.state ?? 'FLAT';
  }

  private rulesFor(instrument: string): readonly StrategyRule[] {
    return this.overrides[instrument] ?? this.rules;
  }

  private entryFor(instrument: string): InstrumentState {
    let entry = this.instruments.get(instrument);
    if (!entry) {
      entry = { lastSequence: 0, state: 'FLAT' };
      this.instruments.set(instrument, entry);
    }
    return entry;
  }

  private signal(snapshot: IndicatorSnapshot, action: SignalAction, rule?: string): Signal {
    return {
      instrument: snapshot.instrument,
      action,
      sequence: snapshot.sequence,
      snapshot,
      rule,
      createdAt: new Date(),
    };
  }
}
