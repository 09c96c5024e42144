/**
 * Execution Scheduler - Drives cache → indicators → evaluator → execution per instrument
 *
 * One lane per instrument keeps that instrument's cycles in tick order; lanes
 * run concurrently up to `maxConcurrentCycles`. A failing cycle is logged,
 * journaled and skipped; it never stops the scheduler.
 */

import type { Instrument, PriceBar } from '../types/market.types.js';
import type { MarketDataCache } from '../market-data/market-data-cache.js';
import type { IndicatorEngine } from '../indicators/indicator-engine.js';
import type { SignalEvaluator } from '../strategy/signal-evaluator.js';
import type { TradeAction } from '../strategy/strategy.types.js';
import type { PositionRiskTracker } from '../execution/services/position-risk-tracker.service.js';
import type { TradingEventJournal } from '../execution/services/trading-event-journal.service.js';
import type {
  OrderExecutionManager,
  SubmissionResult,
} from '../execution/services/order-execution-manager.service.js';
import { InsufficientHistory, UnknownInstrument } from '../errors/trading.errors.js';
import { getComponentLogger, logCycleOutcome } from '../config/logger.js';
import { InstrumentLane, Semaphore } from './instrument-lane.js';

export type SkipCause = 'STOPPED' | 'INSUFFICIENT_HISTORY' | 'DUPLICATE_BAR' | 'OUT_OF_ORDER_BAR';

export type CycleOutcome =
  | { kind: 'SKIPPED'; instrument: string; reason: SkipCause }
  | { kind: 'STALE'; instrument: string; sequence: number }
  | { kind: 'HOLD'; instrument: string; sequence: number }
  | { kind: 'SUPPRESSED'; instrument: string; sequence: number; action: TradeAction }
  | { kind: 'COOLDOWN'; instrument: string; sequence: number; remainingMs: number }
  | { kind: 'SUBMITTED'; instrument: string; sequence: number; result: SubmissionResult }
  | { kind: 'FAILED'; instrument: string; error: Error };

export type CycleKind = CycleOutcome['kind'];

export interface SchedulerOptions {
  maxConcurrentCycles: number;
  // Minimum time between two orders sent for the same instrument
  orderCooldownMs: number;
  // Bars handed to the indicator engine per cycle, never fewer than its lookback
  historyWindow: number;
}

export interface SchedulerDeps {
  instruments: readonly Instrument[];
  cache: MarketDataCache;
  engine: IndicatorEngine;
  evaluator: SignalEvaluator;
  manager: OrderExecutionManager;
  tracker: PositionRiskTracker;
  journal: TradingEventJournal;
}

export interface SchedulerStats {
  running: boolean;
  accepting: boolean;
  cycles: number;
  outcomes: Record<CycleKind, number>;
  lastCycleAt?: Date;
  pending: Record<string, number>;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  maxConcurrentCycles: 4,
  orderCooldownMs: 0,
  historyWindow: 200,
};

// Statuses for which an order was actually sent to the exchange
const SENT_STATUSES: ReadonlySet<SubmissionResult['status']> = new Set(['ACKED', 'REJECTED', 'UNKNOWN']);

export class ExecutionScheduler {
  private readonly options: SchedulerOptions;
  private readonly instruments = new Map<string, Instrument>();
  private readonly lanes = new Map<string, InstrumentLane>();
  private readonly lastOrderAt = new Map<string, number>();
  private readonly logger = getComponentLogger('execution-scheduler');

  private readonly outcomes: Record<CycleKind, number> = {
    SKIPPED: 0,
    STALE: 0,
    HOLD: 0,
    SUPPRESSED: 0,
    COOLDOWN: 0,
    SUBMITTED: 0,
    FAILED: 0,
  };
  private cycles = 0;
  private lastCycleAt?: Date;
  private accepting = true;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: SchedulerDeps,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
    const slots = new Semaphore(this.options.maxConcurrentCycles);
    for (const instrument of deps.instruments) {
      this.instruments.set(instrument.id, instrument);
      this.lanes.set(instrument.id, new InstrumentLane(instrument.id, slots));
    }
  }

  /**
   * Append a bar, update the mark price and run a cycle, in the instrument's lane.
   */
  onTick(instrument: string, bar: PriceBar): Promise<CycleOutcome> {
    return this.schedule(instrument, async () => {
      const appended = this.deps.cache.append(instrument, bar);
      if (appended.status === 'DUPLICATE') {
        return { kind: 'SKIPPED', instrument, reason: 'DUPLICATE_BAR' };
      }
      if (appended.status === 'OUT_OF_ORDER') {
        return { kind: 'SKIPPED', instrument, reason: 'OUT_OF_ORDER_BAR' };
      }
      this.deps.tracker.markPrice(instrument, bar.close);
      return this.cycle(instrument);
    });
  }

  /**
   * Run a cycle on the current history. Repeated triggers without new bars
   * come back STALE.
   */
  evaluate(instrument: string): Promise<CycleOutcome> {
    return this.schedule(instrument, () => this.cycle(instrument));
  }

  evaluateAll(): Promise<CycleOutcome[]> {
    return Promise.all(Array.from(this.lanes.keys(), instrument => this.evaluate(instrument)));
  }

  /**
   * Optionally evaluate every instrument on a fixed interval.
   */
  start(intervalMs?: number): void {
    this.accepting = true;
    if (intervalMs !== undefined && intervalMs > 0 && !this.timer) {
      this.timer = setInterval(() => {
        void this.evaluateAll();
      }, intervalMs);
      this.logger.info({ intervalMs }, 'Periodic evaluation started');
    }
  }

  /**
   * Stop accepting work, let every lane finish, then wait for in-flight submissions.
   */
  async stop(): Promise<void> {
    this.accepting = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.all(Array.from(this.lanes.values(), lane => lane.idle()));
    await this.deps.manager.drain();
    this.logger.info({ cycles: this.cycles }, 'Scheduler stopped');
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  getStats(): SchedulerStats {
    const pending: Record<string, number> = {};
    for (const [instrument, lane] of this.lanes) {
      pending[instrument] = lane.getPending();
    }
    return {
      running: this.timer !== null,
      accepting: this.accepting,
      cycles: this.cycles,
      outcomes: { ...this.outcomes },
      lastCycleAt: this.lastCycleAt,
      pending,
    };
  }

  private schedule(instrument: string, task: () => Promise<CycleOutcome>): Promise<CycleOutcome> {
    const lane = this.lanes.get(instrument);
    if (!lane) {
      return Promise.resolve(this.record({ kind: 'FAILED', instrument, error: new UnknownInstrument(instrument) }));
    }
    if (!this.accepting) {
      return Promise.resolve({ kind: 'SKIPPED', instrument, reason: 'STOPPED' });
    }

    return lane.enqueue(async () => {
      try {
        return this.record(await task());
      } catch (error) {
        return this.record(this.contain(instrument, error));
      }
    });
  }

  private async cycle(instrument: string): Promise<CycleOutcome> {
    const { cache, engine, evaluator, tracker, manager } = this.deps;

    const window = Math.max(engine.lookback, Math.min(cache.size(instrument), this.options.historyWindow));
    const snapshot = engine.compute(instrument, cache.history(instrument, window));
    const outcome = evaluator.evaluate(snapshot, tracker.getPosition(instrument));

    if (outcome.kind === 'STALE') {
      return { kind: 'STALE', instrument, sequence: snapshot.sequence };
    }
    const action = outcome.signal.action;
    if (outcome.kind === 'HOLD' || action === 'HOLD') {
      return { kind: 'HOLD', instrument, sequence: snapshot.sequence };
    }
    if (outcome.kind === 'SUPPRESSED') {
      return { kind: 'SUPPRESSED', instrument, sequence: snapshot.sequence, action };
    }

    const now = Date.now();
    const lastOrderAt = this.lastOrderAt.get(instrument);
    if (this.options.orderCooldownMs > 0 && lastOrderAt !== undefined) {
      const elapsed = now - lastOrderAt;
      if (elapsed < this.options.orderCooldownMs) {
        this.logger.info(
          { instrument, sequence: snapshot.sequence, remainingMs: this.options.orderCooldownMs - elapsed },
          'Order cooldown active, signal dropped'
        );
        return {
          kind: 'COOLDOWN',
          instrument,
          sequence: snapshot.sequence,
          remainingMs: this.options.orderCooldownMs - elapsed,
        };
      }
    }

    const config = this.instruments.get(instrument);
    if (!config) {
      throw new UnknownInstrument(instrument);
    }

    const result = await manager.submit(outcome.signal, config, snapshot.close);
    if (SENT_STATUSES.has(result.status)) {
      this.lastOrderAt.set(instrument, now);
    }
    return { kind: 'SUBMITTED', instrument, sequence: snapshot.sequence, result };
  }

  private contain(instrument: string, error: unknown): CycleOutcome {
    if (error instanceof InsufficientHistory) {
      this.logger.debug({ instrument, required: error.required, available: error.available }, 'Waiting for history');
      return { kind: 'SKIPPED', instrument, reason: 'INSUFFICIENT_HISTORY' };
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    this.deps.journal.record({
      type: 'CYCLE_ERROR',
      instrument,
      message: failure.message,
      metadata: { error: failure.name },
    });
    return { kind: 'FAILED', instrument, error: failure };
  }

  private record(outcome: CycleOutcome): CycleOutcome {
    this.cycles++;
    this.outcomes[outcome.kind]++;
    this.lastCycleAt = new Date();
    logCycleOutcome(outcome);
    return outcome;
  }
}
