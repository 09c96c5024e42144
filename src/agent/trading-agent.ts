/**
 * Trading Agent - Composition root for one paper or live trading process
 *
 * Owns one cache, indicator engine, evaluator, tracker, journal, execution
 * manager and scheduler, built from a validated AgentConfig.
 */

import type { AgentConfig } from '../config/agent-config.js';
import type { PriceBar } from '../types/market.types.js';
import type { ExchangeAdapter } from '../execution/interfaces/exchange-adapter.interface.js';
import type { ExposureSummary, Position } from '../execution/types/execution.types.js';
import type { MarketDataFeed } from '../market-data/market-data-feed.js';
import type { CycleOutcome, SchedulerStats } from '../scheduler/execution-scheduler.js';
import type { TradingEventType } from '../execution/services/trading-event-journal.service.js';
import { MarketDataCache } from '../market-data/market-data-cache.js';
import { SyntheticFeed } from '../market-data/synthetic-feed.js';
import { IndicatorEngine } from '../indicators/indicator-engine.js';
import { SignalEvaluator } from '../strategy/signal-evaluator.js';
import { PositionRiskTracker } from '../execution/services/position-risk-tracker.service.js';
import { TradingEventJournal } from '../execution/services/trading-event-journal.service.js';
import { OrderExecutionManager } from '../execution/services/order-execution-manager.service.js';
import { PaperExchangeAdapter } from '../execution/adapters/paper-exchange.adapter.js';
import { ExecutionScheduler } from '../scheduler/execution-scheduler.js';
import { isOpen } from '../execution/services/order-state-machine.js';
import { getComponentLogger } from '../config/logger.js';

export interface TradingAgentOptions {
  // Defaults to a paper exchange priced from the cache
  exchange?: ExchangeAdapter;
  // Bars pushed into the agent while it runs; ticks may also arrive by HTTP
  feed?: MarketDataFeed;
}

export interface PaperRunOptions {
  // Bars per instrument before the feed stops by itself
  maxBars?: number;
  intervalMs?: number;
}

export interface InstrumentStatus {
  id: string;
  sequence: number;
  bars: number;
  lastClose?: number;
  position: Position;
  unrealizedPnl: number;
  inFlightOrder?: string;
}

export interface AgentStatus {
  running: boolean;
  startedAt?: Date;
  uptimeMs: number;
  instruments: InstrumentStatus[];
  exposure: ExposureSummary;
  scheduler: SchedulerStats;
  orders: { total: number; open: number };
  events: Record<TradingEventType, number>;
}

function countEvents(journal: TradingEventJournal): Record<TradingEventType, number> {
  return {
    RISK_REJECTED: journal.count('RISK_REJECTED'),
    ORDER_REJECTED: journal.count('ORDER_REJECTED'),
    ORDER_UNKNOWN: journal.count('ORDER_UNKNOWN'),
    ORDER_CANCELLED: journal.count('ORDER_CANCELLED'),
    ORDER_RESOLVED: journal.count('ORDER_RESOLVED'),
    ORPHAN_FILL: journal.count('ORPHAN_FILL'),
    CYCLE_ERROR: journal.count('CYCLE_ERROR'),
  };
}

export class TradingAgent {
  readonly cache: MarketDataCache;
  readonly engine: IndicatorEngine;
  readonly evaluator: SignalEvaluator;
  readonly tracker: PositionRiskTracker;
  readonly journal: TradingEventJournal;
  readonly exchange: ExchangeAdapter;
  readonly manager: OrderExecutionManager;
  readonly scheduler: ExecutionScheduler;

  private readonly paperExchange?: PaperExchangeAdapter;
  private readonly feed?: MarketDataFeed;
  private readonly logger = getComponentLogger('trading-agent');
  private startedAt?: Date;
  private running = false;

  constructor(
    readonly config: AgentConfig,
    options: TradingAgentOptions = {}
  ) {
    const instrumentIds = config.instruments.map(instrument => instrument.id);

    this.cache = new MarketDataCache(instrumentIds, config.cacheCapacity);
    this.engine = new IndicatorEngine(config.indicators);
    this.evaluator = new SignalEvaluator(config.rules, config.instrumentRules);
    this.tracker = new PositionRiskTracker(config.instrumentLimits, config.globalLimits);
    this.journal = new TradingEventJournal();

    if (options.exchange) {
      this.exchange = options.exchange;
    } else {
      this.paperExchange = new PaperExchangeAdapter({
        ...config.paperExchange,
        priceOf: instrument => this.cache.latest(instrument)?.close,
      });
      this.exchange = this.paperExchange;
    }

    this.manager = new OrderExecutionManager({
      exchange: this.exchange,
      tracker: this.tracker,
      journal: this.journal,
      retryPolicy: config.retryPolicy,
    });

    this.scheduler = new ExecutionScheduler(
      {
        instruments: config.instruments,
        cache: this.cache,
        engine: this.engine,
        evaluator: this.evaluator,
        manager: this.manager,
        tracker: this.tracker,
        journal: this.journal,
      },
      config.scheduler
    );
    this.feed = options.feed;
  }

  /**
   * Paper agent fed by a synthetic random walk, as used by the CLI `run` command.
   */
  static paper(
    config: AgentConfig,
    options: PaperRunOptions = {}
  ): { agent: TradingAgent; feed: SyntheticFeed } {
    const feed = new SyntheticFeed({
      instruments: config.instruments,
      startPrices: config.feed.startPrices,
      intervalMs: options.intervalMs ?? config.feed.intervalMs,
      barMs: config.feed.barMs,
      volatility: config.feed.volatility,
      maxBars: options.maxBars,
    });
    return { agent: new TradingAgent(config, { feed }), feed };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = new Date();

    this.manager.start();
    const interval = this.config.scheduler.evaluationIntervalMs;
    this.scheduler.start(interval > 0 ? interval : undefined);
    this.feed?.start((instrument, bar) => this.onTick(instrument, bar));

    this.logger.info(
      {
        instruments: this.config.instruments.map(instrument => instrument.id),
        indicators: this.config.indicators.map(spec => spec.name),
        rules: this.config.rules.map(rule => rule.name),
        lookback: this.engine.lookback,
        paper: this.paperExchange !== undefined,
      },
      'Trading agent started'
    );
  }

  /**
   * Stop the feed, finish queued cycles and in-flight submissions, then stop
   * consuming fills.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await this.feed?.stop();
    await this.scheduler.stop();
    await this.manager.stop();
    this.paperExchange?.close();

    this.logger.info(
      { exposure: this.tracker.exposure(), orders: this.manager.listOrders().length },
      'Trading agent stopped'
    );
  }

  isRunning(): boolean {
    return this.running;
  }

  hasInstrument(instrument: string): boolean {
    return this.config.instruments.some(candidate => candidate.id === instrument);
  }

  onTick(instrument: string, bar: PriceBar): Promise<CycleOutcome> {
    return this.scheduler.onTick(instrument, bar);
  }

  evaluate(instrument: string): Promise<CycleOutcome> {
    return this.scheduler.evaluate(instrument);
  }

  status(): AgentStatus {
    const instruments = this.config.instruments.map(({ id }): InstrumentStatus => ({
      id,
      sequence: this.cache.sequence(id),
      bars: this.cache.size(id),
      lastClose: this.cache.latest(id)?.close,
      position: this.tracker.getPosition(id),
      unrealizedPnl: this.tracker.unrealizedPnl(id),
      inFlightOrder: this.manager.inFlightOrder(id)?.idempotencyKey,
    }));

    const orders = this.manager.listOrders();

    return {
      running: this.running,
      startedAt: this.startedAt,
      uptimeMs: this.startedAt ? Date.now() - this.startedAt.getTime() : 0,
      instruments,
      exposure: this.tracker.exposure(),
      scheduler: this.scheduler.getStats(),
      orders: {
        total: orders.length,
        open: orders.filter(order => isOpen(order.state)).length,
      },
      events: countEvents(this.journal),
    };
  }
}
