/**
 * Synthetic random-walk feed for paper runs
 */

import type { Instrument, PriceBar } from '../types/market.types.js';
import type { BarHandler, MarketDataFeed } from './market-data-feed.js';
import { roundPrice } from '../execution/services/order-sizing.js';
import { getComponentLogger } from '../config/logger.js';
import { toErrorContext } from '../errors/trading.errors.js';

export interface SyntheticFeedOptions {
  instruments: readonly Instrument[];
  startPrices: Readonly<Record<string, number>>;
  // Wall-clock time between emitted bars
  intervalMs: number;
  // Bar length stamped on the bars themselves
  barMs: number;
  // Standard deviation of one bar's return
  volatility: number;
  // Stop after this many bars per instrument
  maxBars?: number;
  startTime?: Date;
  random?: () => number;
}

const DEFAULT_START_PRICE = 100;

export class SyntheticFeed implements MarketDataFeed {
  private readonly prices = new Map<string, number>();
  private readonly logger = getComponentLogger('synthetic-feed');
  private readonly random: () => number;
  private readonly startTime: number;
  private readonly inFlight = new Set<Promise<unknown>>();
  private timer: NodeJS.Timeout | null = null;
  private emitted = 0;
  private finished: Promise<void>;
  private finish: () => void = () => undefined;

  constructor(private readonly options: SyntheticFeedOptions) {
    this.random = options.random ?? Math.random;
    this.startTime = (options.startTime ?? new Date()).getTime();
    for (const instrument of options.instruments) {
      this.prices.set(instrument.id, options.startPrices[instrument.id] ?? DEFAULT_START_PRICE);
    }
    this.finished = new Promise(resolve => (this.finish = resolve));
  }

  start(onBar: BarHandler): void {
    if (this.timer) return;
    this.logger.info(
      { instruments: this.options.instruments.map(i => i.id), intervalMs: this.options.intervalMs },
      'Synthetic feed started'
    );
    this.timer = setInterval(() => {
      for (const [instrument, bar] of this.nextBars()) {
        this.deliver(onBar, instrument, bar);
      }
      if (this.options.maxBars !== undefined && this.emitted >= this.options.maxBars) {
        void this.stop();
      }
    }, this.options.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ bars: this.emitted }, 'Synthetic feed stopped');
    }
    await Promise.allSettled(Array.from(this.inFlight));
    this.finish();
  }

  /**
   * Resolves once the feed has stopped, by `stop()` or after `maxBars`.
   */
  done(): Promise<void> {
    return this.finished;
  }

  /**
   * One bar per instrument, advancing the walk by one step.
   */
  nextBars(): Array<[string, PriceBar]> {
    const timestamp = new Date(this.startTime + this.emitted * this.options.barMs);
    this.emitted++;

    return this.options.instruments.map(instrument => {
      const open = this.prices.get(instrument.id) ?? DEFAULT_START_PRICE;
      const step = this.options.volatility * this.gaussian();
      const close = Math.max(instrument.tickSize, roundPrice(open * (1 + step), instrument.tickSize));
      const wick = Math.abs(this.options.volatility * this.gaussian()) / 2;
      const high = roundPrice(Math.max(open, close) * (1 + wick), instrument.tickSize);
      const low = Math.max(instrument.tickSize, roundPrice(Math.min(open, close) * (1 - wick), instrument.tickSize));
      this.prices.set(instrument.id, close);

      const bar: PriceBar = {
        timestamp,
        open,
        high: Math.max(high, open, close),
        low: Math.min(low, open, close),
        close,
        volume: Math.round(100 + this.random() * 900),
      };
      return [instrument.id, bar];
    });
  }

  private deliver(onBar: BarHandler, instrument: string, bar: PriceBar): void {
    const delivery = Promise.resolve()
      .then(() => onBar(instrument, bar))
      .catch((error: unknown) => {
        this.logger.error({ instrument, error: toErrorContext(error) }, 'Bar handler failed');
      });
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  // Box-Muller
  private gaussian(): number {
    const u = 1 - this.random();
    const v = this.random();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }
}
