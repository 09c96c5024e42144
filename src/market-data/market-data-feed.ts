import type { PriceBar } from '../types/market.types.js';

export type BarHandler = (instrument: string, bar: PriceBar) => Promise<unknown> | void;

/**
 * Source of completed (or in-progress, redelivered) bars.
 */
export interface MarketDataFeed {
  start(onBar: BarHandler): void;
  stop(): Promise<void>;
}
