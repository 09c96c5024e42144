/**
 * Shared builders and fast-check generators for the test suites
 */

import fc from 'fast-check';
import type { Instrument, PriceBar } from '../types/market.types.js';
import type { IndicatorSnapshot } from '../indicators/indicator.interface.js';
import type { Signal, SignalAction } from '../strategy/strategy.types.js';
import type { ExchangeAdapter } from '../execution/interfaces/exchange-adapter.interface.js';
import type { FillEvent, PlaceOrderRequest, PlaceOrderResult } from '../execution/types/execution.types.js';

export const BASE_TIME = Date.UTC(2024, 0, 1, 0, 0, 0);
export const MINUTE = 60_000;

export function bar(index: number, close: number, overrides: Partial<PriceBar> = {}): PriceBar {
  return {
    timestamp: new Date(BASE_TIME + index * MINUTE),
    open: close,
    high: close,
    low: close,
    close,
    volume: 100,
    ...overrides,
  };
}

export function barsFromCloses(closes: number[], startIndex = 0): PriceBar[] {
  return closes.map((close, i) => bar(startIndex + i, close));
}

export const testInstrument: Instrument = {
  id: 'BTC-USDT',
  tickSize: 0.1,
  lotSize: 0.001,
  minOrderSize: 0.001,
};

export const closeArbitrary = fc.double({ min: 1, max: 100_000, noNaN: true });

export const closeSeriesArbitrary = (minLength: number, maxLength: number) =>
  fc.array(closeArbitrary, { minLength, maxLength });

export function snapshotFor(instrument: string, sequence: number, close = 100): IndicatorSnapshot {
  return {
    instrument,
    sequence,
    timestamp: new Date(BASE_TIME + sequence * MINUTE),
    close,
    previousClose: close,
    values: {},
    previous: {},
  };
}

export function signal(action: SignalAction, sequence: number, instrument = testInstrument.id): Signal {
  return {
    instrument,
    action,
    sequence,
    snapshot: snapshotFor(instrument, sequence),
    createdAt: new Date(BASE_TIME),
  };
}

export function fillFor(
  idempotencyKey: string,
  size: number,
  price = 100,
  overrides: Partial<FillEvent> = {}
): FillEvent {
  return {
    fillId: `${idempotencyKey}-${size}-${price}`,
    idempotencyKey,
    instrument: testInstrument.id,
    side: 'BUY',
    size,
    price,
    timestamp: new Date(BASE_TIME),
    ...overrides,
  };
}

export const ACK: PlaceOrderResult = { status: 'ACKED', exchangeOrderId: 'ex-1', timestamp: new Date(BASE_TIME) };

type ScriptedResponse = () => Promise<PlaceOrderResult>;

/**
 * Exchange whose placeOrder answers come from a queue; acknowledges once the
 * queue is empty. Never delivers fills on its own.
 */
export class ScriptedExchange implements ExchangeAdapter {
  readonly requests: PlaceOrderRequest[] = [];
  readonly cancelled: string[] = [];
  private readonly responses: ScriptedResponse[] = [];

  respondWith(...responses: ScriptedResponse[]): this {
    this.responses.push(...responses);
    return this;
  }

  placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    this.requests.push(request);
    const next = this.responses.shift();
    return next ? next() : Promise.resolve(ACK);
  }

  async *streamFills(): AsyncGenerator<FillEvent> {
    // Fills are fed to handleFill directly
  }

  async cancelOrder(idempotencyKey: string): Promise<void> {
    this.cancelled.push(idempotencyKey);
  }
}

export const hang: ScriptedResponse = () => new Promise<PlaceOrderResult>(() => undefined);
export const fail =
  (message = 'connection reset'): ScriptedResponse =>
  () =>
    Promise.reject(new Error(message));
export const reject =
  (reason: string): ScriptedResponse =>
  () =>
    Promise.resolve<PlaceOrderResult>({ status: 'REJECTED', reason, code: 'TEST', timestamp: new Date(BASE_TIME) });
