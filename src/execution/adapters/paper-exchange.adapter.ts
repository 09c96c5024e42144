/**
 * Paper Exchange Adapter - Simulates venue behavior for paper runs and tests
 */

import { EventEmitter, on } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { ExchangeAdapter } from '../interfaces/exchange-adapter.interface.js';
import type { FillEvent, PlaceOrderRequest, PlaceOrderResult } from '../types/execution.types.js';
import { getComponentLogger } from '../../config/logger.js';

export interface PaperExchangeConfig {
  // Delay before placeOrder settles
  latencyMs: number;
  // Delay between the ACK and each fill
  fillDelayMs: number;
  // Number of fills an order is split into
  fillChunks: number;
  // Adverse price move applied to every fill, in basis points
  slippageBps: number;
  // Deliver every fill twice
  duplicateFills: boolean;
  // Returns a rejection reason, or undefined to accept
  rejectWhen?: (request: PlaceOrderRequest) => string | undefined;
  // Price for market orders
  priceOf?: (instrument: string) => number | undefined;
}

/**
 * `error`: the request never reaches the venue and placeOrder rejects.
 * `hang`: the venue accepts the order but the response is lost.
 */
export type InjectedFailure = 'error' | 'hang';

interface PaperOrder {
  request: PlaceOrderRequest;
  exchangeOrderId: string;
  price: number;
  filledSize: number;
  cancelled: boolean;
  timers: NodeJS.Timeout[];
}

export const DEFAULT_PAPER_EXCHANGE_CONFIG: PaperExchangeConfig = {
  latencyMs: 50,
  fillDelayMs: 100,
  fillChunks: 1,
  slippageBps: 0,
  duplicateFills: false,
};

export class PaperExchangeAdapter implements ExchangeAdapter {
  private readonly config: PaperExchangeConfig;
  private readonly emitter = new EventEmitter();
  private readonly orders = new Map<string, PaperOrder>();
  private readonly prices = new Map<string, number>();
  private readonly failures: InjectedFailure[] = [];
  private readonly logger = getComponentLogger('paper-exchange');
  private requestCount = 0;

  constructor(config: Partial<PaperExchangeConfig> = {}) {
    this.config = { ...DEFAULT_PAPER_EXCHANGE_CONFIG, ...config };
    this.logger.info(
      {
        latencyMs: this.config.latencyMs,
        fillDelayMs: this.config.fillDelayMs,
        fillChunks: this.config.fillChunks,
        slippageBps: this.config.slippageBps,
      },
      'Paper exchange initialized'
    );
  }

  async placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    this.requestCount++;
    const failure = this.failures.shift();

    await this.delay(this.config.latencyMs);

    if (failure === 'error') {
      this.logger.warn({ idempotencyKey: request.idempotencyKey }, 'Injected transport failure');
      throw new Error('Paper exchange transport failure');
    }

    const result = this.accept(request);

    if (failure === 'hang') {
      this.logger.warn({ idempotencyKey: request.idempotencyKey }, 'Injected lost response');
      return new Promise<PlaceOrderResult>(() => undefined);
    }

    return result;
  }

  async *streamFills(signal?: AbortSignal): AsyncGenerator<FillEvent> {
    try {
      for await (const [fill] of on(this.emitter, 'fill', { signal })) {
        yield fill;
      }
    } catch (error) {
      if (signal?.aborted) return;
      throw error;
    }
  }

  async cancelOrder(idempotencyKey: string): Promise<void> {
    const order = this.orders.get(idempotencyKey);
    if (!order) {
      throw new Error(`Order ${idempotencyKey} not found`);
    }
    if (order.filledSize >= order.request.size) {
      throw new Error(`Cannot cancel filled order ${idempotencyKey}`);
    }

    order.cancelled = true;
    order.timers.forEach(timer => clearTimeout(timer));
    order.timers = [];
    this.logger.info({ idempotencyKey, filledSize: order.filledSize }, 'Paper order cancelled');
  }

  /**
   * Queue transport failures for the next placeOrder calls, in order.
   */
  injectFailures(...failures: InjectedFailure[]): void {
    this.failures.push(...failures);
  }

  setPrice(instrument: string, price: number): void {
    this.prices.set(instrument, price);
  }

  /**
   * Number of placeOrder calls received, including failed ones.
   */
  getRequestCount(): number {
    return this.requestCount;
  }

  /**
   * Distinct orders the venue accepted.
   */
  getOrderKeys(): string[] {
    return Array.from(this.orders.keys());
  }

  /**
   * Emit a fill directly, e.g. for an order placed outside this process.
   */
  emitFill(fill: FillEvent): void {
    this.emitter.emit('fill', fill);
  }

  close(): void {
    for (const order of this.orders.values()) {
      order.timers.forEach(timer => clearTimeout(timer));
      order.timers = [];
    }
  }

  private accept(request: PlaceOrderRequest): PlaceOrderResult {
    const existing = this.orders.get(request.idempotencyKey);
    if (existing) {
      this.logger.info(
        { idempotencyKey: request.idempotencyKey, exchangeOrderId: existing.exchangeOrderId },
        'Duplicate request, returning existing order'
      );
      return { status: 'ACKED', exchangeOrderId: existing.exchangeOrderId, timestamp: new Date() };
    }

    const reason = this.config.rejectWhen?.(request);
    if (reason !== undefined) {
      this.logger.warn({ idempotencyKey: request.idempotencyKey, reason }, 'Paper order rejected');
      return { status: 'REJECTED', reason, code: 'PAPER_REJECT', timestamp: new Date() };
    }

    const basePrice = this.config.priceOf?.(request.instrument) ?? this.prices.get(request.instrument);
    if (basePrice === undefined || !(basePrice > 0)) {
      return { status: 'REJECTED', reason: 'No price available', code: 'NO_PRICE', timestamp: new Date() };
    }

    const slippage = (basePrice * this.config.slippageBps) / 10000;
    const order: PaperOrder = {
      request,
      exchangeOrderId: `paper-${randomUUID()}`,
      price: request.side === 'BUY' ? basePrice + slippage : basePrice - slippage,
      filledSize: 0,
      cancelled: false,
      timers: [],
    };
    this.orders.set(request.idempotencyKey, order);
    this.scheduleFills(order);

    this.logger.info(
      {
        idempotencyKey: request.idempotencyKey,
        exchangeOrderId: order.exchangeOrderId,
        instrument: request.instrument,
        side: request.side,
        size: request.size,
      },
      'Paper order accepted'
    );

    return { status: 'ACKED', exchangeOrderId: order.exchangeOrderId, timestamp: new Date() };
  }

  private scheduleFills(order: PaperOrder): void {
    const chunks = Math.max(1, Math.floor(this.config.fillChunks));
    const chunkSize = order.request.size / chunks;

    for (let i = 1; i <= chunks; i++) {
      const size = i === chunks ? order.request.size - chunkSize * (chunks - 1) : chunkSize;
      const timer = setTimeout(() => this.fill(order, i, size), this.config.fillDelayMs * i);
      order.timers.push(timer);
    }
  }

  private fill(order: PaperOrder, index: number, size: number): void {
    if (order.cancelled) return;

    order.filledSize += size;
    const fill: FillEvent = {
      fillId: `${order.exchangeOrderId}-${index}`,
      idempotencyKey: order.request.idempotencyKey,
      instrument: order.request.instrument,
      side: order.request.side,
      size,
      price: order.price,
      timestamp: new Date(),
      exchangeOrderId: order.exchangeOrderId,
    };

    this.emitter.emit('fill', fill);
    if (this.config.duplicateFills) {
      this.emitter.emit('fill', fill);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
