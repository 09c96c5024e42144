/**
 * Order Execution Manager - Turns actionable signals into exchange orders
 *
 * At most one open order per instrument. Submission outcomes are returned as a
 * `SubmissionResult` union; transport errors never escape `submit()`.
 */

import { createHash } from 'node:crypto';
import type { ExchangeAdapter } from '../interfaces/exchange-adapter.interface.js';
import type {
  FillEvent,
  Order,
  OrderSide,
  OrderState,
  PlaceOrderRequest,
  PlaceOrderResult,
  RetryPolicy,
} from '../types/execution.types.js';
import type { Instrument } from '../../types/market.types.js';
import type { Signal, TradeAction } from '../../strategy/strategy.types.js';
import type { PositionRiskTracker } from './position-risk-tracker.service.js';
import type { TradingEventJournal } from './trading-event-journal.service.js';
import { ExchangeTimeout, OrderRejected, RiskRejected, toErrorContext } from '../../errors/trading.errors.js';
import { getComponentLogger, orderLogFields } from '../../config/logger.js';
import { backoffDelay, DEFAULT_RETRY_POLICY, sleep, withTimeout } from './retry-policy.js';
import { canTransition, isOpen, isTerminal, transition } from './order-state-machine.js';
import { entryOrderSize } from './order-sizing.js';

// Fill sizes within this of the order size complete it
const FILL_EPSILON = 1e-9;

export type SkipReason = 'ORDER_IN_FLIGHT' | 'SHUTTING_DOWN' | 'NO_POSITION' | 'HOLD';

export type SubmissionResult =
  | { status: 'SKIPPED'; reason: SkipReason; order?: Order }
  | { status: 'DUPLICATE'; order: Order }
  | { status: 'RISK_REJECTED'; error: RiskRejected }
  | { status: 'ACKED'; order: Order }
  | { status: 'REJECTED'; order: Order; error: OrderRejected }
  | { status: 'UNKNOWN'; order: Order; error: ExchangeTimeout };

export type FillOutcome = 'APPLIED' | 'DUPLICATE' | 'ORPHAN';

export type CancelResult =
  | { status: 'CANCELLED'; order: Order }
  | { status: 'NOT_FOUND' }
  | { status: 'NOT_CANCELLABLE'; order: Order }
  | { status: 'FAILED'; order: Order; error: Error };

export type ResolvableState = 'ACKED' | 'REJECTED' | 'CANCELLED';

export type ResolveResult =
  | { status: 'RESOLVED'; order: Order }
  | { status: 'NOT_FOUND' }
  | { status: 'NOT_UNKNOWN'; order: Order };

export interface OrderFilter {
  instrument?: string;
  state?: OrderState;
}

export interface OrderExecutionManagerDeps {
  exchange: ExchangeAdapter;
  tracker: PositionRiskTracker;
  journal: TradingEventJournal;
  retryPolicy?: RetryPolicy;
}

/**
 * Same (instrument, sequence) always yields the same key, so a re-submitted
 * signal can never become a second order.
 */
export function deriveIdempotencyKey(instrument: string, sequence: number): string {
  return createHash('sha256').update(`${instrument}:${sequence}`).digest('hex').slice(0, 32);
}

function orderSide(action: TradeAction, exitFrom: 'LONG' | 'SHORT'): OrderSide {
  switch (action) {
    case 'ENTER_LONG':
      return 'BUY';
    case 'ENTER_SHORT':
      return 'SELL';
    case 'EXIT':
      return exitFrom === 'LONG' ? 'SELL' : 'BUY';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OrderExecutionManager {
  private readonly exchange: ExchangeAdapter;
  private readonly tracker: PositionRiskTracker;
  private readonly journal: TradingEventJournal;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger = getComponentLogger('order-execution-manager');

  private readonly orders = new Map<string, Order>();
  private readonly inFlight = new Map<string, string>();
  private readonly seenFills = new Set<string>();
  private readonly submissions = new Set<Promise<SubmissionResult>>();

  private fillAbort: AbortController | null = null;
  private fillConsumer: Promise<void> | null = null;
  private stopping = false;

  constructor(deps: OrderExecutionManagerDeps) {
    this.exchange = deps.exchange;
    this.tracker = deps.tracker;
    this.journal = deps.journal;
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  submit(signal: Signal, instrument: Instrument, referencePrice: number): Promise<SubmissionResult> {
    if (this.stopping) {
      return Promise.resolve({ status: 'SKIPPED', reason: 'SHUTTING_DOWN' });
    }
    if (signal.action === 'HOLD') {
      return Promise.resolve({ status: 'SKIPPED', reason: 'HOLD' });
    }

    const idempotencyKey = deriveIdempotencyKey(instrument.id, signal.sequence);
    const existing = this.orders.get(idempotencyKey);
    if (existing) {
      this.logger.info({ idempotencyKey, instrument: instrument.id }, 'Signal already submitted');
      return Promise.resolve({ status: 'DUPLICATE', order: { ...existing } });
    }

    const inFlight = this.inFlightOrder(instrument.id);
    if (inFlight) {
      this.logger.info(
        { instrument: instrument.id, inFlight: inFlight.idempotencyKey, state: inFlight.state },
        'Order already in flight, skipping signal'
      );
      return Promise.resolve({ status: 'SKIPPED', reason: 'ORDER_IN_FLIGHT', order: inFlight });
    }

    const action = signal.action;
    const position = this.tracker.getPosition(instrument.id);
    if (action === 'EXIT' && position.side === 'FLAT') {
      return Promise.resolve({ status: 'SKIPPED', reason: 'NO_POSITION' });
    }

    const size = action === 'EXIT' ? position.size : entryOrderSize(instrument);
    const side = orderSide(action, position.side === 'SHORT' ? 'SHORT' : 'LONG');

    const decision = this.tracker.authorize(instrument.id, action, size, referencePrice);
    if (!decision.allowed) {
      const error = new RiskRejected(instrument.id, decision.violations);
      this.journal.record({
        type: 'RISK_REJECTED',
        instrument: instrument.id,
        idempotencyKey,
        message: error.message,
        metadata: { action, size, referencePrice, violations: decision.violations.map(v => v.type) },
      });
      return Promise.resolve({ status: 'RISK_REJECTED', error });
    }

    const now = new Date();
    const order: Order = {
      idempotencyKey,
      instrument: instrument.id,
      side,
      size,
      type: 'MARKET',
      intent: action,
      signalSequence: signal.sequence,
      referencePrice,
      state: 'PENDING',
      filledSize: 0,
      avgFillPrice: 0,
      attempts: 0,
      submittedAt: now,
      updatedAt: now,
    };
    this.orders.set(idempotencyKey, order);
    this.inFlight.set(instrument.id, idempotencyKey);

    this.logger.info(
      { idempotencyKey, instrument: instrument.id, side, size, intent: action, sequence: signal.sequence },
      'Submitting order'
    );

    const submission = this.send(order);
    this.submissions.add(submission);
    void submission.finally(() => this.submissions.delete(submission));
    return submission;
  }

  /**
   * Apply one execution. Synchronous, so fills are applied one at a time in
   * delivery order.
   */
  handleFill(fill: FillEvent): FillOutcome {
    if (this.seenFills.has(fill.fillId)) {
      this.logger.debug({ fillId: fill.fillId }, 'Duplicate fill ignored');
      return 'DUPLICATE';
    }
    this.seenFills.add(fill.fillId);

    const order = this.orders.get(fill.idempotencyKey);
    if (!order) {
      this.journal.record({
        type: 'ORPHAN_FILL',
        instrument: fill.instrument,
        idempotencyKey: fill.idempotencyKey,
        message: `Fill ${fill.fillId} matches no known order`,
        metadata: { fillId: fill.fillId, side: fill.side, size: fill.size, price: fill.price },
      });
      this.tracker.apply(fill);
      return 'ORPHAN';
    }

    const previousState = order.state;
    const filledSize = order.filledSize + fill.size;
    order.avgFillPrice = (order.avgFillPrice * order.filledSize + fill.price * fill.size) / filledSize;
    order.filledSize = filledSize;
    order.exchangeOrderId = order.exchangeOrderId ?? fill.exchangeOrderId;
    order.updatedAt = fill.timestamp;

    const next: OrderState = filledSize >= order.size - FILL_EPSILON ? 'FILLED' : 'PARTIALLY_FILLED';
    if (canTransition(order.state, next)) {
      transition(order, next, fill.timestamp);
    } else {
      this.logger.warn(
        { idempotencyKey: order.idempotencyKey, state: order.state, fillId: fill.fillId },
        'Fill received for order that cannot take it, applying to position only'
      );
    }

    this.tracker.apply(fill);

    if (previousState === 'UNKNOWN') {
      this.logger.info({ idempotencyKey: order.idempotencyKey, state: order.state }, 'Fill resolved unknown order');
    }
    if (isTerminal(order.state)) {
      this.settle(order);
    }

    return 'APPLIED';
  }

  async cancel(idempotencyKey: string): Promise<CancelResult> {
    const order = this.orders.get(idempotencyKey);
    if (!order) {
      return { status: 'NOT_FOUND' };
    }
    if (!canTransition(order.state, 'CANCELLED')) {
      return { status: 'NOT_CANCELLABLE', order: { ...order } };
    }

    if (this.exchange.cancelOrder) {
      try {
        await this.exchange.cancelOrder(idempotencyKey);
      } catch (error) {
        this.logger.error({ idempotencyKey, error: toErrorContext(error) }, 'Exchange cancel failed');
        return {
          status: 'FAILED',
          order: { ...order },
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }
    }

    // A fill may have completed the order while the cancel was in transit
    if (!canTransition(order.state, 'CANCELLED')) {
      return { status: 'NOT_CANCELLABLE', order: { ...order } };
    }

    transition(order, 'CANCELLED');
    this.settle(order);
    this.journal.record({
      type: 'ORDER_CANCELLED',
      instrument: order.instrument,
      idempotencyKey,
      message: `Order ${idempotencyKey} cancelled with ${order.filledSize} of ${order.size} filled`,
      metadata: { filledSize: order.filledSize, size: order.size },
    });
    return { status: 'CANCELLED', order: { ...order } };
  }

  /**
   * Operator reconciliation of an order left UNKNOWN.
   */
  resolveUnknown(idempotencyKey: string, state: ResolvableState): ResolveResult {
    const order = this.orders.get(idempotencyKey);
    if (!order) {
      return { status: 'NOT_FOUND' };
    }
    if (order.state !== 'UNKNOWN') {
      return { status: 'NOT_UNKNOWN', order: { ...order } };
    }

    transition(order, state);
    if (isTerminal(order.state)) {
      this.settle(order);
    }
    this.journal.record({
      type: 'ORDER_RESOLVED',
      instrument: order.instrument,
      idempotencyKey,
      message: `Unknown order ${idempotencyKey} resolved to ${state}`,
      metadata: { state },
    });
    return { status: 'RESOLVED', order: { ...order } };
  }

  start(): void {
    if (this.fillConsumer) return;
    this.stopping = false;
    const abort = new AbortController();
    this.fillAbort = abort;
    this.fillConsumer = this.consumeFills(abort.signal);
    this.logger.info('Fill consumption started');
  }

  /**
   * Stop taking submissions, wait for in-flight ones, then end fill consumption.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.drain();

    this.fillAbort?.abort();
    await this.fillConsumer;
    this.fillAbort = null;
    this.fillConsumer = null;
    this.logger.info('Order execution manager stopped');
  }

  /**
   * Resolves once every submission has reached ACKED, REJECTED or UNKNOWN.
   */
  async drain(): Promise<void> {
    while (this.submissions.size > 0) {
      await Promise.allSettled(Array.from(this.submissions));
    }
  }

  isAccepting(): boolean {
    return !this.stopping;
  }

  getOrder(idempotencyKey: string): Order | undefined {
    const order = this.orders.get(idempotencyKey);
    return order ? { ...order } : undefined;
  }

  listOrders(filter: OrderFilter = {}): Order[] {
    return Array.from(this.orders.values())
      .filter(
        order =>
          (filter.instrument === undefined || order.instrument === filter.instrument) &&
          (filter.state === undefined || order.state === filter.state)
      )
      .map(order => ({ ...order }));
  }

  inFlightOrder(instrument: string): Order | undefined {
    const key = this.inFlight.get(instrument);
    return key === undefined ? undefined : this.getOrder(key);
  }

  private async send(order: Order): Promise<SubmissionResult> {
    const request: PlaceOrderRequest = {
      instrument: order.instrument,
      side: order.side,
      size: order.size,
      type: order.type,
      idempotencyKey: order.idempotencyKey,
    };
    const { maxAttempts, attemptTimeoutMs } = this.retryPolicy;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      // Fills prove the venue has the order
      if (order.state !== 'PENDING') {
        return { status: 'ACKED', order: { ...order } };
      }

      order.attempts = attempt;
      let result: PlaceOrderResult;
      try {
        result = await withTimeout(this.exchange.placeOrder(request), attemptTimeoutMs, late =>
          this.applyLateAnswer(order, attempt, late)
        );
      } catch (error) {
        lastError = errorMessage(error);
        this.logger.warn(
          { idempotencyKey: order.idempotencyKey, attempt, maxAttempts, error: lastError },
          'Order attempt failed'
        );
        if (attempt < maxAttempts) {
          await sleep(backoffDelay(this.retryPolicy, attempt));
        }
        continue;
      }

      if (result.status === 'ACKED') {
        return this.acknowledge(order, result.exchangeOrderId);
      }
      return this.reject(order, result.reason, result.code);
    }

    if (order.state !== 'PENDING') {
      return { status: 'ACKED', order: { ...order } };
    }

    const error = new ExchangeTimeout(order.idempotencyKey, order.attempts, lastError);
    transition(order, 'UNKNOWN');
    this.journal.record({
      type: 'ORDER_UNKNOWN',
      instrument: order.instrument,
      idempotencyKey: order.idempotencyKey,
      message: error.message,
      metadata: { attempts: order.attempts, lastError },
    });
    return { status: 'UNKNOWN', order: { ...order }, error };
  }

  private acknowledge(order: Order, exchangeOrderId: string): SubmissionResult {
    order.exchangeOrderId = exchangeOrderId;
    if (canTransition(order.state, 'ACKED')) {
      transition(order, 'ACKED');
    } else {
      order.updatedAt = new Date();
    }
    this.logger.info({ ...orderLogFields(order), exchangeOrderId }, 'Order acknowledged');
    return { status: 'ACKED', order: { ...order } };
  }

  /**
   * An answer from an attempt that already timed out. Only an order still
   * UNKNOWN takes it; otherwise a later attempt has decided the order.
   */
  private applyLateAnswer(order: Order, attempt: number, late: PromiseSettledResult<PlaceOrderResult>): void {
    const outcome = late.status === 'fulfilled' ? late.value.status : 'FAILED';
    this.logger.warn(
      { idempotencyKey: order.idempotencyKey, attempt, outcome, state: order.state },
      'Exchange answered after the attempt timed out'
    );
    if (late.status === 'rejected' || order.state !== 'UNKNOWN') {
      return;
    }

    const result = late.value;
    if (result.status === 'REJECTED') {
      this.reject(order, result.reason, result.code);
      return;
    }

    this.acknowledge(order, result.exchangeOrderId);
    this.journal.record({
      type: 'ORDER_RESOLVED',
      instrument: order.instrument,
      idempotencyKey: order.idempotencyKey,
      message: `Unknown order ${order.idempotencyKey} acknowledged by a late exchange answer`,
      metadata: { state: order.state, attempt },
    });
  }

  private reject(order: Order, reason: string, code?: string): SubmissionResult {
    const error = new OrderRejected(order.idempotencyKey, reason, code);
    if (!canTransition(order.state, 'REJECTED')) {
      this.logger.error(
        { idempotencyKey: order.idempotencyKey, state: order.state, reason },
        'Rejection received for order that already has fills'
      );
      return { status: 'ACKED', order: { ...order } };
    }

    order.rejectReason = reason;
    transition(order, 'REJECTED');
    this.settle(order);
    this.journal.record({
      type: 'ORDER_REJECTED',
      instrument: order.instrument,
      idempotencyKey: order.idempotencyKey,
      message: error.message,
      metadata: { reason, code },
    });
    return { status: 'REJECTED', order: { ...order }, error };
  }

  /**
   * Frees the instrument's in-flight slot and any leftover risk reservation.
   */
  private settle(order: Order): void {
    if (this.inFlight.get(order.instrument) === order.idempotencyKey && !isOpen(order.state)) {
      this.inFlight.delete(order.instrument);
    }
    if (order.intent !== 'EXIT') {
      this.tracker.release(order.instrument);
    }
  }

  private async consumeFills(signal: AbortSignal): Promise<void> {
    try {
      for await (const fill of this.exchange.streamFills(signal)) {
        try {
          this.handleFill(fill);
        } catch (error) {
          this.logger.error({ fillId: fill.fillId, error: toErrorContext(error) }, 'Failed to apply fill');
        }
      }
    } catch (error) {
      if (!signal.aborted) {
        this.logger.error({ error: toErrorContext(error) }, 'Fill stream failed');
      }
    }
  }
}
