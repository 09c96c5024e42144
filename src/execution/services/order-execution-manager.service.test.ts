import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { PlaceOrderResult, RetryPolicy } from '../types/execution.types.js';
import { OrderExecutionManager, deriveIdempotencyKey } from './order-execution-manager.service.js';
import { PositionRiskTracker } from './position-risk-tracker.service.js';
import { TradingEventJournal } from './trading-event-journal.service.js';
import type { ExchangeAdapter } from '../interfaces/exchange-adapter.interface.js';
import { PaperExchangeAdapter } from '../adapters/paper-exchange.adapter.js';
import { ExchangeTimeout, OrderRejected, RiskRejected } from '../../errors/trading.errors.js';
import {
  ScriptedExchange,
  fail,
  fillFor,
  hang,
  reject,
  signal,
  testInstrument,
} from '../../test-support/fixtures.js';

const POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  multiplier: 2,
  attemptTimeoutMs: 1000,
};

interface Setup<E extends ExchangeAdapter> {
  exchange: E;
  tracker: PositionRiskTracker;
  journal: TradingEventJournal;
  manager: OrderExecutionManager;
}

const KEY_5 = deriveIdempotencyKey(testInstrument.id, 5);

function setup(exchange?: ScriptedExchange, maxNotional?: number): Setup<ScriptedExchange>;
function setup<E extends ExchangeAdapter>(exchange: E, maxNotional?: number): Setup<E>;
function setup(exchange: ExchangeAdapter = new ScriptedExchange(), maxNotional = 1000): Setup<ExchangeAdapter> {
  const tracker = new PositionRiskTracker(
    { [testInstrument.id]: { maxPositionSize: 1, maxNotional } },
    { maxConcurrentPositions: 5, maxGlobalNotional: 10_000 }
  );
  const journal = new TradingEventJournal();
  const manager = new OrderExecutionManager({ exchange, tracker, journal, retryPolicy: POLICY });
  return { exchange, tracker, journal, manager };
}

describe('deriveIdempotencyKey', () => {
  it('should be deterministic per instrument and sequence', () => {
    expect(deriveIdempotencyKey('BTC-USDT', 5)).toBe(KEY_5);
    expect(KEY_5).toMatch(/^[0-9a-f]{32}$/);
    expect(deriveIdempotencyKey('BTC-USDT', 6)).not.toBe(KEY_5);
    expect(deriveIdempotencyKey('ETH-USDT', 5)).not.toBe(KEY_5);
  });
});

describe('OrderExecutionManager', () => {
  describe('submit', () => {
    it('should send one lot for an entry and store the acknowledged order', async () => {
      const { exchange, manager } = setup();

      const result = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(result.status).toBe('ACKED');
      expect(exchange.requests).toEqual([
        { instrument: 'BTC-USDT', side: 'BUY', size: 0.001, type: 'MARKET', idempotencyKey: KEY_5 },
      ]);
      expect(manager.getOrder(KEY_5)).toMatchObject({
        state: 'ACKED',
        exchangeOrderId: 'ex-1',
        attempts: 1,
        intent: 'ENTER_LONG',
        signalSequence: 5,
      });
      expect(manager.inFlightOrder('BTC-USDT')?.idempotencyKey).toBe(KEY_5);
    });

    it('should sell for a short entry', async () => {
      const { exchange, manager } = setup();

      await manager.submit(signal('ENTER_SHORT', 5), testInstrument, 100);

      expect(exchange.requests[0].side).toBe('SELL');
    });

    it('should return the existing order when the same signal is submitted again', async () => {
      const { exchange, manager } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      const again = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(again.status).toBe('DUPLICATE');
      expect(exchange.requests).toHaveLength(1);
    });

    it('should skip a new signal while an order is in flight', async () => {
      const { exchange, manager } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      const next = await manager.submit(signal('ENTER_LONG', 6), testInstrument, 100);

      expect(next).toMatchObject({ status: 'SKIPPED', reason: 'ORDER_IN_FLIGHT' });
      expect(exchange.requests).toHaveLength(1);
    });

    it('should skip HOLD and exits without a position', async () => {
      const { exchange, manager } = setup();

      expect(await manager.submit(signal('HOLD', 1), testInstrument, 100)).toEqual({
        status: 'SKIPPED',
        reason: 'HOLD',
      });
      expect(await manager.submit(signal('EXIT', 2), testInstrument, 100)).toEqual({
        status: 'SKIPPED',
        reason: 'NO_POSITION',
      });
      expect(exchange.requests).toHaveLength(0);
    });

    it('should journal a risk rejection and create no order', async () => {
      const { exchange, journal, manager, tracker } = setup(new ScriptedExchange(), 0.05);

      const result = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(result.status).toBe('RISK_REJECTED');
      if (result.status === 'RISK_REJECTED') {
        expect(result.error).toBeInstanceOf(RiskRejected);
        expect(result.error.violations.map(v => v.type)).toEqual(['MAX_INSTRUMENT_NOTIONAL']);
      }
      expect(exchange.requests).toHaveLength(0);
      expect(manager.listOrders()).toEqual([]);
      expect(tracker.getPosition('BTC-USDT').side).toBe('FLAT');
      expect(journal.list({ type: 'RISK_REJECTED' })).toHaveLength(1);
    });

    it('should treat an exchange rejection as terminal without retrying', async () => {
      const { exchange, journal, manager, tracker } = setup(new ScriptedExchange().respondWith(reject('insufficient balance')));

      const result = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(result.status).toBe('REJECTED');
      if (result.status === 'REJECTED') {
        expect(result.error).toBeInstanceOf(OrderRejected);
        expect(result.order.rejectReason).toBe('insufficient balance');
      }
      expect(exchange.requests).toHaveLength(1);
      expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
      expect(tracker.exposure().reservedNotional).toBe(0);
      expect(tracker.getPosition('BTC-USDT').side).toBe('FLAT');
      expect(journal.count('ORDER_REJECTED')).toBe(1);
    });

    it('should refuse submissions once stopping', async () => {
      const { manager } = setup();
      await manager.stop();

      const result = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(result).toEqual({ status: 'SKIPPED', reason: 'SHUTTING_DOWN' });
    });
  });

  describe('retries', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should reuse the first key across timeouts until acknowledged', async () => {
      const { exchange, manager } = setup(new ScriptedExchange().respondWith(hang, hang));

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.runAllTimersAsync();
      const result = await pending;

      expect(result.status).toBe('ACKED');
      expect(exchange.requests.map(r => r.idempotencyKey)).toEqual([KEY_5, KEY_5, KEY_5]);
      expect(manager.listOrders()).toHaveLength(1);
      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'ACKED', attempts: 3 });
    });

    it('should back off exponentially between attempts', async () => {
      const { exchange, manager } = setup(new ScriptedExchange().respondWith(fail(), fail()));

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.advanceTimersByTimeAsync(0);
      expect(exchange.requests).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(100);
      expect(exchange.requests).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(199);
      expect(exchange.requests).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(1);
      expect(exchange.requests).toHaveLength(3);
      expect((await pending).status).toBe('ACKED');
    });

    it('should leave the order UNKNOWN after the retry bound and keep the instrument blocked', async () => {
      const { exchange, journal, manager } = setup(new ScriptedExchange().respondWith(fail(), fail(), fail()));

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.runAllTimersAsync();
      const result = await pending;

      expect(result.status).toBe('UNKNOWN');
      if (result.status === 'UNKNOWN') {
        expect(result.error).toBeInstanceOf(ExchangeTimeout);
        expect(result.error.attempts).toBe(3);
        expect(result.error.lastError).toBe('connection reset');
      }
      expect(exchange.requests).toHaveLength(3);
      expect(journal.count('ORDER_UNKNOWN')).toBe(1);

      const next = await manager.submit(signal('ENTER_LONG', 6), testInstrument, 100);
      expect(next).toMatchObject({ status: 'SKIPPED', reason: 'ORDER_IN_FLIGHT' });
    });

    it('should acknowledge an UNKNOWN order from a late answer to an abandoned attempt', async () => {
      let answer: (result: PlaceOrderResult) => void = () => undefined;
      const exchange = new ScriptedExchange().respondWith(
        () => new Promise<PlaceOrderResult>(resolve => (answer = resolve)),
        hang,
        hang
      );
      const { journal, manager } = setup(exchange);

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.runAllTimersAsync();
      expect((await pending).status).toBe('UNKNOWN');

      answer({ status: 'ACKED', exchangeOrderId: 'ex-slow', timestamp: new Date() });
      await vi.advanceTimersByTimeAsync(0);

      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'ACKED', exchangeOrderId: 'ex-slow' });
      expect(journal.count('ORDER_RESOLVED')).toBe(1);

      manager.handleFill(fillFor(KEY_5, 0.001));
      expect(manager.getOrder(KEY_5)?.state).toBe('FILLED');
      expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
    });

    it('should reject an UNKNOWN order from a late rejection and free the instrument', async () => {
      let answer: (result: PlaceOrderResult) => void = () => undefined;
      const exchange = new ScriptedExchange().respondWith(
        () => new Promise<PlaceOrderResult>(resolve => (answer = resolve)),
        hang,
        hang
      );
      const { journal, manager } = setup(exchange);

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.runAllTimersAsync();
      await pending;

      answer({ status: 'REJECTED', reason: 'insufficient margin', timestamp: new Date() });
      await vi.advanceTimersByTimeAsync(0);

      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'REJECTED', rejectReason: 'insufficient margin' });
      expect(journal.count('ORDER_REJECTED')).toBe(1);
      expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
    });

    it('should ignore a late answer once a later attempt has been acknowledged', async () => {
      let answer: (result: PlaceOrderResult) => void = () => undefined;
      const exchange = new ScriptedExchange().respondWith(
        () => new Promise<PlaceOrderResult>(resolve => (answer = resolve))
      );
      const { journal, manager } = setup(exchange);

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      await vi.runAllTimersAsync();
      expect((await pending).status).toBe('ACKED');

      answer({ status: 'REJECTED', reason: 'too late', timestamp: new Date() });
      await vi.advanceTimersByTimeAsync(0);

      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'ACKED', exchangeOrderId: 'ex-1' });
      expect(journal.count('ORDER_REJECTED')).toBe(0);
    });
  });

  describe('handleFill', () => {
    it('should fill the order and open the position', async () => {
      const { manager, tracker } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      expect(manager.handleFill(fillFor(KEY_5, 0.001, 101))).toBe('APPLIED');

      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'FILLED', filledSize: 0.001, avgFillPrice: 101 });
      expect(tracker.getPosition('BTC-USDT')).toMatchObject({ side: 'LONG', size: 0.001, avgEntryPrice: 101 });
      expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
    });

    it('should apply the same fill only once', async () => {
      const { manager, tracker } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      const fill = fillFor(KEY_5, 0.001);

      manager.handleFill(fill);
      expect(manager.handleFill(fill)).toBe('DUPLICATE');

      expect(tracker.getPosition('BTC-USDT').size).toBe(0.001);
    });

    it('should track partial fills with a weighted average price', async () => {
      const exchange = new ScriptedExchange();
      const { manager } = setup(exchange);
      const instrument = { ...testInstrument, orderSize: 0.004 };
      await manager.submit(signal('ENTER_LONG', 5), instrument, 100);

      manager.handleFill(fillFor(KEY_5, 0.001, 100));
      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'PARTIALLY_FILLED', filledSize: 0.001 });

      manager.handleFill(fillFor(KEY_5, 0.003, 104));
      expect(manager.getOrder(KEY_5)?.state).toBe('FILLED');
      expect(manager.getOrder(KEY_5)?.avgFillPrice).toBeCloseTo(103, 9);
    });

    it('should apply a fill that arrives before the acknowledgement', async () => {
      let acknowledge: (result: PlaceOrderResult) => void = () => undefined;
      const exchange = new ScriptedExchange().respondWith(
        () => new Promise<PlaceOrderResult>(resolve => (acknowledge = resolve))
      );
      const { manager, tracker } = setup(exchange);

      const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      manager.handleFill(fillFor(KEY_5, 0.001));
      acknowledge({ status: 'ACKED', exchangeOrderId: 'ex-late', timestamp: new Date() });
      const result = await pending;

      expect(result.status).toBe('ACKED');
      expect(manager.getOrder(KEY_5)).toMatchObject({ state: 'FILLED', exchangeOrderId: 'ex-late' });
      expect(tracker.getPosition('BTC-USDT').side).toBe('LONG');
    });

    it('should journal orphan fills and still apply them to the position', () => {
      const { journal, manager, tracker } = setup();

      expect(manager.handleFill(fillFor('not-ours', 0.002, 100, { side: 'SELL' }))).toBe('ORPHAN');

      expect(tracker.getPosition('BTC-USDT')).toMatchObject({ side: 'SHORT', size: 0.002 });
      expect(journal.count('ORPHAN_FILL')).toBe(1);
    });

    it('should size an exit at the open position', async () => {
      const { exchange, manager, tracker } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      manager.handleFill(fillFor(KEY_5, 0.001));

      const result = await manager.submit(signal('EXIT', 9), testInstrument, 110);
      const exitKey = deriveIdempotencyKey('BTC-USDT', 9);
      manager.handleFill(fillFor(exitKey, 0.001, 110, { side: 'SELL' }));

      expect(result.status).toBe('ACKED');
      expect(exchange.requests[1]).toMatchObject({ side: 'SELL', size: 0.001, idempotencyKey: exitKey });
      expect(tracker.getPosition('BTC-USDT')).toMatchObject({ side: 'FLAT', size: 0 });
      expect(tracker.getPosition('BTC-USDT').realizedPnl).toBeCloseTo(0.01, 10);
    });

    it('should resolve an unknown order when its fill arrives', async () => {
      vi.useFakeTimers();
      try {
        const { manager } = setup(new ScriptedExchange().respondWith(fail(), fail(), fail()));
        const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
        await vi.runAllTimersAsync();
        await pending;

        manager.handleFill(fillFor(KEY_5, 0.001));

        expect(manager.getOrder(KEY_5)?.state).toBe('FILLED');
        expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe('cancel and resolveUnknown', () => {
    it('should cancel an acknowledged order and free the instrument', async () => {
      const { exchange, journal, manager, tracker } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);

      const result = await manager.cancel(KEY_5);

      expect(result.status).toBe('CANCELLED');
      expect(exchange.cancelled).toEqual([KEY_5]);
      expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
      expect(tracker.exposure().reservedNotional).toBe(0);
      expect(journal.count('ORDER_CANCELLED')).toBe(1);
    });

    it('should not cancel a filled order', async () => {
      const { manager } = setup();
      await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      manager.handleFill(fillFor(KEY_5, 0.001));

      expect((await manager.cancel(KEY_5)).status).toBe('NOT_CANCELLABLE');
      expect((await manager.cancel('missing')).status).toBe('NOT_FOUND');
    });

    it('should let an operator reconcile an unknown order', async () => {
      vi.useFakeTimers();
      try {
        const { journal, manager } = setup(new ScriptedExchange().respondWith(fail(), fail(), fail()));
        const pending = manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
        await vi.runAllTimersAsync();
        await pending;

        const result = manager.resolveUnknown(KEY_5, 'REJECTED');

        expect(result.status).toBe('RESOLVED');
        expect(manager.getOrder(KEY_5)?.state).toBe('REJECTED');
        expect(manager.inFlightOrder('BTC-USDT')).toBeUndefined();
        expect(journal.count('ORDER_RESOLVED')).toBe(1);
        expect(manager.resolveUnknown(KEY_5, 'ACKED').status).toBe('NOT_UNKNOWN');
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe('with the paper exchange', () => {
    it('should consume streamed fills and ignore redelivered ones', async () => {
      const exchange = new PaperExchangeAdapter({ latencyMs: 1, fillDelayMs: 1, fillChunks: 2, duplicateFills: true });
      exchange.setPrice('BTC-USDT', 100);
      const { manager, tracker } = setup(exchange);
      manager.start();
      const instrument = { ...testInstrument, orderSize: 0.002 };

      const result = await manager.submit(signal('ENTER_LONG', 5), instrument, 100);
      await vi.waitFor(() => expect(manager.getOrder(KEY_5)?.state).toBe('FILLED'));
      await manager.stop();
      exchange.close();

      expect(result.status).toBe('ACKED');
      expect(tracker.getPosition('BTC-USDT')).toMatchObject({ side: 'LONG', size: 0.002 });
      expect(tracker.getPosition('BTC-USDT').avgEntryPrice).toBeCloseTo(100, 9);
    });

    it('should not place a second venue order when a lost response is retried', async () => {
      const exchange = new PaperExchangeAdapter({ latencyMs: 0, fillDelayMs: 5 });
      exchange.setPrice('BTC-USDT', 100);
      exchange.injectFailures('hang');
      const tracker = new PositionRiskTracker(
        { 'BTC-USDT': { maxPositionSize: 1, maxNotional: 1000 } },
        { maxConcurrentPositions: 5, maxGlobalNotional: 10_000 }
      );
      const manager = new OrderExecutionManager({
        exchange,
        tracker,
        journal: new TradingEventJournal(),
        retryPolicy: { ...POLICY, attemptTimeoutMs: 20, baseDelayMs: 1 },
      });

      const result = await manager.submit(signal('ENTER_LONG', 5), testInstrument, 100);
      exchange.close();

      expect(result.status).toBe('ACKED');
      expect(exchange.getRequestCount()).toBe(2);
      expect(exchange.getOrderKeys()).toEqual([KEY_5]);
    });
  });
});
