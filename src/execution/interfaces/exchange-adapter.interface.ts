/**
 * Exchange Adapter Interface - All exchange implementations must conform to this interface
 */

import type { FillEvent, PlaceOrderRequest, PlaceOrderResult } from '../types/execution.types.js';

export interface ExchangeAdapter {
  /**
   * Submit an order. Resolves with the venue's ACK or business rejection;
   * rejects on transport failure. Repeating a request with the same
   * idempotency key must not create a second order.
   */
  placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult>;

  /**
   * Executions, delivered at least once and possibly duplicated. The stream
   * ends when `signal` aborts.
   */
  streamFills(signal?: AbortSignal): AsyncIterable<FillEvent>;

  /**
   * Cancel the open remainder of an order, by idempotency key.
   */
  cancelOrder?(idempotencyKey: string): Promise<void>;
}
