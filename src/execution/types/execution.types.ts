/**
 * Core types for the order execution manager and position/risk tracker
 */

import type { SignalAction } from '../../strategy/strategy.types.js';

export type OrderSide = 'BUY' | 'SELL';

// Signals become market orders; the agent places no resting orders
export type OrderType = 'MARKET';

export type OrderState =
  | 'PENDING'
  | 'ACKED'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'REJECTED'
  | 'CANCELLED'
  | 'UNKNOWN';

export type PositionSide = 'FLAT' | 'LONG' | 'SHORT';

/**
 * Core Data Models
 */

export interface Order {
  idempotencyKey: string;
  instrument: string;
  side: OrderSide;
  size: number;
  type: OrderType;
  intent: Exclude<SignalAction, 'HOLD'>;
  signalSequence: number;
  referencePrice: number;
  state: OrderState;
  filledSize: number;
  avgFillPrice: number;
  exchangeOrderId?: string;
  attempts: number;
  rejectReason?: string;
  submittedAt: Date;
  updatedAt: Date;
}

export interface Position {
  instrument: string;
  side: PositionSide;
  size: number;
  avgEntryPrice: number;
  realizedPnl: number;
  openedAt?: Date;
  updatedAt: Date;
}

// Read-only slice of a position the strategy needs
export type PositionView = Pick<Position, 'side' | 'size' | 'avgEntryPrice'>;

export interface FillEvent {
  fillId: string;
  idempotencyKey: string;
  instrument: string;
  side: OrderSide;
  size: number;
  price: number;
  timestamp: Date;
  exchangeOrderId?: string;
}

/**
 * Exchange capability types
 */

export interface PlaceOrderRequest {
  instrument: string;
  side: OrderSide;
  size: number;
  type: OrderType;
  idempotencyKey: string;
}

export type PlaceOrderResult =
  | { status: 'ACKED'; exchangeOrderId: string; timestamp: Date }
  | { status: 'REJECTED'; reason: string; code?: string; timestamp: Date };

/**
 * Submission retry policy: attempts are bounded and spaced by exponential backoff
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  attemptTimeoutMs: number;
}

export interface InstrumentRiskLimits {
  maxPositionSize: number;
  maxNotional: number;
}

export interface GlobalRiskLimits {
  maxConcurrentPositions: number;
  maxGlobalNotional: number;
}

export interface ExposureSummary {
  totalNotional: number;
  reservedNotional: number;
  openPositions: number;
  byInstrument: Record<string, number>;
}
