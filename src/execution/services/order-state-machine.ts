import type { Order, OrderState } from '../types/execution.types.js';
import { InvalidOrderTransition } from '../../errors/trading.errors.js';
import { logOrderTransition } from '../../config/logger.js';

const VALID_TRANSITIONS: ReadonlyMap<OrderState, readonly OrderState[]> = new Map<OrderState, OrderState[]>([
  ['PENDING', ['ACKED', 'PARTIALLY_FILLED', 'FILLED', 'REJECTED', 'UNKNOWN']],
  ['ACKED', ['PARTIALLY_FILLED', 'FILLED', 'CANCELLED']],
  ['PARTIALLY_FILLED', ['PARTIALLY_FILLED', 'FILLED', 'CANCELLED']],
  ['UNKNOWN', ['ACKED', 'PARTIALLY_FILLED', 'FILLED', 'REJECTED', 'CANCELLED']],
  ['FILLED', []],
  ['REJECTED', []],
  ['CANCELLED', []],
]);

// Orders in these states hold the instrument's in-flight slot
const OPEN_STATES: readonly OrderState[] = ['PENDING', 'ACKED', 'PARTIALLY_FILLED', 'UNKNOWN'];

export function validTransitions(from: OrderState): readonly OrderState[] {
  return VALID_TRANSITIONS.get(from) ?? [];
}

export function canTransition(from: OrderState, to: OrderState): boolean {
  return validTransitions(from).includes(to);
}

export function isTerminal(state: OrderState): boolean {
  return validTransitions(state).length === 0;
}

export function isOpen(state: OrderState): boolean {
  return OPEN_STATES.includes(state);
}

/**
 * Moves an order to `to`, stamping `updatedAt` and logging the move. Throws `InvalidOrderTransition`
 * for any move the table does not list.
 */
export function transition(order: Order, to: OrderState, at: Date = new Date()): void {
  if (!canTransition(order.state, to)) {
    throw new InvalidOrderTransition(order.idempotencyKey, order.state, to);
  }
  const from = order.state;
  order.state = to;
  order.updatedAt = at;
  logOrderTransition(order, from);
}
