/**
 * Trading Event Journal - Bounded in-memory record of events an operator must see
 */

import { randomUUID } from 'node:crypto';
import { getComponentLogger } from '../../config/logger.js';

export type TradingEventType =
  | 'RISK_REJECTED'
  | 'ORDER_REJECTED'
  | 'ORDER_UNKNOWN'
  | 'ORDER_CANCELLED'
  | 'ORDER_RESOLVED'
  | 'ORPHAN_FILL'
  | 'CYCLE_ERROR';

export interface TradingEvent {
  id: string;
  type: TradingEventType;
  instrument: string;
  idempotencyKey?: string;
  message: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface RecordEventParams {
  type: TradingEventType;
  instrument: string;
  idempotencyKey?: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface EventQuery {
  type?: TradingEventType;
  instrument?: string;
  limit?: number;
}

export const DEFAULT_JOURNAL_CAPACITY = 1000;

export class TradingEventJournal {
  private readonly events: TradingEvent[] = [];
  private readonly logger = getComponentLogger('event-journal');

  constructor(private readonly capacity: number = DEFAULT_JOURNAL_CAPACITY) {}

  record(params: RecordEventParams): TradingEvent {
    const event: TradingEvent = {
      id: randomUUID(),
      type: params.type,
      instrument: params.instrument,
      idempotencyKey: params.idempotencyKey,
      message: params.message,
      metadata: params.metadata ?? {},
      createdAt: new Date(),
    };

    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.shift();
    }

    this.logger.warn(
      { eventType: event.type, instrument: event.instrument, idempotencyKey: event.idempotencyKey, ...event.metadata },
      event.message
    );

    return event;
  }

  /**
   * Newest first.
   */
  list(query: EventQuery = {}): TradingEvent[] {
    const matches = this.events.filter(
      event =>
        (query.type === undefined || event.type === query.type) &&
        (query.instrument === undefined || event.instrument === query.instrument)
    );
    matches.reverse();
    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  count(type?: TradingEventType): number {
    return type === undefined ? this.events.length : this.events.filter(event => event.type === type).length;
  }
}
