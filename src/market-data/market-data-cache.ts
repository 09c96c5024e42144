import type { AppendResult, BarHistory, PriceBar } from '../types/market.types.js';
import {
  InsufficientHistory,
  InvalidBar,
  UnknownInstrument,
} from '../errors/trading.errors.js';
import { getComponentLogger } from '../config/logger.js';

const logger = getComponentLogger('market-data-cache');

/**
 * Fixed-capacity ring of bars for one instrument.
 */
class BarRing {
  private readonly slots: Array<PriceBar | undefined>;
  private head = 0; // index of the oldest bar
  private count = 0;
  sequence = 0;

  constructor(private readonly capacity: number) {
    this.slots = new Array<PriceBar | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  last(): PriceBar | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  push(bar: PriceBar): PriceBar | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = bar;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = bar;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  replaceLast(bar: PriceBar): void {
    this.slots[(this.head + this.count - 1) % this.capacity] = bar;
  }

  tail(n: number): PriceBar[] {
    const bars: PriceBar[] = [];
    for (let i = this.count - n; i < this.count; i++) {
      const bar = this.slots[(this.head + i) % this.capacity];
      if (bar) {
        bars.push(copyBar(bar));
      }
    }
    return bars;
  }
}

function copyBar(bar: PriceBar): PriceBar {
  return { ...bar, timestamp: new Date(bar.timestamp.getTime()) };
}

function sameValues(a: PriceBar, b: PriceBar): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
}

export function validateBar(instrument: string, bar: PriceBar): void {
  if (!(bar.timestamp instanceof Date) || isNaN(bar.timestamp.getTime())) {
    throw new InvalidBar(instrument, 'timestamp must be a valid Date');
  }

  const prices = { open: bar.open, high: bar.high, low: bar.low, close: bar.close };
  for (const [field, value] of Object.entries(prices)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidBar(instrument, `${field} must be a positive finite number`);
    }
  }

  if (!Number.isFinite(bar.volume) || bar.volume < 0) {
    throw new InvalidBar(instrument, 'volume must be a non-negative finite number');
  }

  if (bar.high < bar.low) {
    throw new InvalidBar(instrument, 'high cannot be less than low');
  }
}

/**
 * Bounded per-instrument bar history.
 *
 * Every accepted bar (new or in-progress replacement) advances the
 * instrument's sequence; readers always receive copies.
 */
export class MarketDataCache {
  private readonly rings = new Map<string, BarRing>();

  constructor(
    instruments: readonly string[],
    private readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer. Got: ${capacity}`);
    }

    for (const instrument of instruments) {
      this.rings.set(instrument, new BarRing(capacity));
    }
  }

  append(instrument: string, bar: PriceBar): AppendResult {
    const ring = this.ring(instrument);
    validateBar(instrument, bar);

    const last = ring.last();
    if (last) {
      const lastTime = last.timestamp.getTime();
      const barTime = bar.timestamp.getTime();

      if (barTime < lastTime) {
        logger.warn(
          {
            instrument,
            barTimestamp: bar.timestamp.toISOString(),
            lastTimestamp: last.timestamp.toISOString(),
          },
          'Out-of-order bar ignored'
        );
        return { status: 'OUT_OF_ORDER', sequence: ring.sequence };
      }

      if (barTime === lastTime) {
        if (sameValues(last, bar)) {
          return { status: 'DUPLICATE', sequence: ring.sequence };
        }
        ring.replaceLast(copyBar(bar));
        ring.sequence++;
        return { status: 'REPLACED', sequence: ring.sequence };
      }
    }

    const evicted = ring.push(copyBar(bar));
    ring.sequence++;
    return { status: 'APPENDED', sequence: ring.sequence, evicted };
  }

  /**
   * Last `n` bars in chronological order with the sequence of the newest one.
   */
  history(instrument: string, n: number): BarHistory {
    const ring = this.ring(instrument);

    if (n > ring.size) {
      throw new InsufficientHistory(instrument, n, ring.size);
    }

    return {
      instrument,
      bars: ring.tail(n),
      sequence: ring.sequence,
    };
  }

  latest(instrument: string): PriceBar | undefined {
    const last = this.ring(instrument).last();
    return last ? copyBar(last) : undefined;
  }

  size(instrument: string): number {
    return this.ring(instrument).size;
  }

  sequence(instrument: string): number {
    return this.ring(instrument).sequence;
  }

  instruments(): string[] {
    return Array.from(this.rings.keys());
  }

  getCapacity(): number {
    return this.capacity;
  }

  private ring(instrument: string): BarRing {
    const ring = this.rings.get(instrument);
    if (!ring) {
      throw new UnknownInstrument(instrument);
    }
    return ring;
  }
}
