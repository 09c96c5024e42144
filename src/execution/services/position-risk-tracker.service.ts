/**
 * Position & Risk Tracker - Authoritative positions, exposure and risk limits
 *
 * Every mutating method is synchronous: a fill or reservation for one
 * instrument is applied in full before any other caller observes the record.
 */

import type {
  ExposureSummary,
  FillEvent,
  GlobalRiskLimits,
  InstrumentRiskLimits,
  Position,
  PositionSide,
} from '../types/execution.types.js';
import type { TradeAction } from '../../strategy/strategy.types.js';
import type { RiskViolation } from '../../errors/trading.errors.js';
import { UnknownInstrument } from '../../errors/trading.errors.js';
import { getComponentLogger } from '../../config/logger.js';

// Sizes below this are treated as flat
const SIZE_EPSILON = 1e-9;

export interface RiskDecision {
  allowed: boolean;
  violations: RiskViolation[];
}

interface Reservation {
  size: number;
  price: number;
}

function signedSize(position: Position): number {
  if (position.side === 'LONG') return position.size;
  if (position.side === 'SHORT') return -position.size;
  return 0;
}

function sideOf(signed: number): PositionSide {
  if (signed > 0) return 'LONG';
  if (signed < 0) return 'SHORT';
  return 'FLAT';
}

export class PositionRiskTracker {
  private readonly positions = new Map<string, Position>();
  private readonly marks = new Map<string, number>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly logger = getComponentLogger('position-risk-tracker');

  constructor(
    private readonly instrumentLimits: Readonly<Record<string, InstrumentRiskLimits>>,
    private readonly globalLimits: GlobalRiskLimits
  ) {}

  /**
   * Decide whether an order of `size` at `price` may be sent. Approved entries
   * reserve their notional until `release()` or until fills consume it.
   */
  authorize(instrument: string, action: TradeAction, size: number, price: number): RiskDecision {
    const limits = this.instrumentLimits[instrument];
    if (!limits) {
      throw new UnknownInstrument(instrument);
    }

    const violations: RiskViolation[] = [];
    const position = this.getPosition(instrument);

    if (!(size > 0) || !Number.isFinite(size) || !(price > 0) || !Number.isFinite(price)) {
      violations.push({
        type: 'INVALID_SIZE',
        current: size,
        limit: 0,
        description: `Order size ${size} at price ${price} is not a positive amount`,
      });
      return this.decide(instrument, action, violations);
    }

    if (action === 'EXIT') {
      if (position.side === 'FLAT') {
        violations.push({
          type: 'NO_OPEN_POSITION',
          current: 0,
          limit: 0,
          description: `No open position on ${instrument} to exit`,
        });
      }
      return this.decide(instrument, action, violations);
    }

    const reserved = this.reservations.get(instrument);
    const reservedSize = reserved?.size ?? 0;
    const projectedSize = position.size + reservedSize + size;
    if (projectedSize > limits.maxPositionSize) {
      violations.push({
        type: 'MAX_POSITION_SIZE',
        current: projectedSize,
        limit: limits.maxPositionSize,
        description: `Position size ${projectedSize} would exceed maximum ${limits.maxPositionSize} for ${instrument}`,
      });
    }

    const notional = size * price;
    const instrumentNotional = this.instrumentNotional(instrument) + this.reservedNotional(instrument) + notional;
    if (instrumentNotional > limits.maxNotional) {
      violations.push({
        type: 'MAX_INSTRUMENT_NOTIONAL',
        current: instrumentNotional,
        limit: limits.maxNotional,
        description: `Notional ${instrumentNotional.toFixed(2)} would exceed maximum ${limits.maxNotional} for ${instrument}`,
      });
    }

    const opensNewPosition = position.side === 'FLAT' && !reserved;
    const occupied = this.openPositionCount() + this.pendingEntryCount();
    if (opensNewPosition && occupied >= this.globalLimits.maxConcurrentPositions) {
      violations.push({
        type: 'MAX_CONCURRENT_POSITIONS',
        current: occupied,
        limit: this.globalLimits.maxConcurrentPositions,
        description: `${occupied} open or pending positions already at maximum ${this.globalLimits.maxConcurrentPositions}`,
      });
    }

    const { totalNotional, reservedNotional } = this.exposure();
    const globalNotional = totalNotional + reservedNotional + notional;
    if (globalNotional > this.globalLimits.maxGlobalNotional) {
      violations.push({
        type: 'MAX_GLOBAL_NOTIONAL',
        current: globalNotional,
        limit: this.globalLimits.maxGlobalNotional,
        description: `Global notional ${globalNotional.toFixed(2)} would exceed maximum ${this.globalLimits.maxGlobalNotional}`,
      });
    }

    const decision = this.decide(instrument, action, violations);
    if (decision.allowed) {
      this.reservations.set(instrument, { size: reservedSize + size, price });
    }
    return decision;
  }

  /**
   * Apply an execution to the instrument's position with average-price
   * accounting. Reductions realize P&L; a fill larger than the position flips it.
   */
  apply(fill: FillEvent): Position {
    const position = this.getPosition(fill.instrument);
    const current = signedSize(position);
    const quantity = fill.side === 'BUY' ? fill.size : -fill.size;
    let next = current + quantity;
    if (Math.abs(next) < SIZE_EPSILON) next = 0;

    let avgEntryPrice = position.avgEntryPrice;
    let realizedPnl = position.realizedPnl;
    let openedAt = position.openedAt;

    if (current === 0 || Math.sign(current) === Math.sign(quantity)) {
      const absCurrent = Math.abs(current);
      avgEntryPrice = (absCurrent * position.avgEntryPrice + fill.size * fill.price) / (absCurrent + fill.size);
      openedAt = openedAt ?? fill.timestamp;
    } else {
      const closing = Math.min(Math.abs(quantity), Math.abs(current));
      realizedPnl += closing * (fill.price - position.avgEntryPrice) * Math.sign(current);

      if (next === 0) {
        avgEntryPrice = 0;
        openedAt = undefined;
      } else if (Math.sign(next) !== Math.sign(current)) {
        avgEntryPrice = fill.price;
        openedAt = fill.timestamp;
      }
    }

    const updated: Position = {
      instrument: fill.instrument,
      side: sideOf(next),
      size: Math.abs(next),
      avgEntryPrice,
      realizedPnl,
      openedAt,
      updatedAt: fill.timestamp,
    };
    this.positions.set(fill.instrument, updated);
    this.consumeReservation(fill.instrument, fill.size);

    this.logger.info(
      {
        instrument: fill.instrument,
        fillId: fill.fillId,
        side: updated.side,
        size: updated.size,
        avgEntryPrice: updated.avgEntryPrice,
        realizedPnl: updated.realizedPnl,
      },
      'Position updated'
    );

    return { ...updated };
  }

  markPrice(instrument: string, price: number): void {
    if (Number.isFinite(price) && price > 0) {
      this.marks.set(instrument, price);
    }
  }

  release(instrument: string): void {
    this.reservations.delete(instrument);
  }

  getPosition(instrument: string): Position {
    const position = this.positions.get(instrument);
    if (position) {
      return { ...position };
    }
    return {
      instrument,
      side: 'FLAT',
      size: 0,
      avgEntryPrice: 0,
      realizedPnl: 0,
      updatedAt: new Date(0),
    };
  }

  listPositions(): Position[] {
    return Array.from(this.positions.values(), position => ({ ...position }));
  }

  openPositionCount(): number {
    let count = 0;
    for (const position of this.positions.values()) {
      if (position.side !== 'FLAT') count++;
    }
    return count;
  }

  exposure(): ExposureSummary {
    const byInstrument: Record<string, number> = {};
    let totalNotional = 0;
    for (const position of this.positions.values()) {
      if (position.side === 'FLAT') continue;
      const notional = this.instrumentNotional(position.instrument);
      byInstrument[position.instrument] = notional;
      totalNotional += notional;
    }

    let reservedNotional = 0;
    for (const instrument of this.reservations.keys()) {
      reservedNotional += this.reservedNotional(instrument);
    }

    return { totalNotional, reservedNotional, openPositions: this.openPositionCount(), byInstrument };
  }

  unrealizedPnl(instrument: string): number {
    const position = this.getPosition(instrument);
    if (position.side === 'FLAT') return 0;
    const mark = this.marks.get(instrument) ?? position.avgEntryPrice;
    return (mark - position.avgEntryPrice) * signedSize(position);
  }

  private decide(instrument: string, action: TradeAction, violations: RiskViolation[]): RiskDecision {
    const allowed = violations.length === 0;
    if (!allowed) {
      this.logger.warn(
        { instrument, action, violations: violations.map(v => v.description) },
        'Risk authorization denied'
      );
    }
    return { allowed, violations };
  }

  private instrumentNotional(instrument: string): number {
    const position = this.positions.get(instrument);
    if (!position || position.side === 'FLAT') return 0;
    return position.size * (this.marks.get(instrument) ?? position.avgEntryPrice);
  }

  private reservedNotional(instrument: string): number {
    const reservation = this.reservations.get(instrument);
    return reservation ? reservation.size * reservation.price : 0;
  }

  private pendingEntryCount(): number {
    let count = 0;
    for (const instrument of this.reservations.keys()) {
      if ((this.positions.get(instrument)?.side ?? 'FLAT') === 'FLAT') count++;
    }
    return count;
  }

  private consumeReservation(instrument: string, size: number): void {
    const reservation = this.reservations.get(instrument);
    if (!reservation) return;
    const remaining = reservation.size - size;
    if (remaining < SIZE_EPSILON) {
      this.reservations.delete(instrument);
    } else {
      this.reservations.set(instrument, { ...reservation, size: remaining });
    }
  }
}
