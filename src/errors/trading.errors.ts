/**
 * Error taxonomy for the signal-to-order pipeline.
 *
 * Recoverable errors skip the current cycle or signal; the rest are terminal
 * for the signal that produced them and are surfaced through the event journal.
 */

export type TradingErrorCode =
  | 'INSUFFICIENT_HISTORY'
  | 'RISK_REJECTED'
  | 'ORDER_REJECTED'
  | 'EXCHANGE_TIMEOUT'
  | 'STALE_SIGNAL'
  | 'INVALID_BAR'
  | 'UNKNOWN_INSTRUMENT'
  | 'INVALID_ORDER_TRANSITION'
  | 'CONFIGURATION_ERROR';

export abstract class TradingError extends Error {
  abstract readonly code: TradingErrorCode;
  abstract readonly recoverable: boolean;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientHistory extends TradingError {
  readonly code = 'INSUFFICIENT_HISTORY';
  readonly recoverable = true;

  constructor(
    public readonly instrument: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `Insufficient history for ${instrument}: required ${required}, available ${available}`,
      { instrument, required, available }
    );
  }
}

export interface RiskViolation {
  type:
    | 'MAX_POSITION_SIZE'
    | 'MAX_INSTRUMENT_NOTIONAL'
    | 'MAX_CONCURRENT_POSITIONS'
    | 'MAX_GLOBAL_NOTIONAL'
    | 'NO_OPEN_POSITION'
    | 'INVALID_SIZE';
  current: number;
  limit: number;
  description: string;
}

export class RiskRejected extends TradingError {
  readonly code = 'RISK_REJECTED';
  readonly recoverable = true;

  constructor(
    public readonly instrument: string,
    public readonly violations: RiskViolation[]
  ) {
    super(
      `Risk limits rejected order for ${instrument}: ${violations
        .map(v => v.description)
        .join('; ')}`,
      { instrument, violations: violations.map(v => v.type) }
    );
  }
}

export class OrderRejected extends TradingError {
  readonly code = 'ORDER_REJECTED';
  readonly recoverable = false;

  constructor(
    public readonly idempotencyKey: string,
    public readonly reason: string,
    public readonly exchangeCode?: string
  ) {
    super(`Exchange rejected order ${idempotencyKey}: ${reason}`, {
      idempotencyKey,
      reason,
      exchangeCode,
    });
  }
}

export class ExchangeTimeout extends TradingError {
  readonly code = 'EXCHANGE_TIMEOUT';
  readonly recoverable = false;

  constructor(
    public readonly idempotencyKey: string,
    public readonly attempts: number,
    public readonly lastError?: string
  ) {
    super(
      `No confirmation for order ${idempotencyKey} after ${attempts} attempt(s)`,
      { idempotencyKey, attempts, lastError }
    );
  }
}

export class StaleSignal extends TradingError {
  readonly code = 'STALE_SIGNAL';
  readonly recoverable = true;

  constructor(
    public readonly instrument: string,
    public readonly sequence: number,
    public readonly lastSequence: number
  ) {
    super(
      `Stale snapshot for ${instrument}: sequence ${sequence} <= last evaluated ${lastSequence}`,
      { instrument, sequence, lastSequence }
    );
  }
}

export class InvalidBar extends TradingError {
  readonly code = 'INVALID_BAR';
  readonly recoverable = true;

  constructor(
    public readonly instrument: string,
    reason: string
  ) {
    super(`Invalid bar for ${instrument}: ${reason}`, { instrument, reason });
  }
}

export class UnknownInstrument extends TradingError {
  readonly code = 'UNKNOWN_INSTRUMENT';
  readonly recoverable = true;

  constructor(public readonly instrument: string) {
    super(`Unknown instrument: ${instrument}`, { instrument });
  }
}

export class InvalidOrderTransition extends TradingError {
  readonly code = 'INVALID_ORDER_TRANSITION';
  readonly recoverable = false;

  constructor(
    public readonly idempotencyKey: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid order transition for ${idempotencyKey}: ${from} -> ${to}`, {
      idempotencyKey,
      from,
      to,
    });
  }
}

export class ConfigurationError extends TradingError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly recoverable = false;

  constructor(public readonly issues: string[]) {
    super(`Invalid agent configuration: ${issues.join('; ')}`, { issues });
  }
}

/**
 * Flatten any thrown value into a structured log context.
 */
export function toErrorContext(error: unknown): Record<string, unknown> {
  if (error instanceof TradingError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      recoverable: error.recoverable,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }

  return { message: String(error) };
}
