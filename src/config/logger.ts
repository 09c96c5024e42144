import pino from 'pino';
import { getEnvironmentConfig } from './env.js';
import { toErrorContext } from '../errors/trading.errors.js';
import type { Order, OrderState } from '../execution/types/execution.types.js';
import type { CycleOutcome } from '../scheduler/execution-scheduler.js';

export const SERVICE_NAME = 'signal-trading-agent';

export interface HttpLogContext {
  requestId: string;
  method: string;
  url: string;
  statusCode: number;
  responseTime?: number;
}

let logger: pino.Logger | null = null;

export function createLogger(): pino.Logger {
  if (logger) {
    return logger;
  }

  const env = getEnvironmentConfig();

  const loggerConfig: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: SERVICE_NAME, pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (env.NODE_ENV === 'development') {
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,service',
        messageFormat: '[{component}] {msg}',
      },
    };
  }

  logger = pino(loggerConfig);
  return logger;
}

export function getLogger(): pino.Logger {
  return logger ?? createLogger();
}

/**
 * Logger bound to one component, e.g. `getComponentLogger('scheduler')`.
 */
export function getComponentLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}

/**
 * Fields that identify an order in every order-related log line.
 */
export function orderLogFields(order: Order): Record<string, unknown> {
  return {
    idempotencyKey: order.idempotencyKey,
    instrument: order.instrument,
    side: order.side,
    size: order.size,
    state: order.state,
    filledSize: order.filledSize,
    attempts: order.attempts,
  };
}

export function logOrderTransition(
  order: Order,
  from: OrderState,
  target: pino.Logger = getComponentLogger('order-state')
): void {
  target.debug(
    { event: 'order_transition', ...orderLogFields(order), from },
    `Order ${from} -> ${order.state}`
  );
}

/**
 * One line per finished cycle. SUBMITTED goes out at info and FAILED at error;
 * the quiet outcomes only at debug.
 */
export function logCycleOutcome(outcome: CycleOutcome, cycleLogger: pino.Logger = getComponentLogger('cycle')): void {
  const fields: Record<string, unknown> = {
    event: 'cycle_outcome',
    instrument: outcome.instrument,
    outcome: outcome.kind,
  };

  switch (outcome.kind) {
    case 'SUBMITTED':
      cycleLogger.info(
        { ...fields, sequence: outcome.sequence, submission: outcome.result.status },
        `Cycle submitted order (${outcome.result.status})`
      );
      return;
    case 'FAILED':
      cycleLogger.error({ ...fields, error: toErrorContext(outcome.error) }, 'Cycle failed');
      return;
    case 'SKIPPED':
      cycleLogger.debug({ ...fields, reason: outcome.reason }, 'Cycle skipped');
      return;
    case 'SUPPRESSED':
      cycleLogger.debug({ ...fields, sequence: outcome.sequence, action: outcome.action }, 'Cycle suppressed');
      return;
    case 'COOLDOWN':
      cycleLogger.debug(
        { ...fields, sequence: outcome.sequence, remainingMs: outcome.remainingMs },
        'Cycle in cooldown'
      );
      return;
    case 'STALE':
    case 'HOLD':
      cycleLogger.debug({ ...fields, sequence: outcome.sequence }, 'Cycle complete');
      return;
  }
}

export function logAgentStartup(port: number, environment: string, instruments: readonly string[]): void {
  getLogger().info(
    {
      event: 'agent_startup',
      port,
      environment,
      instruments,
      nodeVersion: process.version,
    },
    `Agent listening on port ${port} for ${instruments.length} instrument(s)`
  );
}

export function logAgentShutdown(signal: string): void {
  getLogger().info({ event: 'agent_shutdown', signal }, 'Agent shutting down');
}

export function logHttpRequest(context: HttpLogContext): void {
  getComponentLogger('http').info(
    { event: 'http_request', ...context },
    `${context.method} ${context.url} ${context.statusCode} - ${context.responseTime ?? 0}ms`
  );
}

export function logHttpError(error: unknown, context: HttpLogContext): void {
  getComponentLogger('http').error({ event: 'http_error', ...context, error: toErrorContext(error) }, 'Request failed');
}
