import type { FastifyInstance } from 'fastify';
import type { TradingAgent } from '../agent/trading-agent.js';
import type { CycleOutcome } from '../scheduler/execution-scheduler.js';
import type {
  ResolvableState,
  SubmissionResult,
} from '../execution/services/order-execution-manager.service.js';
import type { OrderState } from '../execution/types/execution.types.js';
import type { TradingEventType } from '../execution/services/trading-event-journal.service.js';
import type { PriceBar } from '../types/market.types.js';
import { validateBar } from '../market-data/market-data-cache.js';
import { UnknownInstrument } from '../errors/trading.errors.js';

// Types for request/reply
interface InstrumentParams {
  Params: { instrument: string };
}

interface TickRequest extends InstrumentParams {
  Body: {
    timestamp: string | number;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
  };
}

interface OrderQueryRequest {
  Querystring: {
    state?: OrderState;
    instrument?: string;
  };
}

interface EventQueryRequest {
  Querystring: {
    type?: TradingEventType;
    instrument?: string;
    limit?: number;
  };
}

interface OrderKeyParams {
  Params: { key: string };
}

interface ResolveRequest extends OrderKeyParams {
  Body: { state: ResolvableState };
}

const ORDER_STATES: OrderState[] = [
  'PENDING',
  'ACKED',
  'PARTIALLY_FILLED',
  'FILLED',
  'REJECTED',
  'CANCELLED',
  'UNKNOWN',
];

const EVENT_TYPES: TradingEventType[] = [
  'RISK_REJECTED',
  'ORDER_REJECTED',
  'ORDER_UNKNOWN',
  'ORDER_CANCELLED',
  'ORDER_RESOLVED',
  'ORPHAN_FILL',
  'CYCLE_ERROR',
];

const tickSchema = {
  params: {
    type: 'object',
    properties: { instrument: { type: 'string' } },
    required: ['instrument'],
  },
  body: {
    type: 'object',
    properties: {
      timestamp: { type: ['string', 'number'] },
      open: { type: 'number' },
      high: { type: 'number' },
      low: { type: 'number' },
      close: { type: 'number' },
      volume: { type: 'number', default: 0 },
    },
    required: ['timestamp', 'open', 'high', 'low', 'close'],
  },
};

/**
 * Errors inside outcomes become plain objects so they survive serialization.
 */
function describeSubmission(result: SubmissionResult): Record<string, unknown> {
  switch (result.status) {
    case 'RISK_REJECTED':
      return {
        status: result.status,
        message: result.error.message,
        violations: result.error.violations,
      };
    case 'REJECTED':
    case 'UNKNOWN':
      return { status: result.status, message: result.error.message, order: result.order };
    default:
      return result;
  }
}

export function describeOutcome(outcome: CycleOutcome): Record<string, unknown> {
  switch (outcome.kind) {
    case 'FAILED':
      return {
        kind: outcome.kind,
        instrument: outcome.instrument,
        error: { name: outcome.error.name, message: outcome.error.message },
      };
    case 'SUBMITTED':
      return { ...outcome, result: describeSubmission(outcome.result) };
    default:
      return outcome;
  }
}

export async function registerAgentRoutes(
  app: FastifyInstance,
  agent: TradingAgent
): Promise<void> {
  const requireInstrument = (instrument: string): void => {
    if (!agent.hasInstrument(instrument)) {
      throw new UnknownInstrument(instrument);
    }
  };

  /**
   * GET /api/status
   * Agent, scheduler and exposure summary
   */
  app.get('/api/status', async (_request, reply) => {
    return reply.send({ success: true, data: agent.status() });
  });

  /**
   * GET /api/positions
   * Every tracked position with current exposure
   */
  app.get('/api/positions', async (_request, reply) => {
    return reply.send({
      success: true,
      data: {
        positions: agent.tracker.listPositions(),
        exposure: agent.tracker.exposure(),
      },
    });
  });

  /**
   * GET /api/orders
   * Orders, optionally filtered by state and instrument
   */
  app.get<OrderQueryRequest>(
    '/api/orders',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            state: { type: 'string', enum: ORDER_STATES },
            instrument: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      const orders = agent.manager.listOrders(request.query);
      return reply.send({ success: true, data: orders, count: orders.length });
    }
  );

  /**
   * GET /api/events
   * Journaled risk rejections, order failures and cycle errors, newest first
   */
  app.get<EventQueryRequest>(
    '/api/events',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            type: { type: 'string', enum: EVENT_TYPES },
            instrument: { type: 'string' },
            limit: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
          },
        },
      },
    },
    async (request, reply) => {
      const events = agent.journal.list(request.query);
      return reply.send({ success: true, data: events, count: events.length });
    }
  );

  /**
   * POST /api/instruments/:instrument/ticks
   * Bar webhook: append the bar and run a cycle
   */
  app.post<TickRequest>(
    '/api/instruments/:instrument/ticks',
    { schema: tickSchema },
    async (request, reply) => {
      const { instrument } = request.params;
      requireInstrument(instrument);

      const { timestamp, ...prices } = request.body;
      const bar: PriceBar = { timestamp: new Date(timestamp), ...prices };
      validateBar(instrument, bar);

      const outcome = await agent.onTick(instrument, bar);
      return reply.code(202).send({ success: true, data: describeOutcome(outcome) });
    }
  );

  /**
   * POST /api/instruments/:instrument/evaluate
   * Run a cycle on the current history without a new bar
   */
  app.post<InstrumentParams>(
    '/api/instruments/:instrument/evaluate',
    async (request, reply) => {
      const { instrument } = request.params;
      requireInstrument(instrument);

      const outcome = await agent.evaluate(instrument);
      return reply.send({ success: true, data: describeOutcome(outcome) });
    }
  );

  /**
   * POST /api/orders/:key/cancel
   * Cancel an open order at the exchange
   */
  app.post<OrderKeyParams>('/api/orders/:key/cancel', async (request, reply) => {
    const result = await agent.manager.cancel(request.params.key);

    switch (result.status) {
      case 'CANCELLED':
        return reply.send({ success: true, data: result.order });
      case 'NOT_FOUND':
        return reply.code(404).send({
          success: false,
          error: `Order ${request.params.key} not found`,
        });
      case 'NOT_CANCELLABLE':
        return reply.code(409).send({
          success: false,
          error: `Order ${request.params.key} is ${result.order.state}`,
          data: result.order,
        });
      case 'FAILED':
        return reply.code(502).send({
          success: false,
          error: result.error.message,
          data: result.order,
        });
    }
  });

  /**
   * POST /api/orders/:key/resolve
   * Operator reconciliation of an UNKNOWN order
   */
  app.post<ResolveRequest>(
    '/api/orders/:key/resolve',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            state: { type: 'string', enum: ['ACKED', 'REJECTED', 'CANCELLED'] },
          },
          required: ['state'],
        },
      },
    },
    async (request, reply) => {
      const result = agent.manager.resolveUnknown(request.params.key, request.body.state);

      switch (result.status) {
        case 'RESOLVED':
          return reply.send({ success: true, data: result.order });
        case 'NOT_FOUND':
          return reply.code(404).send({
            success: false,
            error: `Order ${request.params.key} not found`,
          });
        case 'NOT_UNKNOWN':
          return reply.code(409).send({
            success: false,
            error: `Order ${request.params.key} is ${result.order.state}, not UNKNOWN`,
            data: result.order,
          });
      }
    }
  );
}
