import Fastify, { type FastifyInstance } from 'fastify';
import { randomUUID } from 'node:crypto';
import type { TradingAgent } from './agent/trading-agent.js';
import { logHttpRequest, logHttpError } from './config/logger.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerAgentRoutes } from './routes/agent.js';
import { getEnvironmentConfig } from './config/env.js';
import { TradingError, type TradingErrorCode } from './errors/trading.errors.js';

const STATUS_BY_CODE: Partial<Record<TradingErrorCode, number>> = {
  UNKNOWN_INSTRUMENT: 404,
  INVALID_BAR: 400,
  INVALID_ORDER_TRANSITION: 409,
};

export async function createApp(agent: TradingAgent): Promise<FastifyInstance> {
  const env = getEnvironmentConfig();

  const app = Fastify({
    logger: false, // Requests are logged through logHttpRequest
    disableRequestLogging: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    genReqId: () => randomUUID(),
  });

  app.addHook('onRequest', async request => {
    request.startTime = Date.now();
  });

  app.addHook('onResponse', async (request, reply) => {
    logHttpRequest({
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: Date.now() - (request.startTime || Date.now()),
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    const statusCode =
      error instanceof TradingError
        ? (STATUS_BY_CODE[error.code] ?? 500)
        : (error.statusCode ?? 500);

    if (statusCode >= 500) {
      logHttpError(error, {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode,
      });
    }

    const message =
      env.NODE_ENV === 'production' && statusCode >= 500
        ? 'Internal Server Error'
        : error.message;

    await reply.code(statusCode).send({
      error: {
        message,
        statusCode,
        code: error.code,
        requestId: request.id,
      },
    });
  });

  await registerHealthRoutes(app, agent);
  await registerAgentRoutes(app, agent);

  return app;
}

declare module 'fastify' {
  interface FastifyRequest {
    startTime?: number;
  }
}
