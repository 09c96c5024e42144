import type { FastifyInstance } from 'fastify';
import type { TradingAgent } from '../agent/trading-agent.js';
import { getEnvironmentConfig } from '../config/env.js';

export interface HealthResponse {
  status: 'ok';
  environment: string;
  uptime: number;
  agent: 'running' | 'stopped';
}

const startTime = Date.now();

export async function registerHealthRoutes(
  fastify: FastifyInstance,
  agent: TradingAgent
): Promise<void> {
  await fastify.register(async function healthRoutes(fastify: FastifyInstance) {
    fastify.get(
      '/health',
      {
        schema: {
          response: {
            200: {
              type: 'object',
              properties: {
                status: { type: 'string', enum: ['ok'] },
                environment: { type: 'string' },
                uptime: { type: 'number' },
                agent: { type: 'string', enum: ['running', 'stopped'] },
              },
              required: ['status', 'environment', 'uptime', 'agent'],
            },
          },
        },
      },
      async (_request, reply) => {
        const response: HealthResponse = {
          status: 'ok',
          environment: getEnvironmentConfig().NODE_ENV,
          uptime: Date.now() - startTime,
          agent: agent.isRunning() ? 'running' : 'stopped',
        };

        await reply.code(200).type('application/json').send(response);
      }
    );
  });
}
