import { createApp } from './app.js';
import { getEnvironmentConfig } from './config/env.js';
import { logAgentStartup, logAgentShutdown, getLogger } from './config/logger.js';
import { loadAgentConfig } from './config/agent-config.js';
import { TradingAgent } from './agent/trading-agent.js';
import { toErrorContext } from './errors/trading.errors.js';

async function startServer(): Promise<void> {
  const env = getEnvironmentConfig();
  const logger = getLogger();

  process.on('unhandledRejection', reason => {
    logger.error(
      {
        event: 'unhandled_rejection',
        reason: toErrorContext(reason),
      },
      'Unhandled promise rejection'
    );
  });

  process.on('uncaughtException', error => {
    logger.fatal(
      {
        event: 'uncaught_exception',
        error: toErrorContext(error),
      },
      'Uncaught exception'
    );
    process.exit(1);
  });

  try {
    logger.info({ path: env.AGENT_CONFIG_PATH }, 'Loading agent configuration');
    const config = loadAgentConfig(env.AGENT_CONFIG_PATH);

    // With AUTO_START the agent trades a synthetic feed; otherwise bars arrive by webhook
    const agent = env.AUTO_START
      ? TradingAgent.paper(config).agent
      : new TradingAgent(config);

    const app = await createApp(agent);

    const gracefulShutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, `Received ${signal}, starting graceful shutdown`);
      logAgentShutdown(signal);

      try {
        await app.close();
        logger.info('Server closed successfully');

        await agent.stop();
        logger.info('Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.error({ error: toErrorContext(error) }, 'Error during graceful shutdown');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

    agent.start();

    const address = await app.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logAgentStartup(
      env.PORT,
      env.NODE_ENV,
      config.instruments.map(instrument => instrument.id)
    );
    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ error: toErrorContext(error) }, 'Failed to start server');
    process.exit(1);
  }
}

startServer().catch((error: unknown) => {
  const logger = getLogger();
  logger.fatal({ error: toErrorContext(error) }, 'Unhandled error during server startup');
  process.exit(1);
});
