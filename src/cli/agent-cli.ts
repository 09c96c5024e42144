#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { loadAgentConfig } from '../config/agent-config.js';
import type { AgentConfig } from '../config/agent-config.js';
import { getEnvironmentConfig } from '../config/env.js';
import { TradingAgent } from '../agent/trading-agent.js';
import { ConfigurationError } from '../errors/trading.errors.js';

const program = new Command();

/**
 * CLI for paper runs and configuration checks
 */

program
  .name('trading-agent')
  .description('Signal-to-order trading agent')
  .version('0.1.0');

interface ConfigOptions {
  config?: string;
}

interface RunOptions extends ConfigOptions {
  ticks?: string;
  interval?: string;
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer. Got: ${value}`);
  }
  return parsed;
}

function readConfig(options: ConfigOptions): AgentConfig {
  return loadAgentConfig(options.config ?? getEnvironmentConfig().AGENT_CONFIG_PATH);
}

function reportFailure(label: string, error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(`❌ ${label}: invalid configuration`);
    error.issues.forEach((issue, index) => {
      console.error(`  ${index + 1}. ${issue}`);
    });
  } else {
    console.error(`❌ ${label}:`, error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
}

export function printSummary(agent: TradingAgent): void {
  const status = agent.status();

  console.log('📊 Positions:');
  for (const instrument of status.instruments) {
    const { position } = instrument;
    console.log(
      `  - ${instrument.id}: ${position.side} ${position.size} @ ${position.avgEntryPrice} ` +
        `(bars ${instrument.bars}, last ${instrument.lastClose ?? '-'}, ` +
        `realized ${position.realizedPnl.toFixed(2)}, unrealized ${instrument.unrealizedPnl.toFixed(2)})`
    );
  }

  const byState = new Map<string, number>();
  for (const order of agent.manager.listOrders()) {
    byState.set(order.state, (byState.get(order.state) ?? 0) + 1);
  }
  console.log(`📦 Orders: ${status.orders.total}`);
  byState.forEach((count, state) => {
    console.log(`  - ${state}: ${count}`);
  });

  console.log(`💰 Exposure: ${status.exposure.totalNotional.toFixed(2)} notional`);

  const events = Object.entries(status.events).filter(([, count]) => count > 0);
  if (events.length > 0) {
    console.log('⚠️  Journal:');
    events.forEach(([type, count]) => {
      console.log(`  - ${type}: ${count}`);
    });
  }
}

// Paper run command
program
  .command('run')
  .description('Trade a synthetic random-walk feed against the paper exchange')
  .option('-c, --config <path>', 'Agent configuration file')
  .option('--ticks <count>', 'Stop after this many bars per instrument')
  .option('--interval <ms>', 'Milliseconds between bars')
  .action(async (options: RunOptions) => {
    try {
      const config = readConfig(options);
      const maxBars = parsePositiveInt(options.ticks, 'ticks');
      const intervalMs = parsePositiveInt(options.interval, 'interval');

      const { agent, feed } = TradingAgent.paper(config, { maxBars, intervalMs });
      const interrupt = (): void => {
        console.log('🛑 Interrupted, stopping...');
        void feed.stop();
      };
      process.once('SIGINT', interrupt);

      console.log('🚀 Starting paper run...');
      console.log(`Instruments: ${config.instruments.map(i => i.id).join(', ')}`);
      console.log(`Indicators: ${config.indicators.map(spec => spec.name).join(', ')}`);
      console.log(`Bars: ${maxBars ?? 'until interrupted'}`);

      agent.start();
      await feed.done();
      await agent.stop();
      process.removeListener('SIGINT', interrupt);

      console.log('✅ Paper run completed!');
      printSummary(agent);
    } catch (error) {
      reportFailure('Paper run failed', error);
    }
  });

// Configuration check command
program
  .command('validate-config')
  .description('Validate an agent configuration file')
  .option('-c, --config <path>', 'Agent configuration file')
  .action((options: ConfigOptions) => {
    try {
      const config = readConfig(options);

      console.log('✅ Configuration is valid');
      console.log(`  - Instruments: ${config.instruments.map(i => i.id).join(', ')}`);
      console.log(`  - Indicators: ${config.indicators.map(spec => spec.name).join(', ')}`);
      console.log(`  - Rules: ${config.rules.length} (+${Object.keys(config.instrumentRules).length} overrides)`);
      console.log(`  - Lookback: ${config.lookback} bars, cache ${config.cacheCapacity}`);
    } catch (error) {
      reportFailure('Validation failed', error);
    }
  });

/**
 * True when `entry` (normally argv[1]) resolves to this module, including
 * through the symlink npm installs for the `bin` entry.
 */
export function isEntryPoint(entry: string | undefined = process.argv[1]): boolean {
  if (entry === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Parse command line arguments
if (isEntryPoint()) {
  program.parseAsync().catch((error: unknown) => {
    reportFailure('Command failed', error);
  });
}

export { program };
