#!/usr/bin/env npx tsx
/**
 * Entry point for the battle-log monitor
 *
 * Polls every monitored player's battle log, keeps per-subject statistics
 * and rivals, prints a notification for each new battle and serves the
 * HTTP command surface.
 *
 * Usage:
 *   npx tsx src/run-battle-monitor.ts [--data-dir /path] [--port 3000] [--add TAG ...]
 *
 * Environment: see .env.example (BATTLE_API_KEY is required).
 */

import dotenv from 'dotenv';
import { loadMonitorConfig, openStateStore } from './config';
import { ApiServer } from './services/ApiServer';
import { BattleApiClient } from './services/BattleApiClient';
import { BattleMonitor } from './services/BattleMonitor';
import { ConsoleNotifier } from './services/ConsoleNotifier';
import { Logger, configureLogging } from './services/Logger';
import { RateLimiter } from './services/RateLimiter';
import { MonitorError } from './types/errors';

dotenv.config();

const logger = new Logger('Main');

function printHelp(): void {
  console.log(`
Battle Log Monitor

Usage:
  npx tsx src/run-battle-monitor.ts [options]

Options:
  --data-dir, -d <PATH>   Data directory (overrides DATA_DIR). Default: ./data
  --port, -p <PORT>       HTTP port (overrides API_PORT). Default: 3000
  --add <TAG>             Start monitoring TAG on launch (repeatable)
  --help, -h              Show this help

Output:
  State: <data-dir>/monitor.db (or <data-dir>/subjects/*.json with STATE_BACKEND=json)
  Logs:  <data-dir>/logs/monitor.log
  `);
}

async function main() {
  const args = process.argv.slice(2);
  const env = { ...process.env };
  const addTags: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if ((arg === '--data-dir' || arg === '-d') && value) {
      env.DATA_DIR = value;
      i++;
    } else if ((arg === '--port' || arg === '-p') && value) {
      env.API_PORT = value;
      i++;
    } else if (arg === '--add' && value) {
      addTags.push(value);
      i++;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    }
  }

  const config = loadMonitorConfig(env);
  configureLogging({ level: config.logLevel, logFile: config.logFile });

  if (!config.apiKey) {
    logger.error('Missing BATTLE_API_KEY');
    process.exit(1);
  }

  logger.info('Starting battle log monitor...');
  logger.info(`Data directory: ${config.dataDir} (${config.stateBackend} state)`);
  logger.info(
    `Poll every ${config.scheduler.pollIntervalMs / 1000}s, ` +
      `${config.rateLimit.maxRequestsPerWindow} requests per ${config.rateLimit.windowMs / 1000}s, ` +
      `${config.rateLimit.minIntervalMs}ms between requests`,
  );

  const store = openStateStore(config);
  const limiter = new RateLimiter(config.rateLimit);
  const api = new BattleApiClient({ apiKey: config.apiKey, baseUrl: config.apiUrl });
  const monitor = new BattleMonitor(api, store, limiter, config.scheduler);
  const notifier = new ConsoleNotifier();
  notifier.attach(monitor);

  monitor.start();

  for (const tag of addTags) {
    try {
      const subject = await monitor.startMonitoring(tag);
      logger.info(`Added ${subject.name} (#${subject.tag})`);
    } catch (err) {
      if (err instanceof MonitorError && err.kind === 'AlreadyMonitored') {
        logger.info(`#${err.tag} already monitored`);
        continue;
      }
      logger.error(`Could not add ${tag}`, err);
    }
  }

  const server = new ApiServer(monitor, config.apiPort, config.serverApiKey);
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);
    notifier.detach();
    await server.stop();
    await monitor.stop();
    store.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM']) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.error('Fatal error', err);
  process.exit(1);
});
