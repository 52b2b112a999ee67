/**
 * Server entry point
 */

import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app';
import { buildDependencies } from './container';
import type { AppDependencies } from './container';
import { describeError } from './lib/errors';
import { loadConfig, validateConfig } from './lib/env';
import { logger } from './lib/logger';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const shouldStart = !process.env['JEST_WORKER_ID'];

let server: Server | undefined;
let deps: AppDependencies | undefined;

async function start(): Promise<void> {
  const config = validateConfig(loadConfig());
  const w = config.weather;

  const keyed = [
    ['weatherapi', w.weatherApiKey],
    ['openweathermap', w.openWeatherMapKey],
    ['accuweather', w.accuWeatherKey],
  ] as const;
  keyed.forEach(([provider, key]) => {
    if (!key) {
      logger.warn({ provider }, `${provider.toUpperCase()} provider has no API key; skipping it.`);
    }
  });

  deps = await buildDependencies(config, logger);
  const app = createApp(deps);

  server = app.listen(config.server.port, () => {
    logger.info(
      {
        port: config.server.port,
        environment: NODE_ENV,
        nodeVersion: process.version,
        pid: process.pid,
      },
      'Server started successfully'
    );
  });
}

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info({ signal }, 'Received shutdown signal');

  // Forced exit if connections do not drain
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();

  server?.close(() => {
    logger.info('Server closed successfully');
    const closing = deps ? deps.cacheStore.close() : Promise.resolve();
    closing
      .catch((error: unknown) => {
        logger.warn({ error: describeError(error) }, 'Cache store did not close cleanly');
      })
      .finally(() => process.exit(0));
  });
};

if (shouldStart) {
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  start().catch((error: unknown) => {
    logger.error({ error: describeError(error) }, 'Server failed to start');
    process.exit(1);
  });
}
