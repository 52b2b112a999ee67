import pino from 'pino';
import type { Logger } from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const level = process.env['LOG_LEVEL'] || 'info';

const enablePretty =
  process.env['LOG_PRETTY'] === '1' ||
  (nodeEnv !== 'production' && nodeEnv !== 'test' && process.stdout.isTTY);

let logger: Logger;

if (enablePretty) {
  try {
    logger = pino({
      level,
      transport: {
        // optional dependency; may not be installed
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    // Fallback if pino-pretty is not installed or cannot be resolved
    logger = pino({ level });
  }
} else {
  logger = pino({ level });
}

/**
 * Logger for provider request/response events. With a file path the events
 * are written to stdout and appended to that file.
 */
export function createProviderEventLogger(base: Logger, filePath?: string): Logger {
  if (!filePath) {
    return base.child({ component: 'weather-providers' });
  }

  // multistream entries default to `info`, which covers every provider event
  const streams = pino.multistream([
    { stream: process.stdout },
    { stream: pino.destination({ dest: filePath, mkdir: true, sync: false }) },
  ]);

  return pino({ level: base.level, base: { component: 'weather-providers' } }, streams);
}

export type { Logger };
export { logger };
