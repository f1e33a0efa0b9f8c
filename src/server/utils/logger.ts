import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the log level from LOG_LEVEL, falling back to an environment default
 */
export function resolveLogLevel(nodeEnv: string | undefined, configured: string | undefined): LevelWithSilent {
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV;
  const isDevelopment = nodeEnv !== 'production' && nodeEnv !== 'test';

  return pino({
    level: resolveLogLevel(nodeEnv, process.env.LOG_LEVEL),
    base: {
      env: nodeEnv || 'development',
      service: 'dfe-harvester',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

