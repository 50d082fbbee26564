/**
 * Logging with Pino
 * Pretty output in development; JSON lines everywhere else so runs can be piped into a collector.
 */

import pino, { type Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';

export const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
];

export const REDACT_CENSOR = '[REDACTED]';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'watchlist-scoring' },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Runner and loaders log failures as { error }
  serializers: {
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: REDACT_PATHS,
    censor: REDACT_CENSOR,
  },
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,service',
          },
        }
      : undefined,
});

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
