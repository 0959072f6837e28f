/**
 * Logging with Pino - API keys and the SEC contact header are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'openaiApiKey',
  'secUserAgent',
  'authorization',
  'Authorization',
  'secret',
  'token',
  '*.apiKey',
  'headers.authorization',
  'headers.Authorization',
  'headers["User-Agent"]',
];

const nodeEnv = process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'ticker-resolver' },
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  // Errors are logged under `error` as well as pino's own `err`
  serializers: {
    error: pino.stdSerializers.err,
  },
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,service',
          },
        }
      : undefined,
});

export function createChildLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}
