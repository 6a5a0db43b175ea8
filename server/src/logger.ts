/**
 * Structured logging with Pino
 *
 * One root logger for the process. Modules take a child through
 * createLogger() so every line carries the module that wrote it.
 */

import pino from 'pino';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),

  // Use pino-pretty in development for human-readable logs
  transport: isDevelopment && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  // Redact credentials that end up in config dumps or request logs
  redact: {
    paths: [
      'password',
      'apiKey',
      'api_key',
      'anthropicApiKey',
      'google.apiKey',
      'connectionString',
      'authorization',
      'req.headers.authorization',
      'req.headers.cookie',
    ],
    censor: '[REDACTED]',
  },

  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: string | Record<string, unknown>): Logger {
  const bindings = typeof context === 'string' ? { module: context } : context;
  return logger.child(bindings);
}
