/**
 * Logging with Pino - credentials and connection strings are redacted
 */

import pino from 'pino';

const redactPaths = [
  'password',
  'secret',
  'token',
  'connectionString',
  'connection_string',
  'credentials',
  '*.password',
  '*.connectionString',
  'source.password',
];

const nodeEnv = process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}

export type Logger = ReturnType<typeof createChildLogger>;
