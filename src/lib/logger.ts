/**
 * Structured logging
 *
 * JSON lines in production and under tests, pino-pretty in development.
 * Credentials are redacted wherever they appear in a logged object.
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const isDevelopment = env !== 'production' && env !== 'test';
const logLevel = process.env.LOG_LEVEL || (env === 'production' ? 'info' : 'debug');

const REDACT_PATHS = [
  'clientSecret',
  'client_secret',
  'accessToken',
  'access_token',
  'botToken',
  '*.clientSecret',
  '*.client_secret',
  '*.access_token',
  '*.botToken',
  'headers.authorization',
];

const baseLogger = pino({
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  }),
});

type Logger = pino.Logger;

export function createLogger(namespace: string): Logger {
  return baseLogger.child({ namespace });
}

export type { Logger };
