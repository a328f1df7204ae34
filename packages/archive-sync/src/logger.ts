import pino from 'pino';

export type Logger = pino.Logger;

/** Logs go to stderr; stdout carries the output of the list and pending modes. */
export function createLogger(): Logger {
  return pino({
    level: process.env['LOG_LEVEL'] ?? 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'clientSecret',
        '*.clientSecret',
        'offlineToken',
        '*.offlineToken',
        'accessToken',
        '*.accessToken',
        'token',
        '*.token',
        'authorization',
        '*.authorization',
      ],
      remove: true,
    },
  }, pino.destination(2));
}
