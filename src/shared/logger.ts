import pino, { type LoggerOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env['RAGSYNC_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'info',
  redact: {
    paths: [
      'api_key',
      'apiKey',
      'password',
      'secret',
      '*.api_key',
      '*.apiKey',
      '*.password',
      'headers.Authorization',
      'headers.authorization',
    ],
    censor: '***REDACTED***',
  },
};

// Logs go to stderr so command output on stdout stays pipeable
export const logger =
  process.env['NODE_ENV'] === 'production'
    ? pino(options, pino.destination(2))
    : pino({
        ...options,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      });
