import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel } from '../config/env.js';

export type { Logger };

export type CreateLoggerOptions = Readonly<{
  service: string;
  level: LogLevel;
}>;

/**
 * JSON-lines logger for CloudWatch. Secrets are censored wherever they may
 * appear in a log context.
 */
export function createLogger(options: CreateLoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: options.level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: { service: options.service },
    redact: {
      paths: [
        'apiKey',
        'brazeApiKey',
        'headers.Authorization',
        'headers.authorization',
        '*.apiKey',
        '*.brazeApiKey',
        '*.headers.Authorization',
        '*.headers.authorization',
      ],
      censor: '[REDACTED]',
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  return destination ? pino(config, destination) : pino(config);
}
