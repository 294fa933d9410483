import pino, { type Logger } from 'pino';
import { logSerializers } from './log-sanitizer.js';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Structured logger using pino
 *
 * - ISO timestamps
 * - level rendered as a label
 * - serializers hash owner ids and mask contact details
 * - pino-pretty transport when `pretty` is set (development)
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: logSerializers,
    redact: {
      paths: ['*.password', '*.token', '*.secret', '*.apiKey', 'contact.phone', 'contact.email'],
      censor: '[REDACTED]',
    },
    ...(options.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true },
          },
        }
      : {}),
  });
}
