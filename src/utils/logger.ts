/**
 * Structured logging with pino
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
const pretty = process.env.LOG_PRETTY === 'true';

const options: LoggerOptions = {
  level,
  base: { service: 'self-correcting-rag' },
  formatters: {
    level: (label) => ({ severity: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['apiKey', '*.apiKey', 'authorization', '*.authorization'],
    censor: '[REDACTED]',
  },
};

// Logs go to stderr so the MCP stdio transport keeps stdout to itself
export const logger: Logger = pretty
  ? pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss', destination: 2, singleLine: true },
      })
    )
  : pino(options, pino.destination(2));

/**
 * Child logger tagged with a component name
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
