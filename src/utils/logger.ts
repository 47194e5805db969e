import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Email addresses and secrets are redacted from logged objects
 */
export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['email', '*.email', '*.password', '*.token', '*.secret', '*.authorization'],
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
