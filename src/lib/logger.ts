/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Logs go to stderr: stdout belongs to the commands
 * the launcher hands off to.
 */

import pino from 'pino';
import type { LogFormat, LogLevel } from '../config/types';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  name?: string;
  /** Write here instead of stderr */
  destination?: pino.DestinationStream;
}

/**
 * Create a Pino logger with sensible defaults for the launcher
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name ?? 'container-run',
    level: options.level ?? 'info',
    redact: {
      paths: ['*.password', '*.token', '*.secret'],
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }

  if (options.format === 'pretty') {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(loggerOptions, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.debug(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },
  };
}
