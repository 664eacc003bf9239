/**
 * Centralized logging service using Pino
 * Writes to stderr so CLI output on stdout stays clean
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { parseEnv, type Env } from '../config/env.js';

export type LogLevel = Env['LOG_LEVEL'];

// Lazy logger initialization to avoid reading the environment at import time
let loggerInstance: Logger | null = null;

const STDERR = 2;

// Most verbose first; 'silent' enables nothing
const LEVEL_ORDER: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Whether a message at `level` passes the `configured` threshold
 *
 * @example
 * isLevelEnabled('info', 'debug') // false
 * isLevelEnabled('debug', 'error') // true
 */
export function isLevelEnabled(configured: LogLevel, level: LogLevel): boolean {
  if (configured === 'silent' || level === 'silent') return false;
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(configured);
}

/**
 * Builds a pino logger for the given environment
 * Errors under `err` or `error` are serialized with message and stack.
 * @param destination - Overrides stderr (pretty output is skipped when set)
 */
export function createLogger(
  env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>,
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (env.NODE_ENV === 'production') {
    return pino(options, pino.destination(STDERR));
  }

  return pino({
    ...options,
    // Use pino-pretty in development for human-readable output
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    },
  });
}

/**
 * Gets or creates the logger instance
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger(parseEnv());
  }

  return loggerInstance;
}

export function debug(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.debug(context, message);
  } else {
    logger.debug(message);
  }
}

/**
 * Log an ERROR message with optional context
 * @param message - Log message
 * @param context - Optional context object (pass a thrown value as `err`)
 */
export function error(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.error(context, message);
  } else {
    logger.error(message);
  }
}
