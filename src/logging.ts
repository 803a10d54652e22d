/**
 * Structured logging with Pino
 * Every client gets a child logger carrying its own id
 */

import pino from 'pino';
import { ulid } from 'ulid';
import type { ClientConfig, Verb } from './core/types';

/**
 * Create the main library logger
 */
export function createLogger(config: Pick<ClientConfig, 'logLevel'>) {
  return pino({
    level: config.logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['value', '*.value'],
      censor: '[REDACTED]',
    },
  });
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: pino.Logger, context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Child logger for one client instance
 */
export function createClientLogger(logger: pino.Logger, endpoint?: string) {
  return createChildLogger(logger, { clientId: ulid(), endpoint });
}

export type OperationOutcome = 'hit' | 'empty' | 'error';

/**
 * Log a meta command with its latency
 */
export function logMetaOperation(
  logger: pino.Logger,
  verb: Verb,
  key: string,
  quiet: boolean,
  latencyMs: number,
  outcome: OperationOutcome,
  error?: Error
) {
  const entry = {
    verb,
    key: key.length > 50 ? `${key.substring(0, 50)}...` : key, // Truncate long keys
    quiet,
    latencyMs,
    outcome,
    error: error?.message,
  };

  if (outcome === 'error') {
    logger.warn(entry, `Meta ${verb} failed`);
    return;
  }
  logger.debug(entry, `Meta ${verb} succeeded`);
}
