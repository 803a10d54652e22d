/**
 * Prometheus metrics for meta protocol commands
 *
 * Metrics live in their own registry so the host application decides whether
 * and where to expose them.
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { Verb } from './core/types';
import type { OperationOutcome } from './logging';

const registry = new Registry();

export const commandsTotal = new Counter({
  name: 'memcache_meta_commands_total',
  help: 'Total number of meta commands by outcome',
  labelNames: ['verb', 'outcome'],
  registers: [registry],
});

export const commandDurationSeconds = new Histogram({
  name: 'memcache_meta_command_duration_seconds',
  help: 'Meta command round-trip duration in seconds',
  labelNames: ['verb'],
  buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

export const bytesWrittenTotal = new Counter({
  name: 'memcache_meta_bytes_written_total',
  help: 'Total bytes written for meta commands, sentinels included',
  labelNames: ['verb'],
  registers: [registry],
});

export const quietSentinelsTotal = new Counter({
  name: 'memcache_meta_quiet_sentinels_total',
  help: 'Total number of no-op sentinels appended to quiet commands',
  labelNames: ['verb'],
  registers: [registry],
});

/**
 * Record a completed meta command
 */
export function recordCommand(verb: Verb, outcome: OperationOutcome, durationSeconds: number) {
  commandsTotal.labels(verb, outcome).inc();
  commandDurationSeconds.labels(verb).observe(durationSeconds);
}

/**
 * Record bytes handed to the connection
 */
export function recordBytesWritten(verb: Verb, bytes: number, quiet: boolean) {
  bytesWrittenTotal.labels(verb).inc(bytes);
  if (quiet) {
    quietSentinelsTotal.labels(verb).inc();
  }
}

/**
 * Get the registry holding the client metrics
 */
export function getMetricsRegistry() {
  return registry;
}
