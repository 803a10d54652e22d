/**
 * Configuration management using environment variables
 */

import { z } from 'zod';
import type { ClientConfig } from './core/types';

const intFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((value) => /^\d+$/.test(value), 'must be a non-negative integer')
    .transform((value) => parseInt(value, 10));

const EnvSchema = z.object({
  MEMCACHE_HOST: z.string().min(1).default('127.0.0.1'),
  MEMCACHE_PORT: intFromEnv('11211').refine(
    (port) => port >= 1 && port <= 65535,
    'must be between 1 and 65535'
  ),
  MEMCACHE_CONNECT_TIMEOUT_MS: intFromEnv('5000').refine((ms) => ms >= 1, 'must be at least 1'),
  MEMCACHE_REQUEST_TIMEOUT_MS: intFromEnv('2000').refine((ms) => ms >= 1, 'must be at least 1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const DEFAULT_CONFIG: ClientConfig = {
  host: '127.0.0.1',
  port: 11211,
  connectTimeoutMs: 5000,
  requestTimeoutMs: 2000,
  logLevel: 'info',
};

/**
 * Load configuration from environment variables with sensible defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${issue?.path.join('.') ?? 'environment'} ${issue?.message ?? 'is invalid'}`);
  }

  return {
    host: result.data.MEMCACHE_HOST,
    port: result.data.MEMCACHE_PORT,
    connectTimeoutMs: result.data.MEMCACHE_CONNECT_TIMEOUT_MS,
    requestTimeoutMs: result.data.MEMCACHE_REQUEST_TIMEOUT_MS,
    logLevel: result.data.LOG_LEVEL,
  };
}
