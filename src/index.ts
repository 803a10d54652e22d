/**
 * Public entry point
 */

export { MetaClient } from './client';
export type { MetaClientOptions } from './client';
export { loadConfig, DEFAULT_CONFIG } from './config';
export { createLogger } from './logging';
export { getMetricsRegistry } from './metrics';
export { StreamConnection } from './transport/connection';
export type { Connection, StreamConnectionOptions } from './transport/connection';
export { encodeCommand, writeCommand } from './core/encoder';
export type { CommandSink } from './core/encoder';
export { negotiateFlags } from './core/flags';
export { NOOP_COMMAND } from './core/pipeliner';
export { createResponseParser, readFrame } from './core/parser';
export type { ResponseParser, ParseResult } from './core/parser';
export { interpretResponse, firstRecord } from './core/interpreter';
export {
  CacheError,
  ValidationError,
  ProtocolError,
  ConflictError,
  MalformedResponseError,
  TransportError,
  ConnectionClosedError,
  ConnectionBrokenError,
  RequestTimeoutError,
  statusToError,
  isCacheError,
} from './core/errors';
export { MAX_KEY_LENGTH, MAX_OPAQUE_LENGTH } from './core/validators';
export type {
  ArithmeticOptions,
  ClientConfig,
  CommandOptions,
  Delta,
  KeyInput,
  MetaCommand,
  MetaRecord,
  MetaResponse,
  OpaqueInput,
  Status,
  StoreMode,
  StoreOptions,
  StoreValue,
  Verb,
} from './core/types';
