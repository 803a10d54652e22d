/**
 * Core type definitions for the meta protocol client
 */

/** Cache key; strings are sent as UTF-8 */
export type KeyInput = string | Uint8Array;

/** Client-chosen correlation token echoed back by the server */
export type OpaqueInput = string | Uint8Array;

/** Arithmetic step, an unsigned 64-bit integer */
export type Delta = number | bigint;

export type StoreValue = string | Uint8Array | number | bigint;

export type StoreMode = 'set' | 'add' | 'replace' | 'append' | 'prepend';

export type Verb = 'fetch' | 'store' | 'remove' | 'increment' | 'decrement';

/** Response grammar shared by increment and decrement */
export type VerbFamily = 'fetch' | 'store' | 'remove' | 'arithmetic';

export type Status =
  | 'stored'
  | 'not-stored'
  | 'deleted'
  | 'exists'
  | 'not-found'
  | 'no-op'
  | 'error'
  | 'client-error'
  | 'server-error';

/**
 * Metadata and data returned by the server for one request.
 * Only the fields whose return flags were requested are populated.
 */
export interface MetaRecord {
  data?: Buffer;
  size?: number;
  cas?: bigint;
  clientFlags?: number;
  /** Remaining TTL in seconds, -1 when the item never expires */
  ttl?: number;
  lastAccessed?: number;
  hitBefore?: boolean;
  /** Raw bytes as echoed by the server */
  key?: Buffer;
  base64Key?: boolean;
  /** Raw bytes as echoed, comparable to the opaque sent */
  opaque?: Buffer;
  isRecacheWinner?: boolean;
  isStale?: boolean;
  isRecacheOwned?: boolean;
}

export type MetaResponse =
  | { kind: 'status'; status: Status; message?: string }
  | { kind: 'data'; records: MetaRecord[] };

export interface CommandOptions {
  /** Ask the server to stay silent on uninteresting outcomes */
  quiet?: boolean;
  opaque?: OpaqueInput;
  /** Free-form meta flags such as `v`, `t`, `N60` */
  flags?: readonly string[];
}

export interface StoreOptions extends CommandOptions {
  mode?: StoreMode;
}

export interface ArithmeticOptions extends CommandOptions {
  delta?: Delta;
}

interface CommandBase extends CommandOptions {
  key: KeyInput;
}

export type MetaCommand =
  | ({ verb: 'fetch' } & CommandBase)
  | ({ verb: 'store'; value: StoreValue; mode?: StoreMode } & CommandBase)
  | ({ verb: 'remove' } & CommandBase)
  | ({ verb: 'increment'; delta?: Delta } & CommandBase)
  | ({ verb: 'decrement'; delta?: Delta } & CommandBase);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ClientConfig {
  host: string;
  port: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}
