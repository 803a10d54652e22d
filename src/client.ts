/**
 * Meta protocol client: one connection, one request in flight at a time
 */

import type { Logger } from 'pino';
import { DEFAULT_CONFIG } from './config';
import { verbFamily, writeCommand } from './core/encoder';
import { interpretResponse } from './core/interpreter';
import { createResponseParser } from './core/parser';
import type {
  ArithmeticOptions,
  ClientConfig,
  CommandOptions,
  KeyInput,
  MetaCommand,
  MetaRecord,
  StoreOptions,
  StoreValue,
} from './core/types';
import { createClientLogger, createLogger, logMetaOperation } from './logging';
import { recordBytesWritten, recordCommand } from './metrics';
import { StreamConnection } from './transport/connection';
import type { Connection } from './transport/connection';

export interface MetaClientOptions {
  logger?: Logger;
}

export class MetaClient {
  private readonly connection: Connection;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(connection: Connection, options: MetaClientOptions = {}) {
    this.connection = connection;
    this.logger = options.logger ?? createClientLogger(createLogger({ logLevel: 'silent' }));
  }

  /**
   * Connect to a server and wrap the connection in a client
   */
  static async connect(config: Partial<ClientConfig> = {}): Promise<MetaClient> {
    const resolved: ClientConfig = { ...DEFAULT_CONFIG, ...config };
    const logger = createClientLogger(createLogger(resolved), `${resolved.host}:${resolved.port}`);
    const connection = await StreamConnection.connect(resolved, logger);
    return new MetaClient(connection, { logger });
  }

  /**
   * Fetch an item. Resolves to undefined on a miss or when no return flags were requested.
   */
  get(key: KeyInput, options: CommandOptions = {}): Promise<MetaRecord | undefined> {
    return this.execute({ verb: 'fetch', key, ...options });
  }

  set(key: KeyInput, value: StoreValue, options: StoreOptions = {}): Promise<MetaRecord | undefined> {
    return this.execute({ verb: 'store', key, value, ...options });
  }

  /**
   * Delete an item. A CAS mismatch rejects with ConflictError.
   */
  delete(key: KeyInput, options: CommandOptions = {}): Promise<MetaRecord | undefined> {
    return this.execute({ verb: 'remove', key, ...options });
  }

  increment(key: KeyInput, options: ArithmeticOptions = {}): Promise<MetaRecord | undefined> {
    return this.execute({ verb: 'increment', key, ...options });
  }

  decrement(key: KeyInput, options: ArithmeticOptions = {}): Promise<MetaRecord | undefined> {
    return this.execute({ verb: 'decrement', key, ...options });
  }

  /**
   * Run one command. Calls are queued so a command is written only after the
   * previous one has consumed its whole response.
   */
  execute(command: MetaCommand): Promise<MetaRecord | undefined> {
    const run = this.tail.then(
      () => this.run(command),
      () => this.run(command)
    );
    this.tail = run.catch(() => undefined);
    return run;
  }

  close(): Promise<void> {
    return this.connection.close();
  }

  private async run(command: MetaCommand): Promise<MetaRecord | undefined> {
    const quiet = command.quiet ?? false;
    const keyLabel = typeof command.key === 'string' ? command.key : Buffer.from(command.key).toString('utf8');
    const start = Date.now();

    try {
      const bytes = await writeCommand(this.connection, command);
      recordBytesWritten(command.verb, bytes, quiet);

      const response = await this.connection.read(createResponseParser(verbFamily(command.verb), quiet));
      const record = interpretResponse(command.verb, response);

      const latencyMs = Date.now() - start;
      const outcome = record === undefined ? 'empty' : 'hit';
      logMetaOperation(this.logger, command.verb, keyLabel, quiet, latencyMs, outcome);
      recordCommand(command.verb, outcome, latencyMs / 1000);
      return record;
    } catch (error) {
      const latencyMs = Date.now() - start;
      const err = error instanceof Error ? error : new Error(String(error));
      logMetaOperation(this.logger, command.verb, keyLabel, quiet, latencyMs, 'error', err);
      recordCommand(command.verb, 'error', latencyMs / 1000);
      throw error;
    }
  }
}
