/**
 * Half-duplex byte transport for meta protocol commands
 */

import * as net from 'net';
import type { Duplex } from 'stream';
import type { Logger } from 'pino';
import type { CommandSink } from '../core/encoder';
import {
  ConnectionBrokenError,
  ConnectionClosedError,
  TransportError,
  RequestTimeoutError,
} from '../core/errors';
import type { ResponseParser } from '../core/parser';
import type { ClientConfig } from '../core/types';

export interface Connection extends CommandSink {
  /** Resolve with the next complete response recognized by the parser */
  read<T>(parser: ResponseParser<T>): Promise<T>;
  close(): Promise<void>;
}

export interface StreamConnectionOptions {
  requestTimeoutMs: number;
  logger: Logger;
}

interface PendingRead {
  /** Try to complete the read from the buffered bytes; true once settled */
  drive: () => boolean;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Connection over a duplex stream, usually a TCP socket.
 *
 * After a timeout, a malformed response or any stream failure the connection is
 * broken: bytes may be missing or unread, so every later call is refused.
 */
export class StreamConnection implements Connection {
  private readonly stream: Duplex;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private outbound: Buffer[] = [];
  private inbound: Buffer = Buffer.alloc(0);
  private pending: PendingRead | undefined;
  private broken = false;

  constructor(stream: Duplex, options: StreamConnectionOptions) {
    this.stream = stream;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger;

    this.stream.on('data', (chunk: Buffer) => {
      this.inbound = this.inbound.length > 0 ? Buffer.concat([this.inbound, chunk]) : chunk;
      this.drain();
    });
    this.stream.on('error', (err: Error) => {
      this.fail(new TransportError(`Socket error: ${err.message}`, err));
    });
    this.stream.on('close', () => {
      this.fail(new ConnectionClosedError());
    });
  }

  /**
   * Open a TCP connection to a memcached server
   */
  static connect(
    config: Pick<ClientConfig, 'host' | 'port' | 'connectTimeoutMs' | 'requestTimeoutMs'>,
    logger: Logger
  ): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: config.host, port: config.port });
      socket.setNoDelay(true);

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new TransportError(`Connect timeout after ${config.connectTimeoutMs}ms`, undefined, 'TIMEOUT'));
      }, config.connectTimeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(new TransportError(`Failed to connect to ${config.host}:${config.port}`, err));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        logger.debug({ host: config.host, port: config.port }, 'Connected');
        resolve(new StreamConnection(socket, { requestTimeoutMs: config.requestTimeoutMs, logger }));
      });
    });
  }

  get isBroken(): boolean {
    return this.broken;
  }

  write(chunk: Buffer): void {
    if (this.broken) {
      throw new ConnectionBrokenError();
    }
    this.outbound.push(chunk);
  }

  flush(): Promise<void> {
    if (this.broken) {
      return Promise.reject(new ConnectionBrokenError());
    }
    if (this.outbound.length === 0) {
      return Promise.resolve();
    }

    const data = this.outbound.length === 1 ? this.outbound[0] : Buffer.concat(this.outbound);
    this.outbound = [];

    return new Promise((resolve, reject) => {
      this.stream.write(data, (err) => {
        if (err) {
          const error = new TransportError(`Write failed: ${err.message}`, err);
          this.fail(error);
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  read<T>(parser: ResponseParser<T>): Promise<T> {
    if (this.broken) {
      return Promise.reject(new ConnectionBrokenError());
    }
    if (this.pending) {
      // Usage error; the pending read is left intact
      return Promise.reject(new TransportError('A read is already in progress on this connection'));
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        this.logger.warn({ timeoutMs: this.requestTimeoutMs }, 'Read timed out, dropping connection');
        this.invalidate();
        reject(new RequestTimeoutError(this.requestTimeoutMs));
      }, this.requestTimeoutMs);

      this.pending = {
        drive: () => {
          const result = parser(this.inbound);
          if (result === null) {
            return false;
          }
          this.inbound = this.inbound.subarray(result.bytesConsumed);
          resolve(result.value);
          return true;
        },
        reject,
        timer,
      };

      this.drain();
    });
  }

  close(): Promise<void> {
    this.fail(new ConnectionClosedError());
    if (this.stream.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stream.end(() => {
        this.stream.destroy();
        resolve();
      });
    });
  }

  private drain(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    try {
      if (!pending.drive()) {
        return;
      }
    } catch (err) {
      // The stream position is unknown after a grammar error
      this.pending = undefined;
      clearTimeout(pending.timer);
      this.invalidate();
      pending.reject(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    this.pending = undefined;
    clearTimeout(pending.timer);
  }

  private fail(error: TransportError): void {
    if (!this.broken) {
      this.logger.debug({ err: error }, 'Connection broken');
    }
    this.broken = true;
    this.outbound = [];

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.reject(error);
    }
  }

  private invalidate(): void {
    this.broken = true;
    this.outbound = [];
    this.stream.destroy();
  }
}
