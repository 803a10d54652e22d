/**
 * Tests for the stream connection over an in-process duplex
 */

import { Duplex } from 'stream';
import { afterEach, describe, expect, it } from 'vitest';
import {
  ConnectionBrokenError,
  ConnectionClosedError,
  MalformedResponseError,
  RequestTimeoutError,
  TransportError,
  isCacheError,
} from '../src/core/errors.js';
import { createResponseParser } from '../src/core/parser.js';
import { createLogger } from '../src/logging.js';
import { StreamConnection } from '../src/transport/connection.js';

const logger = createLogger({ logLevel: 'silent' });

interface FakeSocket {
  stream: Duplex;
  written: Buffer[];
}

function fakeSocket(writeError?: Error): FakeSocket {
  const written: Buffer[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback(writeError);
    },
  });
  return { stream, written };
}

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('StreamConnection', () => {
  let socket: FakeSocket;

  afterEach(() => {
    socket.stream.destroy();
  });

  it('should hold writes until flush', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    connection.write(Buffer.from('ms foo 3\r\n'));
    connection.write(Buffer.from('bar\r\n'));
    expect(socket.written).toHaveLength(0);

    await connection.flush();

    expect(socket.written).toHaveLength(1);
    expect(socket.written[0]?.toString()).toBe('ms foo 3\r\nbar\r\n');
  });

  it('should resolve a flush with nothing staged', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    await expect(connection.flush()).resolves.toBeUndefined();
    expect(socket.written).toHaveLength(0);
  });

  it('should assemble a response split across chunks', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const response = connection.read(createResponseParser('fetch', false));
    socket.stream.push(Buffer.from('VA 3 s3\r\nba'));
    await tick();
    socket.stream.push(Buffer.from('r\r\n'));

    await expect(response).resolves.toEqual({
      kind: 'data',
      records: [{ data: Buffer.from('bar'), size: 3 }],
    });
  });

  it('should serve a read from bytes that arrived earlier', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    socket.stream.push(Buffer.from('HD\r\n'));
    await tick();

    await expect(connection.read(createResponseParser('store', false))).resolves.toEqual({
      kind: 'status',
      status: 'stored',
    });
  });

  it('should keep bytes past a response for the next read', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const first = connection.read(createResponseParser('remove', false));
    socket.stream.push(Buffer.from('HD\r\nEN\r\n'));

    await expect(first).resolves.toEqual({ kind: 'status', status: 'deleted' });
    await expect(connection.read(createResponseParser('fetch', false))).resolves.toEqual({
      kind: 'status',
      status: 'not-found',
    });
  });

  it('should wait for the sentinel of a quiet exchange', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const response = connection.read(createResponseParser('arithmetic', true));
    socket.stream.push(Buffer.from('NF\r\n'));
    await tick();
    socket.stream.push(Buffer.from('MN\r\n'));

    await expect(response).resolves.toEqual({ kind: 'status', status: 'not-found' });
  });

  it('should break the connection on a read timeout', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 20, logger });

    const error = await connection.read(createResponseParser('fetch', false)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toMatchObject({ code: 'TIMEOUT', message: 'Request timeout after 20ms' });
    expect(connection.isBroken).toBe(true);
    expect(() => connection.write(Buffer.from('mn\r\n'))).toThrow(ConnectionBrokenError);
    await expect(connection.flush()).rejects.toThrow(ConnectionBrokenError);
  });

  it('should break the connection on a malformed response', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const response = connection.read(createResponseParser('fetch', false));
    socket.stream.push(Buffer.from('BOGUS\r\n'));

    await expect(response).rejects.toThrow(MalformedResponseError);
    expect(connection.isBroken).toBe(true);
    await expect(connection.read(createResponseParser('fetch', false))).rejects.toThrow(
      ConnectionBrokenError
    );
  });

  it('should reject a pending read when the peer goes away', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const response = connection.read(createResponseParser('fetch', false));
    socket.stream.destroy();

    await expect(response).rejects.toThrow(ConnectionClosedError);
    expect(connection.isBroken).toBe(true);
  });

  it('should wrap stream errors', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const response = connection.read(createResponseParser('fetch', false));
    socket.stream.destroy(new Error('boom'));

    const error = await response.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'TRANSPORT', message: 'Socket error: boom' });
  });

  it('should reject a flush the stream cannot write', async () => {
    socket = fakeSocket(new Error('disk full'));
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });
    socket.stream.on('error', () => undefined);

    connection.write(Buffer.from('mg foo\r\n'));

    await expect(connection.flush()).rejects.toThrow('Write failed: disk full');
    expect(connection.isBroken).toBe(true);
  });

  it('should refuse a second read while one is pending', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    const first = connection.read(createResponseParser('fetch', false));
    const error = await connection.read(createResponseParser('fetch', false)).catch((err: unknown) => err);

    expect(isCacheError(error)).toBe(true);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      code: 'TRANSPORT',
      message: 'A read is already in progress on this connection',
    });
    expect(connection.isBroken).toBe(false);

    socket.stream.push(Buffer.from('EN\r\n'));
    await expect(first).resolves.toEqual({ kind: 'status', status: 'not-found' });
  });

  it('should refuse calls after close', async () => {
    socket = fakeSocket();
    const connection = new StreamConnection(socket.stream, { requestTimeoutMs: 1000, logger });

    await connection.close();

    expect(connection.isBroken).toBe(true);
    expect(socket.stream.destroyed).toBe(true);
    await expect(connection.read(createResponseParser('fetch', false))).rejects.toThrow(
      ConnectionBrokenError
    );
  });
});
