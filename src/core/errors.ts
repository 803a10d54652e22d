/**
 * Error handling utilities and custom error classes
 */

import type { Status } from './types';

export type ErrorCode =
  | 'VALIDATION'
  | 'PROTOCOL'
  | 'CONFLICT'
  | 'MALFORMED_RESPONSE'
  | 'TRANSPORT'
  | 'TIMEOUT';

export interface ErrorDetails {
  [key: string]: unknown;
}

export class CacheError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CacheError';
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

/**
 * Rejected input; raised before anything reaches the connection
 */
export class ValidationError extends CacheError {
  constructor(message: string, details?: ErrorDetails) {
    super('VALIDATION', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * The server answered with a status outside the success set of the command
 */
export class ProtocolError extends CacheError {
  public readonly status: Status;

  constructor(status: Status, message?: string, code: ErrorCode = 'PROTOCOL') {
    super(code, message ?? `Unexpected status: ${status}`, { status });
    this.name = 'ProtocolError';
    this.status = status;
  }
}

/**
 * Delete refused because the item changed since its CAS value was read
 */
export class ConflictError extends ProtocolError {
  constructor(message: string = 'Item exists with a different CAS value') {
    super('exists', message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class MalformedResponseError extends CacheError {
  constructor(message: string, details?: ErrorDetails) {
    super('MALFORMED_RESPONSE', message, details);
    this.name = 'MalformedResponseError';
  }
}

/**
 * The connection failed; it must not be reused afterwards
 */
export class TransportError extends CacheError {
  constructor(message: string, cause?: unknown, code: ErrorCode = 'TRANSPORT') {
    super(code, message, undefined, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
  }
}

export class ConnectionClosedError extends TransportError {
  constructor(cause?: unknown) {
    super('Connection closed', cause);
    this.name = 'ConnectionClosedError';
  }
}

export class ConnectionBrokenError extends TransportError {
  constructor() {
    super('Connection is no longer usable; open a new one');
    this.name = 'ConnectionBrokenError';
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`, undefined, 'TIMEOUT');
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Convert a status outside the success set into a domain error
 */
export function statusToError(status: Status, message?: string): ProtocolError {
  switch (status) {
    case 'not-stored':
      return new ProtocolError(status, 'Item not stored');
    case 'exists':
      return new ProtocolError(status, 'Item exists with a different CAS value');
    case 'not-found':
      return new ProtocolError(status, 'Item not found');
    case 'client-error':
      return new ProtocolError(status, `Client error: ${message ?? 'unknown'}`);
    case 'server-error':
      return new ProtocolError(status, `Server error: ${message ?? 'unknown'}`);
    case 'error':
      return new ProtocolError(status, 'Server does not understand the command');
    default:
      return new ProtocolError(status);
  }
}

/**
 * Check if an error is a CacheError
 */
export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}
