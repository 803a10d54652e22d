/**
 * Meta protocol response parsing
 *
 * Parsers are pure functions over the bytes received so far: they return null
 * while a response is incomplete and report how many bytes a complete one used.
 */

import { MalformedResponseError } from './errors';
import type { MetaRecord, MetaResponse, Status, VerbFamily } from './types';

export const MAX_LINE_LENGTH = 8192;

const CRLF = Buffer.from('\r\n', 'ascii');

export interface ResponseFrame {
  code: string;
  tokens: string[];
  data?: Buffer;
}

export interface ParseResult<T> {
  value: T;
  bytesConsumed: number;
}

export type ResponseParser<T> = (buffer: Buffer) => ParseResult<T> | null;

/**
 * Read one response line, plus its data block for `VA`
 */
export function readFrame(buffer: Buffer, offset = 0): { frame: ResponseFrame; next: number } | null {
  const lineEnd = buffer.indexOf(CRLF, offset);
  if (lineEnd === -1) {
    if (buffer.length - offset > MAX_LINE_LENGTH) {
      throw new MalformedResponseError(`Response line exceeds ${MAX_LINE_LENGTH} bytes`);
    }
    return null;
  }

  // latin1 maps each byte to one char, so binary keys and opaques survive the split
  const [code, ...tokens] = buffer
    .toString('latin1', offset, lineEnd)
    .split(' ')
    .filter((part) => part.length > 0);
  if (code === undefined) {
    throw new MalformedResponseError('Empty response line');
  }

  const next = lineEnd + CRLF.length;
  if (code !== 'VA') {
    return { frame: { code, tokens }, next };
  }

  const sizeToken = tokens.shift();
  if (sizeToken === undefined || !/^\d+$/.test(sizeToken)) {
    throw new MalformedResponseError('VA response without a valid data length', { sizeToken });
  }
  const size = Number(sizeToken);
  const end = next + size;
  if (buffer.length < end + CRLF.length) {
    return null;
  }
  if (buffer[end] !== 0x0d || buffer[end + 1] !== 0x0a) {
    throw new MalformedResponseError('Data block is not terminated by CRLF', { size });
  }

  // Copy out so the record does not pin the connection buffer
  const data = Buffer.from(buffer.subarray(next, end));
  return { frame: { code, tokens, data }, next: end + CRLF.length };
}

function parseIntToken(token: string): number {
  const value = token.slice(1);
  if (!/^-?\d+$/.test(value)) {
    throw new MalformedResponseError(`Invalid numeric flag: ${token}`);
  }
  return Number(value);
}

function tokenBytes(token: string): Buffer {
  return Buffer.from(token.slice(1), 'latin1');
}

// Server messages are text
function messageText(tokens: readonly string[]): string {
  return Buffer.from(tokens.join(' '), 'latin1').toString('utf8');
}

/**
 * Decode return flags into a sparse record
 */
export function decodeRecord(tokens: readonly string[], data?: Buffer): MetaRecord {
  const record: MetaRecord = {};
  if (data !== undefined) {
    record.data = data;
  }

  for (const token of tokens) {
    switch (token[0]) {
      case 'b':
        record.base64Key = true;
        break;
      case 'c':
        if (!/^\d+$/.test(token.slice(1))) {
          throw new MalformedResponseError(`Invalid CAS flag: ${token}`);
        }
        record.cas = BigInt(token.slice(1));
        break;
      case 'f':
        record.clientFlags = parseIntToken(token);
        break;
      case 'h':
        record.hitBefore = token.slice(1) === '1';
        break;
      case 'k':
        record.key = tokenBytes(token);
        break;
      case 'l':
        record.lastAccessed = parseIntToken(token);
        break;
      case 'O':
        record.opaque = tokenBytes(token);
        break;
      case 's':
        record.size = parseIntToken(token);
        break;
      case 't':
        record.ttl = parseIntToken(token);
        break;
      case 'W':
        record.isRecacheWinner = true;
        break;
      case 'X':
        record.isStale = true;
        break;
      case 'Z':
        record.isRecacheOwned = true;
        break;
      default:
        // Unknown flags from newer servers are ignored
        break;
    }
  }

  return record;
}

// Status reported by a bare `HD`; fetch has none, a fetch hit is always a record
const BARE_HD_STATUS: Record<VerbFamily, Status | undefined> = {
  fetch: undefined,
  store: 'stored',
  remove: 'deleted',
  arithmetic: 'stored',
};

function status(value: Status, message?: string): MetaResponse {
  return message === undefined ? { kind: 'status', status: value } : { kind: 'status', status: value, message };
}

/**
 * Map one frame to the response of a verb family
 */
export function classifyFrame(family: VerbFamily, frame: ResponseFrame): MetaResponse {
  switch (frame.code) {
    case 'VA':
      return { kind: 'data', records: [decodeRecord(frame.tokens, frame.data)] };
    case 'HD': {
      const bare = BARE_HD_STATUS[family];
      if (bare !== undefined && frame.tokens.length === 0) {
        return status(bare);
      }
      return { kind: 'data', records: [decodeRecord(frame.tokens)] };
    }
    case 'EN':
    case 'NF':
      return status('not-found');
    case 'NS':
      return status('not-stored');
    case 'EX':
      return status('exists');
    case 'MN':
      return status('no-op');
    case 'ERROR':
      return status('error');
    case 'CLIENT_ERROR':
      return status('client-error', messageText(frame.tokens));
    case 'SERVER_ERROR':
      return status('server-error', messageText(frame.tokens));
    default:
      throw new MalformedResponseError(`Unexpected response code: ${frame.code}`, {
        code: frame.code,
        family,
      });
  }
}

/**
 * Build the parser for one command of a verb family.
 *
 * In quiet mode the exchange ends with the `MN` of the no-op sentinel: every
 * frame up to it is consumed, records take precedence over statuses, and an
 * exchange with nothing but `MN` yields `no-op`.
 */
export function createResponseParser(family: VerbFamily, quiet: boolean): ResponseParser<MetaResponse> {
  if (!quiet) {
    return (buffer) => {
      const result = readFrame(buffer);
      if (result === null) {
        return null;
      }
      return { value: classifyFrame(family, result.frame), bytesConsumed: result.next };
    };
  }

  return (buffer) => {
    const records: MetaRecord[] = [];
    let primary: MetaResponse | undefined;
    let offset = 0;

    for (;;) {
      const result = readFrame(buffer, offset);
      if (result === null) {
        return null;
      }
      offset = result.next;
      if (result.frame.code === 'MN') {
        break;
      }

      const response = classifyFrame(family, result.frame);
      if (response.kind === 'data') {
        records.push(...response.records);
      } else if (primary === undefined) {
        primary = response;
      }
    }

    if (records.length > 0) {
      return { value: { kind: 'data', records }, bytesConsumed: offset };
    }
    return { value: primary ?? status('no-op'), bytesConsumed: offset };
  };
}
