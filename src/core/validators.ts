/**
 * Input validation using Zod schemas
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import type { Delta, KeyInput, OpaqueInput, StoreValue } from './types';

export const MAX_KEY_LENGTH = 250;
export const MAX_OPAQUE_LENGTH = 32;
const MAX_U64 = (1n << 64n) - 1n;

// Spaces and control characters would split the command line
function hasUnsafeBytes(bytes: Buffer): boolean {
  return bytes.some((b) => b <= 0x20 || b === 0x7f);
}

function tokenSchema(field: string, maxLength: number) {
  return z
    .instanceof(Buffer)
    .refine((b) => b.length > 0, `${field} must not be empty`)
    .refine((b) => b.length <= maxLength, `${field} exceeds ${maxLength} bytes`)
    .refine((b) => !hasUnsafeBytes(b), `${field} contains whitespace or control characters`);
}

export const KeySchema = tokenSchema('key', MAX_KEY_LENGTH);
export const OpaqueSchema = tokenSchema('opaque', MAX_OPAQUE_LENGTH);

export const FlagSchema = z
  .string()
  .regex(/^[\x21-\x7e]+$/, 'flag must be a non-empty printable token without spaces');

export const DeltaSchema = z.union([
  z.bigint().min(0n).max(MAX_U64),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

export function toBytes(input: string | Uint8Array): Buffer {
  if (typeof input === 'string') {
    return Buffer.from(input, 'utf8');
  }
  return Buffer.isBuffer(input) ? input : Buffer.from(input);
}

function parseOrThrow<T>(
  schema: z.ZodType<T>,
  value: unknown,
  field: string,
  details: Record<string, unknown>
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? `invalid ${field}`;
    throw new ValidationError(message, { field, ...details });
  }
  return result.data;
}

export function validateKey(key: KeyInput): Buffer {
  const bytes = toBytes(key);
  return parseOrThrow(KeySchema, bytes, 'key', { length: bytes.length });
}

export function validateOpaque(opaque: OpaqueInput): Buffer {
  const bytes = toBytes(opaque);
  return parseOrThrow(OpaqueSchema, bytes, 'opaque', { length: bytes.length });
}

export function validateFlags(flags: readonly string[]): readonly string[] {
  flags.forEach((flag, index) => parseOrThrow(FlagSchema, flag, 'flags', { index }));
  return flags;
}

export function validateDelta(delta: Delta): bigint {
  return BigInt(parseOrThrow(DeltaSchema, delta, 'delta', {}));
}

/**
 * Serialize a value for the data block of a store command
 */
export function toPayload(value: StoreValue): Buffer {
  if (typeof value === 'number' || typeof value === 'bigint') {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new ValidationError(`Expected finite number, got ${value}`, { field: 'value' });
    }
    return Buffer.from(value.toString(), 'ascii');
  }
  return toBytes(value);
}
