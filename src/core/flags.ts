/**
 * Flag negotiation: merges typed parameters with caller-supplied meta flags
 */

export interface FlagNegotiation {
  /** Mode token written right after the key, e.g. `MD` for decrement */
  mode?: string;
  opaque?: Buffer;
  /** Only set for arithmetic commands */
  delta?: bigint;
  quiet: boolean;
  flags?: readonly string[];
}

const OPAQUE_PREFIX = Buffer.from('O', 'ascii');
const QUIET_FLAG = Buffer.from('q', 'ascii');
const SPACE = Buffer.from(' ', 'ascii');

/**
 * Decide whether a caller flag is superseded by the verb or a typed parameter.
 * Mode and quiet are never taken from raw flags.
 */
export function isSuppressedFlag(flag: string, negotiation: FlagNegotiation): boolean {
  switch (flag[0]) {
    case 'M':
    case 'q':
      return true;
    case 'O':
      return negotiation.opaque !== undefined;
    case 'D':
      // Any explicit delta claims D, even 1 which is never written
      return negotiation.delta !== undefined;
    default:
      return false;
  }
}

/**
 * Produce the ordered flag tokens for a command line, without separators
 */
export function negotiateFlags(negotiation: FlagNegotiation): Buffer[] {
  const tokens: Buffer[] = [];

  if (negotiation.mode) {
    tokens.push(Buffer.from(negotiation.mode, 'ascii'));
  }

  if (negotiation.opaque !== undefined) {
    tokens.push(Buffer.concat([OPAQUE_PREFIX, negotiation.opaque]));
  }

  // 1 is the server default
  if (negotiation.delta !== undefined && negotiation.delta !== 1n) {
    tokens.push(Buffer.from(`D${negotiation.delta}`, 'ascii'));
  }

  const seen = new Set<string>();
  for (const flag of negotiation.flags ?? []) {
    if (isSuppressedFlag(flag, negotiation) || seen.has(flag)) {
      continue;
    }
    seen.add(flag);
    tokens.push(Buffer.from(flag, 'ascii'));
  }

  if (negotiation.quiet) {
    tokens.push(QUIET_FLAG);
  }

  return tokens;
}

/**
 * Render tokens as the flag suffix of a command line (each preceded by a space)
 */
export function encodeFlags(tokens: readonly Buffer[]): Buffer {
  const parts: Buffer[] = [];
  for (const token of tokens) {
    parts.push(SPACE, token);
  }
  return Buffer.concat(parts);
}
