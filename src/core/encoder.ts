/**
 * Command encoder for the meta protocol verbs
 *
 * Every input is validated before the first chunk is produced, so a rejected
 * command never leaves partial bytes on the connection.
 */

import { encodeFlags, negotiateFlags } from './flags';
import { withQuietSentinel } from './pipeliner';
import type { MetaCommand, StoreMode, Verb, VerbFamily } from './types';
import { toPayload, validateDelta, validateFlags, validateKey, validateOpaque } from './validators';

const CRLF = Buffer.from('\r\n', 'ascii');
const SPACE = Buffer.from(' ', 'ascii');

const VERB_CODES: Record<Verb, string> = {
  fetch: 'mg',
  store: 'ms',
  remove: 'md',
  increment: 'ma',
  decrement: 'ma',
};

// 'set' is the server default and is never written
const STORE_MODE_TOKENS: Record<StoreMode, string | undefined> = {
  set: undefined,
  add: 'ME',
  replace: 'MR',
  append: 'MA',
  prepend: 'MP',
};

const DECREMENT_MODE = 'MD';

/**
 * Ordered byte sink, typically a connection
 */
export interface CommandSink {
  write(chunk: Buffer): void;
  flush(): Promise<void>;
}

export function verbFamily(verb: Verb): VerbFamily {
  return verb === 'increment' || verb === 'decrement' ? 'arithmetic' : verb;
}

function commandLine(verb: Verb, key: Buffer, args: string[], flagTokens: Buffer[]): Buffer {
  const parts: Buffer[] = [Buffer.from(VERB_CODES[verb], 'ascii'), SPACE, key];
  for (const arg of args) {
    parts.push(SPACE, Buffer.from(arg, 'ascii'));
  }
  parts.push(encodeFlags(flagTokens), CRLF);
  return Buffer.concat(parts);
}

/**
 * Encode a command into the chunks to write, quiet sentinel included
 */
export function encodeCommand(command: MetaCommand): Buffer[] {
  const key = validateKey(command.key);
  const opaque = command.opaque === undefined ? undefined : validateOpaque(command.opaque);
  const flags = command.flags === undefined ? undefined : validateFlags(command.flags);
  const quiet = command.quiet ?? false;

  switch (command.verb) {
    case 'fetch':
    case 'remove': {
      const line = commandLine(command.verb, key, [], negotiateFlags({ opaque, quiet, flags }));
      return withQuietSentinel([line], quiet);
    }

    case 'store': {
      const payload = toPayload(command.value);
      const mode = STORE_MODE_TOKENS[command.mode ?? 'set'];
      const line = commandLine(
        command.verb,
        key,
        [payload.length.toString()],
        negotiateFlags({ mode, opaque, quiet, flags })
      );
      return withQuietSentinel([line, payload, CRLF], quiet);
    }

    case 'increment':
    case 'decrement': {
      const delta = command.delta === undefined ? undefined : validateDelta(command.delta);
      const mode = command.verb === 'decrement' ? DECREMENT_MODE : undefined;
      const line = commandLine(
        command.verb,
        key,
        [],
        negotiateFlags({ mode, opaque, delta, quiet, flags })
      );
      return withQuietSentinel([line], quiet);
    }
  }
}

/**
 * Write a command to the sink and flush it. Returns the number of bytes written.
 */
export async function writeCommand(sink: CommandSink, command: MetaCommand): Promise<number> {
  const chunks = encodeCommand(command);
  let bytes = 0;
  for (const chunk of chunks) {
    sink.write(chunk);
    bytes += chunk.length;
  }
  await sink.flush();
  return bytes;
}
