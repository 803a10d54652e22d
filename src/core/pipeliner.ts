/**
 * Quiet-mode pipelining: a quiet command may produce no reply at all, so a no-op
 * is queued behind it. Its `MN` reply marks the end of the exchange.
 */

export const NOOP_COMMAND = Buffer.from('mn\r\n', 'ascii');

export function withQuietSentinel(chunks: Buffer[], quiet: boolean): Buffer[] {
  return quiet ? [...chunks, NOOP_COMMAND] : chunks;
}
