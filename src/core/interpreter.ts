/**
 * Classify a parsed response into the outcome of an operation
 */

import { ConflictError, statusToError } from './errors';
import type { MetaRecord, MetaResponse, Status, Verb } from './types';

// Statuses that mean "done, nothing to return"
const EMPTY_SUCCESS: Record<Verb, readonly Status[]> = {
  fetch: ['not-found', 'no-op'],
  store: ['stored', 'no-op'],
  remove: ['deleted', 'no-op'],
  increment: ['stored', 'no-op'],
  decrement: ['stored', 'no-op'],
};

/**
 * First record of a response. A single-key request yields at most one logical
 * record; anything past index 0 is not part of the contract.
 */
export function firstRecord(records: readonly MetaRecord[]): MetaRecord | undefined {
  return records[0];
}

export function interpretResponse(verb: Verb, response: MetaResponse): MetaRecord | undefined {
  if (response.kind === 'data') {
    return firstRecord(response.records);
  }

  if (EMPTY_SUCCESS[verb].includes(response.status)) {
    return undefined;
  }

  if (verb === 'remove' && response.status === 'exists') {
    throw new ConflictError();
  }

  throw statusToError(response.status, response.message);
}
