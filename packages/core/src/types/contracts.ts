import type { Result } from 'neverthrow';

import type { AccountMap } from './account.js';
import type { TransactionEvent } from './transaction-event.js';

/**
 * Produces the transaction log as a lazy, ordered sequence.
 *
 * Sources are single-pass: `read()` hands out the sequence once and returns an
 * error on later calls. Failing to open the origin is an `err`; a read failure
 * part-way through rejects the iteration. Malformed records never reach the
 * caller.
 */
export interface EventSource {
  read(): Promise<Result<AsyncIterable<TransactionEvent>, Error>>;
}

/**
 * Consumes the final account map and renders it somewhere.
 */
export interface AccountSink {
  write(accounts: AccountMap): Promise<Result<void, Error>>;
}
