import type { EventSource } from '@tallyledger/core';
import { getLogger } from '@tallyledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { LedgerEngine } from './ledger-engine.js';
import { transactionState } from './transaction-state-utils.js';

const logger = getLogger('LedgerRunner');

/**
 * Counts gathered while draining a source into an engine.
 */
export interface LedgerRunSummary {
  /** Well-formed events received from the source */
  eventsRead: number;
  /** Events that changed a balance */
  applied: number;
  /** Events rejected by a business rule */
  ignored: number;
  /** Accounts known to the engine after the run */
  accounts: number;
  /** Postings still under dispute at the end of the log */
  openDisputes: number;
}

/**
 * Feed every event of `source`, in order, into `engine`.
 *
 * A source that cannot be opened, or that fails while being read, ends the run
 * with an error. The engine keeps whatever it applied before the failure.
 */
export async function runLedger(source: EventSource, engine: LedgerEngine): Promise<Result<LedgerRunSummary, Error>> {
  const sequenceResult = await source.read();
  if (sequenceResult.isErr()) {
    return err(sequenceResult.error);
  }

  let applied = 0;
  let ignored = 0;

  try {
    for await (const event of sequenceResult.value) {
      if (engine.apply(event) === 'applied') {
        applied++;
      } else {
        ignored++;
      }
    }
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  const summary: LedgerRunSummary = {
    eventsRead: applied + ignored,
    applied,
    ignored,
    accounts: engine.accounts().size,
    openDisputes: countOpenDisputes(engine),
  };

  logger.info({ ...summary }, 'Ledger run complete');
  return ok(summary);
}

function countOpenDisputes(engine: LedgerEngine): number {
  let open = 0;
  for (const { events } of engine.history().buckets()) {
    if (transactionState(events) === 'disputed') open++;
  }
  return open;
}
