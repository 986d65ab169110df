// Pure helpers over a single (client, tx) history bucket

import { isPostingKind, type TransactionEvent } from '@tallyledger/core';
import { Decimal } from 'decimal.js';

export type TransactionState = 'posted' | 'disputed' | 'resolved' | 'charged_back';

/**
 * First deposit or withdrawal in the bucket, in insertion order.
 */
export function findPosting(events: readonly TransactionEvent[]): TransactionEvent | undefined {
  return events.find((event) => isPostingKind(event.kind));
}

/**
 * Amount a dispute, resolve or chargeback moves: the posting's amount, zero
 * when the posting carries none, undefined when there is no posting at all.
 */
export function referencedAmount(events: readonly TransactionEvent[]): Decimal | undefined {
  const posting = findPosting(events);
  if (!posting) return undefined;
  return posting.amount ?? new Decimal(0);
}

export function hasDispute(events: readonly TransactionEvent[]): boolean {
  return events.some((event) => event.kind === 'dispute');
}

/**
 * Lifecycle of a posting: posted -> disputed -> resolved | charged_back.
 *
 * A dispute arriving after a resolve or chargeback reopens the posting, since
 * the engine holds its funds again. Resolves and chargebacks with no open
 * dispute are skipped. Returns undefined for buckets without a posting.
 */
export function transactionState(events: readonly TransactionEvent[]): TransactionState | undefined {
  let state: TransactionState | undefined;

  for (const event of events) {
    switch (event.kind) {
      case 'deposit':
      case 'withdrawal':
        state ??= 'posted';
        break;
      case 'dispute':
        if (state !== undefined) state = 'disputed';
        break;
      case 'resolve':
        if (state === 'disputed') state = 'resolved';
        break;
      case 'chargeback':
        if (state === 'disputed') state = 'charged_back';
        break;
    }
  }

  return state;
}
