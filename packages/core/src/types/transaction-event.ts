import type { Decimal } from 'decimal.js';

/**
 * Event kinds, in the spelling used by the input records.
 */
export const TRANSACTION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/**
 * Kinds that post money and carry an amount. Dispute, resolve and chargeback
 * only reference one of these by `txId`.
 */
export type PostingKind = Extract<TransactionKind, 'deposit' | 'withdrawal'>;
export type ReferenceKind = Exclude<TransactionKind, PostingKind>;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffffffff;

/**
 * A single event from the transaction log.
 *
 * `txId` is unique among deposits and withdrawals; disputes, resolves and
 * chargebacks reuse the id of the posting they refer to. `amount` is only
 * meaningful on postings.
 */
export interface TransactionEvent {
  readonly kind: TransactionKind;
  readonly clientId: number;
  readonly txId: number;
  readonly amount?: Decimal | undefined;
}

export function isPostingKind(kind: TransactionKind): kind is PostingKind {
  return kind === 'deposit' || kind === 'withdrawal';
}
