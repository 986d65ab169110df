import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS, type TransactionEvent } from '../types/transaction-event.js';

import { DecimalSchema } from './primitives.js';

/**
 * Schema for events built in memory (tests, embedding callers). CSV rows go
 * through the ingestion row schema instead.
 */
export const TransactionEventInputSchema = z.object({
  kind: z.enum(TRANSACTION_KINDS),
  clientId: z.number().int().min(0).max(MAX_CLIENT_ID),
  txId: z.number().int().min(0).max(MAX_TX_ID),
  amount: DecimalSchema.optional(),
});

export type TransactionEventInput = z.input<typeof TransactionEventInputSchema>;

/**
 * Validate and freeze a transaction event.
 */
export function createTransactionEvent(input: TransactionEventInput): Result<TransactionEvent, Error> {
  const result = TransactionEventInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.') || 'event'}: ${e.message}`).join('; ');
    return err(new Error(`Invalid transaction event: ${issues}`));
  }

  const { kind, clientId, txId, amount } = result.data;
  return ok(Object.freeze({ kind, clientId, txId, ...(amount !== undefined && { amount }) }));
}
