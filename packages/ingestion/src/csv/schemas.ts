/**
 * Zod validation schemas for transaction log CSV rows.
 *
 * Rows arrive as trimmed strings keyed by header name; a valid row becomes a
 * TransactionEvent.
 */
import {
  AmountSchema,
  ClientIdSchema,
  isPostingKind,
  TRANSACTION_KINDS,
  TxIdSchema,
  type TransactionEvent,
} from '@tallyledger/core';
import { z } from 'zod';

/** Header columns every transaction log must carry. `amount` may be absent. */
export const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

export const CsvTransactionRowSchema = z
  .object({
    /** Event kind, case-insensitive */
    type: z.string().toLowerCase().pipe(z.enum(TRANSACTION_KINDS)),

    /** Client id, unsigned 16-bit */
    client: ClientIdSchema,

    /** Transaction id, unsigned 32-bit */
    tx: TxIdSchema,

    /** Only meaningful on deposits and withdrawals */
    amount: z.string().optional(),
  })
  .transform((row, ctx): TransactionEvent => {
    const base = { kind: row.type, clientId: row.client, txId: row.tx };

    // Amounts on dispute, resolve and chargeback rows are ignored
    if (!isPostingKind(row.type)) {
      return base;
    }

    // An empty amount is a zero-amount posting
    if (!row.amount) {
      return base;
    }

    const amount = AmountSchema.safeParse(row.amount);
    if (!amount.success) {
      const message = amount.error.issues[0]?.message ?? 'amount is invalid';
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path: ['amount'] });
      return z.NEVER;
    }

    return { ...base, amount: amount.data };
  });

export type CsvTransactionRow = z.input<typeof CsvTransactionRowSchema>;

/**
 * Flatten zod issues into one line for the skip diagnostic.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((e) => `${e.path.join('.') || 'row'}: ${e.message}`).join('; ');
}
