import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { MAX_CLIENT_ID, MAX_TX_ID } from '../types/transaction-event.js';
import { parseDecimal, tryParseDecimal } from '../utils/decimal-utils.js';

function unsignedIntegerString(field: string, max: number) {
  return z
    .string()
    .regex(/^\d+$/, `${field} must be an unsigned integer`)
    .transform((val) => Number(val))
    .refine((val) => val <= max, { message: `${field} must not exceed ${max}` });
}

// Client ids are unsigned 16-bit, transaction ids unsigned 32-bit
export const ClientIdSchema = unsignedIntegerString('client', MAX_CLIENT_ID);
export const TxIdSchema = unsignedIntegerString('tx', MAX_TX_ID);

// Plain fixed-point notation only: no sign, exponent, hex or Infinity
export const AmountSchema = z
  .string()
  .regex(/^(\d+(\.\d*)?|\.\d+)$/, 'amount must be a non-negative decimal number')
  .transform((val) => parseDecimal(val));

// Accepts anything a caller may hold an amount as; finite and non-negative, normalised to Decimal
export const DecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)])
  .transform((val, ctx) => {
    const result = { value: new Decimal(0) };
    if (val === '' || !tryParseDecimal(val instanceof Decimal ? val : String(val), result)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a finite numeric string or number' });
      return z.NEVER;
    }
    if (result.value.isNegative()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must not be negative' });
      return z.NEVER;
    }
    return result.value;
  });
