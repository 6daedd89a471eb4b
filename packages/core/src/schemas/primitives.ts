import { z } from 'zod';

import { parseCurrency } from '../currency.js';
import { CLIENT_ID_MAX, TRANSACTION_ID_MAX } from '../identifiers.js';

/**
 * Non-negative integer given as a decimal string, bounded to `max`.
 */
function boundedIntegerString(max: number, label: string) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform((val, ctx) => {
      const parsed = Number(val);
      if (parsed > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be at most ${String(max)}` });
        return z.NEVER;
      }
      return parsed;
    });
}

export const ClientIdSchema = boundedIntegerString(CLIENT_ID_MAX, 'client');

export const TransactionIdSchema = boundedIntegerString(TRANSACTION_ID_MAX, 'tx');

// Amount schema - wire string to 4-place Decimal
export const CurrencySchema = z.string().transform((val, ctx) => {
  const result = parseCurrency(val);
  if (result.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    return z.NEVER;
  }
  return result.value;
});

// Empty or missing cell means "no amount"
export const OptionalCurrencySchema = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val))
  .pipe(CurrencySchema.optional());
