import {
  ClientIdSchema,
  formatZodIssues,
  fromZod,
  OptionalCurrencySchema,
  TransactionIdSchema,
} from '@clientledger/core';
import { COMMAND_TYPES, type AccountCommand } from '@clientledger/ledger';
import type { Result } from 'neverthrow';
import { z } from 'zod';

/**
 * One CSV row of the transaction feed, as strings keyed by header name.
 * Missing trailing cells arrive as undefined.
 */
export const TransactionRecordSchema = z.object({
  type: z.enum(COMMAND_TYPES, {
    errorMap: () => ({ message: `type must be one of ${COMMAND_TYPES.join(', ')}` }),
  }),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
  amount: OptionalCurrencySchema,
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Decode a raw row into a command. Err carries the reason the row is malformed.
 */
export function parseTransactionRecord(raw: unknown): Result<AccountCommand, string> {
  return fromZod(TransactionRecordSchema, raw)
    .map((record): AccountCommand => ({ type: record.type, client: record.client, tx: record.tx, amount: record.amount }))
    .mapErr(formatZodIssues);
}
