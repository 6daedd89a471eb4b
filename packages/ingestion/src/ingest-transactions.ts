import type { Readable } from 'node:stream';

import { IngestionError } from '@clientledger/core';
import type { IngestionRouter } from '@clientledger/ledger';
import { getLogger } from '@clientledger/logger';
import { parse } from 'csv-parse';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { parseTransactionRecord } from './transaction-record.js';

const logger = getLogger('ingest-transactions');

export interface IngestionSummary {
  /** Data rows read, header excluded */
  rows: number;
  malformed: number;
  accepted: number;
  rejected: number;
}

// Shape of csv-parse output with `info: true`
const ParsedRowSchema = z.object({
  info: z.object({ lines: z.number() }),
  record: z.record(z.string(), z.string()),
});

/**
 * Stream a transaction CSV through the router, row by row, in file order.
 *
 * Malformed rows are logged and skipped; rejected commands are counted by the
 * router. Only an unreadable stream or a CSV syntax error fails the run.
 */
export async function ingestTransactions(
  source: Readable,
  router: IngestionRouter
): Promise<Result<IngestionSummary, IngestionError>> {
  const parser = parse({
    bom: true,
    columns: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  source.once('error', (error) => parser.destroy(error));
  const rows: AsyncIterable<unknown> = source.pipe(parser);

  const summary: IngestionSummary = { rows: 0, malformed: 0, accepted: 0, rejected: 0 };

  try {
    for await (const row of rows) {
      summary.rows++;

      const parsedRow = ParsedRowSchema.safeParse(row);
      const line = parsedRow.success ? parsedRow.data.info.lines : undefined;
      const command = parseTransactionRecord(parsedRow.success ? parsedRow.data.record : row);

      if (command.isErr()) {
        summary.malformed++;
        logger.warn({ line, reason: command.error, row: summary.rows }, 'Skipping malformed row');
        continue;
      }

      const routed = router.route(command.value);
      if (routed.isOk()) {
        summary.accepted++;
      } else {
        summary.rejected++;
      }
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error, rows: summary.rows }, 'Transaction stream failed');
    return err(new IngestionError(`Failed to read transactions: ${message}`, error));
  }

  logger.info({ ...summary }, 'Ingestion complete');
  return ok(summary);
}
