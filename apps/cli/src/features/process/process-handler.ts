import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';

import type { ClientId } from '@clientledger/core';
import { ingestTransactions, type IngestionSummary } from '@clientledger/ingestion';
import { IngestionRouter, type Account, type AccountView, type RouterStats } from '@clientledger/ledger';
import { getLogger } from '@clientledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/handler-contracts.js';

import { SourceNotFoundError } from './process-utils.js';

const logger = getLogger('ProcessHandler');

/** Path of a transactions CSV, or '-' for stdin */
export interface ProcessHandlerParams {
  source: string;
}

export interface ProcessResult {
  summary: IngestionSummary;
  stats: RouterStats;
  balances: ReadonlyMap<ClientId, AccountView>;
}

/**
 * Process handler - reads one transaction feed through a fresh account table.
 */
export class ProcessHandler implements CommandHandler<ProcessHandlerParams, ProcessResult> {
  /** stdin defaults to process.stdin, resolved only when the source is '-' */
  constructor(private readonly stdin?: Readable) {}

  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    const sourceResult = await this.openSource(params.source);
    if (sourceResult.isErr()) {
      return err(sourceResult.error);
    }

    logger.info({ source: params.source }, 'Processing transactions');

    const accounts = new Map<ClientId, Account>();
    const router = new IngestionRouter(accounts);
    const ingestion = await ingestTransactions(sourceResult.value, router);
    if (ingestion.isErr()) {
      return err(ingestion.error);
    }

    logger.info({ accounts: accounts.size }, 'Processed transactions');

    return ok({
      summary: ingestion.value,
      stats: router.stats(),
      balances: router.snapshot(),
    });
  }

  private async openSource(source: string): Promise<Result<Readable, Error>> {
    if (source === '-') {
      return ok(this.stdin ?? process.stdin);
    }

    try {
      const stats = await stat(source);
      if (!stats.isFile()) {
        return err(new SourceNotFoundError(source));
      }
    } catch (error) {
      logger.debug({ error, source }, 'Source stat failed');
      return err(new SourceNotFoundError(source));
    }

    return ok(createReadStream(source));
  }
}
