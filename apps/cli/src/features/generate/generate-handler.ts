import { once } from 'node:events';
import type { Writable } from 'node:stream';

import { getLogger } from '@clientledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/handler-contracts.js';

import {
  formatTransactionRow,
  generateTransactions,
  planTransactionMix,
  TRANSACTION_CSV_HEADER,
  type RandomSource,
} from './generate-utils.js';

const logger = getLogger('GenerateHandler');

export interface GenerateHandlerParams {
  clients: number;
  transactions: number;
}

export interface GenerateResult {
  rows: number;
}

/**
 * Generate handler - streams a synthetic transaction CSV to a writable.
 */
export class GenerateHandler implements CommandHandler<GenerateHandlerParams, GenerateResult> {
  constructor(
    private readonly out: Writable,
    private readonly random: RandomSource = Math.random
  ) {}

  async execute(params: GenerateHandlerParams): Promise<Result<GenerateResult, Error>> {
    logger.info({ ...params }, 'Generating transactions');
    if (logger.isLevelEnabled('debug')) {
      const openings = Math.min(params.clients - 1, params.transactions);
      logger.debug({ openings, ...planTransactionMix(params.transactions - openings) }, 'Transaction mix');
    }

    let rows = 0;
    try {
      await this.writeLine(TRANSACTION_CSV_HEADER);
      for (const transaction of generateTransactions({ ...params, random: this.random })) {
        await this.writeLine(formatTransactionRow(transaction));
        rows++;
      }
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    logger.info({ clients: params.clients, rows }, 'Generated transactions');
    return ok({ rows });
  }

  private async writeLine(line: string): Promise<void> {
    if (this.out.errored) {
      throw this.out.errored;
    }
    if (!this.out.write(`${line}\n`)) {
      await once(this.out, 'drain');
    }
  }
}
