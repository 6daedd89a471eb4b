import { IngestionError } from '@clientledger/core';
import { writeBalances } from '@clientledger/ingestion';
import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging-setup.js';
import { increaseVerbosity, ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';
import { formatRunSummary, SourceNotFoundError } from './process-utils.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Apply a transactions CSV and print the resulting client balances as CSV')
    .argument('<source>', 'transactions CSV file, or - to read stdin')
    .option('-v, --verbose', 'increase log verbosity (repeatable)', increaseVerbosity, 0)
    .option('--log-format <format>', 'log output format (text|json)')
    .option('--log-file <path>', 'also append JSON logs to this file')
    .option('--summary', 'print a run summary to stderr')
    .action(async (source: string, rawOptions: unknown) => {
      await executeProcessCommand(source, rawOptions);
    });
}

export function exitCodeForProcessError(error: Error): ExitCode {
  if (error instanceof SourceNotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof IngestionError) return ExitCodes.VALIDATION_ERROR;
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(source: string, rawOptions: unknown): Promise<void> {
  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError('process', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options: ProcessCommandOptions = validationResult.data;
  const logging = configureCliLogging(options);

  try {
    const handler = new ProcessHandler();
    const result = await handler.execute({ source });

    if (result.isErr()) {
      logging.close();
      displayCliError('process', result.error, exitCodeForProcessError(result.error));
    }

    const { balances, stats, summary } = result.value;
    await writeBalances(balances.values(), process.stdout);
    logging.close();

    if (options.summary) {
      process.stderr.write(formatRunSummary(summary, stats));
    }
  } catch (error) {
    logging.close();
    displayCliError('process', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }
}
