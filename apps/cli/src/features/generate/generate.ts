import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging-setup.js';
import { GenerateCommandOptionsSchema, increaseVerbosity, parseIntegerOption } from '../shared/schemas.js';

import { GenerateHandler } from './generate-handler.js';

/**
 * Generate command options validated by Zod at CLI boundary
 */
export type GenerateCommandOptions = z.infer<typeof GenerateCommandOptionsSchema>;

/**
 * Register the generate command.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Write a synthetic transactions CSV to stdout')
    .option('-c, --clients <n>', 'number of client ids, 2-65535 (default: 65535)', parseIntegerOption)
    .option('-t, --transactions <n>', 'number of rows to write (default: 1000)', parseIntegerOption)
    .option('-v, --verbose', 'increase log verbosity (repeatable)', increaseVerbosity, 0)
    .action(async (rawOptions: unknown) => {
      await executeGenerateCommand(rawOptions);
    });
}

/**
 * Execute the generate command.
 */
async function executeGenerateCommand(rawOptions: unknown): Promise<void> {
  const validationResult = GenerateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError('generate', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options: GenerateCommandOptions = validationResult.data;
  const logging = configureCliLogging({ verbose: options.verbose });

  const handler = new GenerateHandler(process.stdout);
  const result = await handler.execute({ clients: options.clients, transactions: options.transactions });
  logging.close();

  if (result.isErr()) {
    displayCliError('generate', result.error, ExitCodes.GENERAL_ERROR);
  }
}
