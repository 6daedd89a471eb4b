#!/usr/bin/env node
import { Command } from 'commander';

import { registerGenerateCommand } from './features/generate/generate.js';
import { registerProcessCommand } from './features/process/process.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const program = new Command();

async function main() {
  program.name('clientledger').description('Replay client transaction feeds into account balances').version('0.1.0');

  // Process command - transactions CSV in, balances CSV out
  registerProcessCommand(program);

  // Generate command - synthetic transactions CSV for load and smoke tests
  registerGenerateCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  displayCliError('clientledger', new Error(`Unhandled Rejection: ${String(reason)}`), ExitCodes.GENERAL_ERROR);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  displayCliError('clientledger', error, ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError('clientledger', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
});
