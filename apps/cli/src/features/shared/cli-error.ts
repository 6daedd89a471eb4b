import { getNodeEnv } from '@clientledger/env';
import { flushLoggers } from '@clientledger/logger';
import pc from 'picocolors';

import { exitCodeName, exitWithCode, type ExitCode, type ExitCodeName } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCodeName, string>> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The source file was not found. Check the path, or pass - to read from stdin.',
  VALIDATION_ERROR: 'The input is not a readable CSV. Expected a header row: type,client,tx,amount.',
};

/**
 * Render a CLI error as text for stderr, with a tip when one applies.
 */
export function formatCliError(command: string, error: Error, exitCode: ExitCode): string {
  const lines = [`${pc.red('✗')} ${command}: ${error.message}`];

  const tip = ERROR_TIPS[exitCodeName(exitCode)];
  if (tip) {
    lines.push(pc.dim(tip));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Display a CLI error and exit.
 * Logs are flushed first so buffered entries land before the message.
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode): never {
  flushLoggers();
  process.stderr.write(formatCliError(command, error, exitCode));

  // In development, show full stack trace
  if (getNodeEnv() === 'development' && error.stack) {
    process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
  }

  exitWithCode(exitCode);
}
