/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Source file not found */
  NOT_FOUND: 4,

  /** Input could not be read as a transaction CSV */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export type ExitCodeName = keyof typeof ExitCodes;

export function exitCodeName(code: ExitCode): ExitCodeName {
  const entry = Object.entries(ExitCodes).find(([, value]) => value === code);
  return entry && isExitCodeName(entry[0]) ? entry[0] : 'GENERAL_ERROR';
}

function isExitCodeName(name: string): name is ExitCodeName {
  return name in ExitCodes;
}

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
