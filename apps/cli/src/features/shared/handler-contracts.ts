import type { Result } from 'neverthrow';

/**
 * Command handler interface. Handlers hold the business logic of a command
 * and never touch process state; the command module owns exit codes and output.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
}
