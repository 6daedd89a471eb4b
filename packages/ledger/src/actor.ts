import type { Result } from 'neverthrow';

/**
 * Handle/apply contract of an event-sourced aggregate.
 *
 * `handle` decides: it inspects state and returns the events a command would
 * produce, or the reason it is rejected, without mutating anything.
 * `apply` mutates: it folds already-validated events into state.
 */
export interface Actor<TCommand, TEvent, TError> {
  handle(command: TCommand): Result<TEvent[], TError>;
  apply(events: readonly TEvent[]): void;
}
