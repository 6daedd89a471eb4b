/**
 * Error base for everything the ledger rejects.
 *
 * Domain errors are returned through neverthrow Results, never thrown, so
 * subclasses carry a stable `code` callers can branch and count on.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly client?: number | undefined;
  readonly tx?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    context?: {
      additionalContext?: Record<string, unknown> | undefined;
      client?: number | undefined;
      tx?: number | undefined;
    }
  ) {
    super(message);
    this.client = context?.client;
    this.tx = context?.tx;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      client: this.client,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      tx: this.tx,
    };
  }
}

/**
 * Input that could not be read or decoded at all
 */
export class IngestionError extends DomainError {
  readonly code = 'INGESTION_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { additionalContext: { cause: String(cause) } });
  }
}
