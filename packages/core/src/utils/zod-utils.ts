import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z, ZodError } from 'zod';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 *
 * @param schema The Zod schema to validate against.
 * @param input The unknown input to validate.
 * @returns An Ok with the parsed output if successful, otherwise an Err(ZodError).
 */
export function fromZod<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown
): Result<z.output<TSchema>, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * One-line description of every issue, prefixed by the field path when there is one
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
