import { CLIENT_ID_MAX, TRANSACTION_ID_MAX } from '@clientledger/core';
import { z } from 'zod';

/**
 * Count of repeated -v flags
 */
export const VerboseFlagSchema = z.object({
  verbose: z.number().int().min(0).default(0),
});

export const LogOptionsSchema = VerboseFlagSchema.extend({
  logFile: z.string().trim().min(1, '--log-file must not be empty').optional(),
  logFormat: z
    .enum(['text', 'json'], { errorMap: () => ({ message: '--log-format must be text or json' }) })
    .optional(),
});

/**
 * Process command options (source is a positional argument)
 */
export const ProcessCommandOptionsSchema = LogOptionsSchema.extend({
  summary: z.boolean().default(false),
});

/**
 * Generate command options
 */
export const GenerateCommandOptionsSchema = VerboseFlagSchema.extend({
  clients: z
    .number({ invalid_type_error: '--clients must be an integer' })
    .int('--clients must be an integer')
    .min(2, '--clients must be at least 2')
    .max(CLIENT_ID_MAX, `--clients must be at most ${CLIENT_ID_MAX}`)
    .default(CLIENT_ID_MAX),
  transactions: z
    .number({ invalid_type_error: '--transactions must be an integer' })
    .int('--transactions must be an integer')
    .min(1, '--transactions must be at least 1')
    .max(TRANSACTION_ID_MAX, `--transactions must be at most ${TRANSACTION_ID_MAX}`)
    .default(1000),
});

/**
 * Commander argument parser for integer options. Non-integers become NaN and
 * are rejected by the options schema.
 */
export function parseIntegerOption(value: string): number {
  return /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
}

/**
 * Commander argument parser that counts repeated flags (-vvv)
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}
