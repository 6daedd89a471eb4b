import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'], { errorMap: () => ({ message: "Expected 'true' or 'false'" }) })
  .transform((val) => val === 'true');

const envSchema = z.object({
  CLIENTLEDGER_LOG_COLOR: booleanString.default('false'),
  CLIENTLEDGER_LOG_FORMAT: z.enum(['text', 'json']).default('text'),
  CLIENTLEDGER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

export type LogFormat = ValidatedEnv['CLIENTLEDGER_LOG_FORMAT'];

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validate an environment without caching.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Logging defaults; command-line flags take precedence over these.
 */
export function getLoggingEnv(): { color: boolean; format: LogFormat; level: ValidatedEnv['CLIENTLEDGER_LOG_LEVEL'] } {
  const env = validateEnv();
  return {
    color: env.CLIENTLEDGER_LOG_COLOR,
    format: env.CLIENTLEDGER_LOG_FORMAT,
    level: env.CLIENTLEDGER_LOG_LEVEL,
  };
}

/**
 * Get the current NODE_ENV value.
 * @returns 'development', 'production', or 'test'
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  const env = validateEnv();
  return env.NODE_ENV;
}
