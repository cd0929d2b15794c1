import { isLogLevel, LOG_LEVELS, type LogLevel } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConfigError } from './features/shared/exit-codes.js';

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && isLogLevel(value),
  { message: `Invalid log level (expected one of ${LOG_LEVELS.join(', ')})` }
);

const envSchema = z.object({
  REFDATA_LOG_LEVEL: LogLevelSchema.default('info'),
  REFDATA_LOG_FILE: z.string().trim().min(1, { message: 'Invalid log file path' }).optional(),
  REFDATA_HOME: z.string().trim().min(1, { message: 'Invalid install root' }).optional(),
  REFDATA_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REFDATA_HTTP_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
});

export type CliEnv = z.infer<typeof envSchema>;

/**
 * Validate the REFDATA_* environment variables.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Result<CliEnv, ConfigError> {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new ConfigError(`Environment validation failed:\n${errors}`));
  }
  return ok(result.data);
}

let validatedEnv: CliEnv | undefined;

/**
 * Validates process.env on first access and caches the result.
 */
export function getEnv(): Result<CliEnv, ConfigError> {
  if (validatedEnv) {
    return ok(validatedEnv);
  }
  return parseEnv(process.env).map((env) => {
    validatedEnv = env;
    return env;
  });
}
