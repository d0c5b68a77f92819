import { z } from 'zod';

import { ValidatorConfigError } from './errors';

/**
 * Environment variable controlling the log level.
 */
export const LOG_LEVEL_ENV = 'ATTR_VALIDATORS_LOG_LEVEL';

const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default('silent')
});

export type ValidatorsConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse string from environment variable with default.
 *
 * Blank values count as unset.
 *
 * @example
 * parseStringEnv(process.env, 'ATTR_VALIDATORS_LOG_LEVEL') // undefined if unset
 */
export function parseStringEnv(
  env: NodeJS.ProcessEnv,
  key: string
): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Loads the library configuration from the environment.
 *
 * Logging is off (`silent`) unless a level is set explicitly.
 *
 * @param env - Environment to read (defaults to `process.env`).
 * @returns The validated configuration.
 * @throws {ValidatorConfigError} If a variable holds an unsupported value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ValidatorsConfig {
  const result = ConfigSchema.safeParse({
    logLevel: parseStringEnv(env, LOG_LEVEL_ENV)?.toLowerCase()
  });

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidatorConfigError(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
