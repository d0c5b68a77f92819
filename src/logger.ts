import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';

import { LOG_LEVEL_ENV, type LogLevel, loadConfig, type ValidatorsConfig } from './config';
import { ValidatorConfigError } from './errors';

/**
 * Level used when the environment names a level pino does not know.
 */
const FALLBACK_LOG_LEVEL: LogLevel = 'warn';

let rootLogger: Logger | undefined;

function buildLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options: LoggerOptions = { name: 'attr-validators', level };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Builds a logger from the environment.
 *
 * An invalid level does not throw: validators build their loggers at
 * construction time, and a logging setting must not make them unusable. The
 * logger falls back to `warn` and reports the invalid setting as its first
 * record.
 *
 * @param env - Environment to read (defaults to `process.env`).
 * @param destination - Stream receiving the JSON lines (defaults to stdout).
 */
export function createLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  destination?: DestinationStream
): Logger {
  try {
    return buildLogger(loadConfig(env).logLevel, destination);
  } catch (error) {
    if (!(error instanceof ValidatorConfigError)) throw error;

    const logger = buildLogger(FALLBACK_LOG_LEVEL, destination);
    logger.warn(
      { err: error, variable: LOG_LEVEL_ENV },
      `ignoring invalid logging configuration, using level "${FALLBACK_LOG_LEVEL}"`
    );
    return logger;
  }
}

/**
 * Returns the library's root logger.
 *
 * The first call builds it from the environment (see
 * {@link createLoggerFromEnv}); later calls reuse it. Passing a configuration
 * always builds a fresh logger and makes it the root.
 *
 * Modules log through a child:
 * ```ts
 * const log = createLogger().child({ module: 'pattern' });
 * ```
 */
export function createLogger(config?: ValidatorsConfig): Logger {
  if (config) {
    rootLogger = buildLogger(config.logLevel);
  } else if (!rootLogger) {
    rootLogger = createLoggerFromEnv();
  }
  return rootLogger;
}
