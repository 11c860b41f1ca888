/**
 * Configuration loading from environment variables
 *
 * Only process-level concerns live here. Experiment settings are passed
 * explicitly to the Environment and its defaults file.
 */

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

function isKnownLevel(value: string): boolean {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load logging configuration from environment variables
 *
 * `LOG_LEVEL` falls back to `info` in production and `debug` elsewhere;
 * an unrecognized level is treated as unset. `LOG_CONSOLE=false` disables
 * console output.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, NODE_ENV } = env;
  const fallback = NODE_ENV === 'production' ? 'info' : 'debug';
  const requested = LOG_LEVEL?.trim().toLowerCase();

  return {
    level: requested && isKnownLevel(requested) ? requested : fallback,
    enableConsole: LOG_CONSOLE !== 'false',
  };
}
