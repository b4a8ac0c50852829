/**
 * Logger used across the charm, the interface library and the CLI.
 *
 * Hooks swap the console logger for one that forwards to `juju-log`.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = keyof Logger;

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

/** Console logger with an optional scope shown before every line. */
export function createConsoleLogger(scope?: string): Logger {
  const format = (level: LogLevel, message: string): string =>
    scope ? `${LEVEL_PREFIX[level]} [${scope}] ${message}` : `${LEVEL_PREFIX[level]} ${message}`;

  return {
    debug: (message) => console.debug(format('debug', message)),
    info: (message) => console.log(format('info', message)),
    warn: (message) => console.warn(format('warn', message)),
    error: (message) => console.error(format('error', message)),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
