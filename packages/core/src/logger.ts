/**
 * Logger interface for Faultline
 *
 * Diagnostic lines go to stderr so they never mix with a caller's stdout.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type Logger = {
  level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

/**
 * Parse a level name, case-insensitive. `warning` is accepted for `warn`.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.toUpperCase()) {
    case 'ERROR':
      return 'error';
    case 'WARN':
    case 'WARNING':
      return 'warn';
    case 'INFO':
      return 'info';
    case 'DEBUG':
      return 'debug';
    default:
      return undefined;
  }
}

/**
 * Logger configuration options
 */
export type LoggerOptions = {
  level?: LogLevel;
  output?: (line: string) => void;
};

/**
 * Default output function - one line on stderr
 */
export const defaultOutput = (line: string): void => {
  console.error(line);
};

export function formatLogLine(level: LogLevel, message: string): string {
  return `[${level.toUpperCase()}] ${message}`;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const output = options.output ?? defaultOutput;

  const log = (messageLevel: LogLevel, message: string): void => {
    if (!shouldLog(level, messageLevel)) {
      return;
    }
    output(formatLogLine(messageLevel, message));
  };

  return {
    level,
    error: (message: string) => log('error', message),
    warn: (message: string) => log('warn', message),
    info: (message: string) => log('info', message),
    debug: (message: string) => log('debug', message)
  };
}
