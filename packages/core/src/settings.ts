/**
 * Process-wide error settings
 *
 * Read from the environment on first access and cached for the lifetime
 * of the process. Later changes to the environment are not picked up.
 */

import { z } from 'zod';
import { type LogLevel, parseLogLevel } from './logger.js';

export const DEFAULT_MAX_RETRIES = 3;

export type ErrorSettings = {
  /** Whether backtraces are enabled for errors */
  backtraceEnabled: boolean;
  /** Maximum number of retry attempts for retriable errors */
  maxRetries: number;
  /** Whether errors are written to stderr by `logIfEnabled` */
  logErrors: boolean;
  /** Minimum level for error output */
  logLevel: LogLevel;
};

export const DEFAULT_ERROR_SETTINGS: Readonly<ErrorSettings> = Object.freeze({
  backtraceEnabled: false,
  maxRetries: DEFAULT_MAX_RETRIES,
  logErrors: true,
  logLevel: 'info'
});

/**
 * Environment variables understood by the settings loader
 */
export const ErrorEnvSchema = z
  .object({
    FAULTLINE_ERROR_BACKTRACE: z.string().optional(),
    DEBUG: z.string().optional(),
    FAULTLINE_ERROR_MAX_RETRIES: z
      .string()
      .regex(/^\+?\d+$/)
      .transform((value) => Number.parseInt(value, 10))
      .refine((value) => Number.isSafeInteger(value))
      .catch(DEFAULT_MAX_RETRIES),
    FAULTLINE_ERROR_LOG_ERRORS: z.string().optional(),
    FAULTLINE_ERROR_LOG_LEVEL: z.string().optional()
  })
  .transform(
    (env): ErrorSettings => ({
      // DEBUG only counts when the dedicated flag is absent
      backtraceEnabled:
        env.FAULTLINE_ERROR_BACKTRACE !== undefined
          ? env.FAULTLINE_ERROR_BACKTRACE.toLowerCase() === 'true'
          : env.DEBUG !== undefined,
      maxRetries: env.FAULTLINE_ERROR_MAX_RETRIES,
      logErrors:
        env.FAULTLINE_ERROR_LOG_ERRORS === undefined ||
        env.FAULTLINE_ERROR_LOG_ERRORS.toLowerCase() !== 'false',
      logLevel:
        (env.FAULTLINE_ERROR_LOG_LEVEL !== undefined
          ? parseLogLevel(env.FAULTLINE_ERROR_LOG_LEVEL)
          : undefined) ?? DEFAULT_ERROR_SETTINGS.logLevel
    })
  );

export type ErrorEnv = Record<string, string | undefined>;

/**
 * Parse settings from an environment map without touching the cache
 */
export function loadErrorSettings(env: ErrorEnv = process.env): ErrorSettings {
  return ErrorEnvSchema.parse(env);
}

/**
 * Build settings from explicit values, mainly for tests
 */
export function createErrorSettings(overrides: Partial<ErrorSettings> = {}): ErrorSettings {
  return {
    ...DEFAULT_ERROR_SETTINGS,
    ...overrides
  };
}

// Loaded on first access
let _settings: ErrorSettings | null = null;

/**
 * Get the process-wide settings, loading them from `process.env` once
 */
export function getErrorSettings(): ErrorSettings {
  if (!_settings) {
    _settings = Object.freeze(loadErrorSettings());
  }
  return _settings;
}

/**
 * Drop the cached settings (mainly for testing)
 */
export function resetErrorSettings(): void {
  _settings = null;
}
