/**
 * FaultError - the error taxonomy
 *
 * Nine kinds of failure, each with a fixed display text and a fixed
 * category. Errors are values: they are returned, cloned and serialized,
 * never thrown by this package.
 */

import { z } from 'zod';
import { defaultClassifier, ErrorCategory, type ErrorClassifier } from '../category.js';
import { ErrorContext } from '../context.js';
import { createLogger, type LogLevel } from '../logger.js';
import { FaultErrorSchema, type FaultErrorJson, formatSchemaError } from '../schemas.js';
import { getErrorSettings } from '../settings.js';
import { type FaultResult, err, flatMap, ok, tryCatch } from '../utils/result.js';
import type { RetryableError } from './retryable.js';

export type FaultErrorDetail =
  | { readonly kind: 'Database'; readonly message: string }
  | { readonly kind: 'Network'; readonly message: string }
  | { readonly kind: 'Validation'; readonly field: string; readonly message: string }
  | { readonly kind: 'NotFound'; readonly resource: string; readonly id: string }
  | { readonly kind: 'Conflict'; readonly message: string }
  | { readonly kind: 'Internal'; readonly message: string }
  | { readonly kind: 'Configuration'; readonly message: string }
  | { readonly kind: 'NotImplemented'; readonly feature: string }
  | { readonly kind: 'Custom'; readonly message: string; readonly classifier: ErrorClassifier };

export type FaultErrorKind = FaultErrorDetail['kind'];

/**
 * Display text of an error detail
 */
export function formatFaultError(detail: FaultErrorDetail): string {
  switch (detail.kind) {
    case 'Database':
      return `Database error: ${detail.message}`;
    case 'Network':
      return `Network error: ${detail.message}`;
    case 'Validation':
      return `Validation error: ${detail.field}: ${detail.message}`;
    case 'NotFound':
      return `Not found: ${detail.resource} with id ${detail.id}`;
    case 'Conflict':
      return `Conflict: ${detail.message}`;
    case 'Internal':
      return `Internal error: ${detail.message}`;
    case 'Configuration':
      return `Configuration error: ${detail.message}`;
    case 'NotImplemented':
      return `Feature not implemented: ${detail.feature}`;
    case 'Custom':
      return `Custom error: ${detail.message}`;
  }
}

export class FaultError extends Error implements RetryableError {
  readonly detail: FaultErrorDetail;

  constructor(detail: FaultErrorDetail) {
    super(formatFaultError(detail));
    this.name = 'FaultError';
    this.detail = detail;

    // Maintains proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  // === Primary constructors ===

  static database(message: string): FaultError {
    return new FaultError({ kind: 'Database', message });
  }

  static network(message: string): FaultError {
    return new FaultError({ kind: 'Network', message });
  }

  static validation(field: string, message: string): FaultError {
    return new FaultError({ kind: 'Validation', field, message });
  }

  static notFound(resource: string, id: string): FaultError {
    return new FaultError({ kind: 'NotFound', resource, id });
  }

  /**
   * Duplicate resources, constraint violations
   */
  static conflict(message: string): FaultError {
    return new FaultError({ kind: 'Conflict', message });
  }

  static internal(message: string): FaultError {
    return new FaultError({ kind: 'Internal', message });
  }

  static configuration(message: string): FaultError {
    return new FaultError({ kind: 'Configuration', message });
  }

  static notImplemented(feature: string): FaultError {
    return new FaultError({ kind: 'NotImplemented', feature });
  }

  /**
   * Error with domain-specific classification
   */
  static custom(message: string, classifier: ErrorClassifier): FaultError {
    return new FaultError({ kind: 'Custom', message, classifier });
  }

  static businessLogic(message: string, classifier: ErrorClassifier): FaultError {
    return FaultError.custom(message, classifier);
  }

  // === Convenience constructors ===

  static parsing(message: string): FaultError {
    return FaultError.validation('parsing', message);
  }

  static serialization(message: string): FaultError {
    return FaultError.internal(`Serialization error: ${message}`);
  }

  static connection(message: string): FaultError {
    return FaultError.network(`Connection error: ${message}`);
  }

  static initialization(message: string): FaultError {
    return FaultError.internal(`Initialization error: ${message}`);
  }

  /**
   * Fold a JSON or schema failure into an Internal error
   */
  static fromJsonError(error: unknown): FaultError {
    let reason: string;
    if (error instanceof z.ZodError) {
      reason = formatSchemaError(error);
    } else if (error instanceof Error) {
      reason = error.message;
    } else {
      reason = String(error);
    }
    return FaultError.internal(`JSON serialization error: ${reason}`);
  }

  // === Settings ===

  static backtraceEnabled(): boolean {
    return getErrorSettings().backtraceEnabled;
  }

  static maxRetries(): number {
    return getErrorSettings().maxRetries;
  }

  static logErrorsEnabled(): boolean {
    return getErrorSettings().logErrors;
  }

  static logLevel(): LogLevel {
    return getErrorSettings().logLevel;
  }

  // === Classification ===

  get kind(): FaultErrorKind {
    return this.detail.kind;
  }

  category(): ErrorCategory {
    switch (this.detail.kind) {
      case 'Database':
        return ErrorCategory.transient();
      case 'Network':
        return ErrorCategory.network();
      case 'Validation':
        return ErrorCategory.validation();
      case 'Internal':
        return ErrorCategory.internal();
      case 'NotFound':
      case 'Conflict':
      case 'Configuration':
      case 'NotImplemented':
        return ErrorCategory.permanent();
      case 'Custom':
        return ErrorCategory.custom(this.detail.classifier.clone());
    }
  }

  shouldRetry(attempt: number): boolean {
    return ErrorCategory.isRetriable(this.category()) && attempt < FaultError.maxRetries();
  }

  retryDelay(attempt: number): number {
    return ErrorCategory.retryDelay(this.category(), attempt);
  }

  maxRetries(): number {
    return FaultError.maxRetries();
  }

  /**
   * Stack trace, when backtraces are enabled
   */
  backtrace(): string | undefined {
    return FaultError.backtraceEnabled() ? this.stack : undefined;
  }

  /**
   * Write `[LEVEL] <display>` to stderr if error logging is on and the
   * level passes the configured minimum
   */
  logIfEnabled(level: LogLevel): void {
    const settings = getErrorSettings();
    if (!settings.logErrors) {
      return;
    }
    createLogger({ level: settings.logLevel })[level](this.message);
  }

  toContext(operation: string): ErrorContext {
    return new ErrorContext(operation, this.category(), this.message);
  }

  clone(): FaultError {
    if (this.detail.kind === 'Custom') {
      return FaultError.custom(this.detail.message, this.detail.classifier.clone());
    }
    return new FaultError({ ...this.detail });
  }

  override toString(): string {
    return this.message;
  }

  // === Serialization ===

  toJSON(): FaultErrorJson {
    if (this.detail.kind === 'Custom') {
      return { kind: 'Custom', message: this.detail.message };
    }
    return { ...this.detail };
  }

  /**
   * Decode a tagged JSON value. Custom errors come back with the Unknown
   * classifier since classifiers are not serialized.
   */
  static fromJSON(value: unknown): FaultResult<FaultError> {
    const parsed = FaultErrorSchema.safeParse(value);
    if (!parsed.success) {
      return err(FaultError.fromJsonError(parsed.error));
    }

    const data = parsed.data;
    if (data.kind === 'Custom') {
      return ok(FaultError.custom(data.message, defaultClassifier()));
    }
    return ok(new FaultError(data));
  }

  static parse(text: string): FaultResult<FaultError> {
    return flatMap(
      tryCatch((): unknown => JSON.parse(text), FaultError.fromJsonError),
      FaultError.fromJSON
    );
  }
}

export function isFaultError(value: unknown): value is FaultError {
  return value instanceof FaultError;
}
