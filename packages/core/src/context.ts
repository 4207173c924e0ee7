/**
 * Error context
 *
 * One record per error occurrence, for logs and telemetry. Owned by a
 * single caller and mutated in place as the operation is retried.
 */

import { randomUUID } from 'node:crypto';
import { ErrorCategory } from './category.js';
import { FaultError } from './errors/fault-error.js';
import { ErrorContextSchema, type ErrorContextJson, type JsonValue } from './schemas.js';
import { type FaultResult, err, flatMap, ok, tryCatch } from './utils/result.js';

/**
 * Stored fields used when restoring a context
 */
export type ErrorContextInit = {
  errorId?: string;
  occurredAt?: Date;
  attemptCount?: number;
  metadata?: Record<string, JsonValue>;
};

export class ErrorContext {
  readonly errorId: string;
  readonly operation: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly occurredAt: Date;
  private _attemptCount: number;
  private readonly entries: Map<string, JsonValue>;

  constructor(
    operation: string,
    category: ErrorCategory,
    message: string,
    init: ErrorContextInit = {}
  ) {
    this.errorId = init.errorId ?? randomUUID();
    this.operation = operation;
    this.category = category;
    this.message = message;
    this.occurredAt = init.occurredAt ?? new Date();
    this._attemptCount = init.attemptCount ?? 1;
    this.entries = new Map(Object.entries(init.metadata ?? {}));
  }

  get attemptCount(): number {
    return this._attemptCount;
  }

  /**
   * Snapshot of the metadata entries
   */
  get metadata(): Readonly<Record<string, JsonValue>> {
    return Object.fromEntries(this.entries);
  }

  /**
   * Count one more attempt. Bounding retries is up to the caller.
   */
  incrementAttempt(): void {
    this._attemptCount += 1;
  }

  /**
   * Add or replace a metadata entry and return this context
   */
  withMetadata(key: string, value: JsonValue): this {
    this.entries.set(key, value);
    return this;
  }

  addMetadata(key: string, value: JsonValue): void {
    this.entries.set(key, value);
  }

  getMetadata(key: string): JsonValue | undefined {
    return this.entries.get(key);
  }

  hasMetadata(key: string): boolean {
    return this.entries.has(key);
  }

  removeMetadata(key: string): boolean {
    return this.entries.delete(key);
  }

  clearMetadata(): void {
    this.entries.clear();
  }

  metadataCount(): number {
    return this.entries.size;
  }

  toJSON(): ErrorContextJson {
    return {
      errorId: this.errorId,
      operation: this.operation,
      message: this.message,
      occurredAt: this.occurredAt.toISOString(),
      attemptCount: this._attemptCount,
      metadata: this.metadata
    };
  }

  /**
   * Restore a context from its JSON form. The category comes back as Unknown.
   */
  static fromJSON(value: unknown): FaultResult<ErrorContext> {
    const parsed = ErrorContextSchema.safeParse(value);
    if (!parsed.success) {
      return err(FaultError.fromJsonError(parsed.error));
    }

    const { errorId, operation, message, occurredAt, attemptCount, metadata } = parsed.data;
    return ok(
      new ErrorContext(operation, ErrorCategory.unknown(), message, {
        errorId,
        occurredAt: new Date(occurredAt),
        attemptCount,
        metadata
      })
    );
  }

  static parse(text: string): FaultResult<ErrorContext> {
    return flatMap(
      tryCatch((): unknown => JSON.parse(text), FaultError.fromJsonError),
      ErrorContext.fromJSON
    );
  }
}
