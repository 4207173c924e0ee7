/**
 * Error categories
 *
 * A category tells callers whether an error is worth retrying and how long
 * to wait first. Built-in categories cover the common cases; anything else
 * plugs in through an ErrorClassifier.
 */

/**
 * Classification behaviour shared by built-in and custom categories.
 * Implementations must not keep mutable state.
 */
export interface ErrorClassifier {
  isRetriable(): boolean;

  /** Suggested wait in milliseconds before the given (1-based) attempt */
  retryDelay(attempt: number): number;

  /** Stable name used to group errors in logs and telemetry */
  categoryName(): string;

  clone(): ErrorClassifier;
}

export enum BuiltinCategory {
  /** Temporary failures such as database timeouts */
  Transient = 'Transient',
  Permanent = 'Permanent',
  /** Quotas and pools; retried after long delays */
  ResourceExhaustion = 'ResourceExhaustion',
  Network = 'Network',
  Authentication = 'Authentication',
  Validation = 'Validation',
  Internal = 'Internal',
  /** 503-style failures */
  ServiceUnavailable = 'ServiceUnavailable',
  Unknown = 'Unknown'
}

const BASE_DELAY_MS: Partial<Record<BuiltinCategory, number>> = {
  [BuiltinCategory.Transient]: 100,
  [BuiltinCategory.Network]: 500,
  [BuiltinCategory.ServiceUnavailable]: 1000,
  [BuiltinCategory.ResourceExhaustion]: 5000
};

const DEFAULT_BASE_DELAY_MS = 100;
const MAX_EXPONENT = 10;
const MAX_MULTIPLIER = 60;

const RETRIABLE = new Set<BuiltinCategory>([
  BuiltinCategory.Transient,
  BuiltinCategory.Network,
  BuiltinCategory.ServiceUnavailable,
  BuiltinCategory.ResourceExhaustion
]);

export function isBuiltinRetriable(category: BuiltinCategory): boolean {
  return RETRIABLE.has(category);
}

/**
 * Capped exponential delay: base * min(2^min(attempt, 10), 60)
 */
export function builtinRetryDelay(category: BuiltinCategory, attempt: number): number {
  const base = BASE_DELAY_MS[category] ?? DEFAULT_BASE_DELAY_MS;
  const exponent = Number.isNaN(attempt)
    ? 0
    : Math.min(Math.max(0, Math.floor(attempt)), MAX_EXPONENT);
  const multiplier = Math.min(2 ** exponent, MAX_MULTIPLIER);
  return base * multiplier;
}

class BuiltinClassifier implements ErrorClassifier {
  constructor(readonly category: BuiltinCategory) {}

  isRetriable(): boolean {
    return isBuiltinRetriable(this.category);
  }

  retryDelay(attempt: number): number {
    return builtinRetryDelay(this.category, attempt);
  }

  categoryName(): string {
    return this.category;
  }

  clone(): ErrorClassifier {
    return new BuiltinClassifier(this.category);
  }
}

/**
 * Classifier with the behaviour of a built-in category
 */
export function builtinClassifier(category: BuiltinCategory): ErrorClassifier {
  return new BuiltinClassifier(category);
}

/**
 * Fallback classifier for deserialized custom errors
 */
export function defaultClassifier(): ErrorClassifier {
  return builtinClassifier(BuiltinCategory.Unknown);
}

export type BuiltinErrorCategory = {
  readonly kind: 'builtin';
  readonly builtin: BuiltinCategory;
};

export type CustomErrorCategory = {
  readonly kind: 'custom';
  readonly classifier: ErrorClassifier;
};

export type ErrorCategory = BuiltinErrorCategory | CustomErrorCategory;

const builtin = (category: BuiltinCategory): BuiltinErrorCategory => ({
  kind: 'builtin',
  builtin: category
});

const custom = (classifier: ErrorClassifier): CustomErrorCategory => ({
  kind: 'custom',
  classifier
});

function isRetriable(category: ErrorCategory): boolean {
  switch (category.kind) {
    case 'builtin':
      return isBuiltinRetriable(category.builtin);
    case 'custom':
      return category.classifier.isRetriable();
  }
}

function retryDelay(category: ErrorCategory, attempt: number): number {
  switch (category.kind) {
    case 'builtin':
      return builtinRetryDelay(category.builtin, attempt);
    case 'custom':
      return category.classifier.retryDelay(attempt);
  }
}

function categoryName(category: ErrorCategory): string {
  switch (category.kind) {
    case 'builtin':
      return category.builtin;
    case 'custom':
      return category.classifier.categoryName();
  }
}

function clone(category: ErrorCategory): ErrorCategory {
  switch (category.kind) {
    case 'builtin':
      return builtin(category.builtin);
    case 'custom':
      return custom(category.classifier.clone());
  }
}

/**
 * Constructors and dispatch for ErrorCategory values
 */
export const ErrorCategory = {
  builtin,
  custom,
  transient: () => builtin(BuiltinCategory.Transient),
  permanent: () => builtin(BuiltinCategory.Permanent),
  resourceExhaustion: () => builtin(BuiltinCategory.ResourceExhaustion),
  network: () => builtin(BuiltinCategory.Network),
  authentication: () => builtin(BuiltinCategory.Authentication),
  validation: () => builtin(BuiltinCategory.Validation),
  internal: () => builtin(BuiltinCategory.Internal),
  serviceUnavailable: () => builtin(BuiltinCategory.ServiceUnavailable),
  unknown: () => builtin(BuiltinCategory.Unknown),
  isRetriable,
  retryDelay,
  categoryName,
  clone
} as const;
