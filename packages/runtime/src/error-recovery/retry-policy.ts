/**
 * Retry policies
 *
 * Standalone backoff calculator. It only computes delays; waiting and
 * looping stay with the caller.
 */

/**
 * Retry policy configuration
 */
export type RetryPolicyConfig = {
  /** Maximum number of retry attempts */
  maxAttempts: number;

  /** Delay before the first retry in milliseconds */
  baseDelay: number;

  /** Upper bound for a computed delay in milliseconds */
  maxDelay: number;

  /** Backoff multiplier */
  backoffMultiplier: number;

  /** Scale delays by a random factor in [0.75, 1.25) */
  jitter: boolean;
};

const JITTER_MIN = 0.75;
const JITTER_SPREAD = 0.5;

/**
 * Predefined retry policies
 */
export const RetryPolicies = {
  /** Quick operations */
  fast: {
    maxAttempts: 3,
    baseDelay: 50,
    maxDelay: 1000,
    backoffMultiplier: 1.5,
    jitter: true
  },

  /** Default for most operations */
  standard: {
    maxAttempts: 3,
    baseDelay: 100,
    maxDelay: 30000,
    backoffMultiplier: 2,
    jitter: true
  },

  /** Expensive operations */
  slow: {
    maxAttempts: 5,
    baseDelay: 500,
    maxDelay: 60000,
    backoffMultiplier: 2,
    jitter: true
  },

  network: {
    maxAttempts: 4,
    baseDelay: 250,
    maxDelay: 30000,
    backoffMultiplier: 2,
    jitter: true
  },

  database: {
    maxAttempts: 3,
    baseDelay: 100,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true
  }
} as const satisfies Record<string, RetryPolicyConfig>;

export type RetryPolicyName = keyof typeof RetryPolicies;

/**
 * Calculate delay for a retry attempt (1-based; 0 means no wait)
 */
export function calculateDelay(attempt: number, config: RetryPolicyConfig): number {
  if (attempt <= 0) return 0;

  // Exponential backoff, whole milliseconds
  const exponential = Math.floor(config.baseDelay * config.backoffMultiplier ** (attempt - 1));

  // Cap at maximum delay
  let delay = Number.isNaN(exponential) ? 0 : Math.min(exponential, config.maxDelay);

  if (config.jitter) {
    const factor = JITTER_MIN + Math.random() * JITTER_SPREAD;
    // Flooring must not take the delay below the lower jitter bound
    delay = Math.max(Math.floor(delay * factor), Math.ceil(delay * JITTER_MIN));
  }

  return delay;
}

/**
 * Check if should retry based on attempt count (0-based)
 */
export function shouldRetry(attempt: number, config: RetryPolicyConfig): boolean {
  return attempt < config.maxAttempts;
}

/**
 * Create a policy configuration on top of the standard one
 */
export function createRetryPolicyConfig(
  options: Partial<RetryPolicyConfig> = {}
): RetryPolicyConfig {
  const defaults = RetryPolicies.standard;
  return {
    maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
    baseDelay: options.baseDelay ?? defaults.baseDelay,
    maxDelay: options.maxDelay ?? defaults.maxDelay,
    backoffMultiplier: options.backoffMultiplier ?? defaults.backoffMultiplier,
    jitter: options.jitter ?? defaults.jitter
  };
}

/**
 * Immutable retry policy with builder-style setters
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly backoffMultiplier: number;
  readonly jitter: boolean;

  constructor(options: Partial<RetryPolicyConfig> = {}) {
    const config = createRetryPolicyConfig(options);
    this.maxAttempts = config.maxAttempts;
    this.baseDelay = config.baseDelay;
    this.maxDelay = config.maxDelay;
    this.backoffMultiplier = config.backoffMultiplier;
    this.jitter = config.jitter;
  }

  static fast(): RetryPolicy {
    return new RetryPolicy(RetryPolicies.fast);
  }

  static standard(): RetryPolicy {
    return new RetryPolicy();
  }

  static slow(): RetryPolicy {
    return new RetryPolicy(RetryPolicies.slow);
  }

  static network(): RetryPolicy {
    return new RetryPolicy(RetryPolicies.network);
  }

  static database(): RetryPolicy {
    return new RetryPolicy(RetryPolicies.database);
  }

  static preset(name: RetryPolicyName): RetryPolicy {
    return new RetryPolicy(RetryPolicies[name]);
  }

  withMaxAttempts(maxAttempts: number): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), maxAttempts });
  }

  withBaseDelay(baseDelay: number): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), baseDelay });
  }

  withMaxDelay(maxDelay: number): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), maxDelay });
  }

  withBackoffMultiplier(backoffMultiplier: number): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), backoffMultiplier });
  }

  withJitter(jitter: boolean): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), jitter });
  }

  calculateDelay(attempt: number): number {
    return calculateDelay(attempt, this);
  }

  shouldRetry(attempt: number): boolean {
    return shouldRetry(attempt, this);
  }

  toConfig(): RetryPolicyConfig {
    return {
      maxAttempts: this.maxAttempts,
      baseDelay: this.baseDelay,
      maxDelay: this.maxDelay,
      backoffMultiplier: this.backoffMultiplier,
      jitter: this.jitter
    };
  }
}
