/**
 * @faultline/core - Error classification for Faultline
 *
 * This package provides the error taxonomy, categories, error contexts
 * and process-wide error settings. It never sleeps or retries.
 *
 * Dependency direction: core → runtime
 */

// Categories and classifiers
export * from './category.js';
// Error occurrence records
export * from './context.js';
// Error taxonomy
export * from './errors/index.js';
// Logger interface
export * from './logger.js';
// Wire schemas
export * from './schemas.js';
// Process-wide settings
export * from './settings.js';
// Result helpers
export * from './utils/result.js';
