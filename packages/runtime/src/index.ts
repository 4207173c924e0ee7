/**
 * @faultline/runtime - Retry policies for Faultline
 *
 * This package provides:
 * - Configurable backoff policies with presets
 * - Retry outcome classification for caller-owned retry loops
 *
 * Dependency direction: core → runtime
 */

// Error recovery system
export * from './error-recovery/index.js';
