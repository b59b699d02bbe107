/**
 * @retrykit/runtime - Retry engine for RetryKit
 *
 * This package provides:
 * - Result / Outcome types
 * - Failure classification against a transient set
 * - Retry policies and backoff schedules
 * - The retry loop
 *
 * Dependency direction: core → runtime → cli
 */

// Result type
export * from './utils/result.js';

// Error recovery system
export * from './error-recovery/index.js';
