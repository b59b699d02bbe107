/**
 * @retrykit/core - Core types for RetryKit
 *
 * Failure kinds, failure values, policy schemas and the logger interface.
 * This package has no side effects.
 *
 * Dependency direction: core → runtime → cli
 */

// Error system
export * from './errors/index.js';
// Failure kinds and values
export * from './failures.js';
// Logger interface
export * from './logger.js';
// Policy schemas
export * from './schemas.js';
