/**
 * @wdkeeper/core - Shared types, contracts and configuration for wdkeeper
 *
 * This package has no side effects.
 * Dependency direction: core → lifecycle → cli
 */

// Constants
export * from './constants.js';
// Error system
export * from './errors/index.js';
// Logger interface
export * from './logger.js';
// Configuration schemas
export * from './schemas.js';
// Endpoint and lifecycle types
export * from './types/index.js';
// Result helpers
export * from './utils/result.js';
// Environment expansion
export * from './utils/env-expander.js';
