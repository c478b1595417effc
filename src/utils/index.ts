/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Logging
export { silentLogger, describeError, type Logger } from './logger.js';

// Safe JSON parsing
export { safeJsonParse } from './json.js';

// Hashing for stable identifiers and cache keys
export { sha256, stableStringify } from './hash.js';

// Promise timeouts
export { withTimeout } from './timeout.js';
