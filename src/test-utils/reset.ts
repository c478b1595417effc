/**
 * Test Utilities - Unified Reset
 *
 * Resets the singletons that tie a test to a data directory.
 *
 * ORDER MATTERS:
 * 1. Close the database connection (it was opened under the old data dir)
 * 2. Clear the env cache so ZCTX_HOME is read again
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * afterEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { closeDb } from '../database/index.js';
import { _clearEnvCache } from '../config/index.js';

/**
 * Reset all application singletons for test isolation.
 */
export function resetAll(): void {
  closeDb();
  _clearEnvCache();
}
