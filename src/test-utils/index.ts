/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestContext, useTempHome } from '../test-utils/index.js';
 *
 * let home: TempHome;
 * beforeEach(() => { home = useTempHome(); });
 * afterEach(() => home.cleanup());
 * ```
 */

export { resetAll } from './reset.js';
export { useTempHome, type TempHome } from './home.js';
export { createTestContext, type RecordedOutput } from './context.js';
export { runCommand } from './command.js';
