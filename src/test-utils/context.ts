/**
 * Test Utilities - Command Context
 *
 * A CommandContext that records every message instead of printing it.
 */

import type { CommandContext, GlobalOptions } from '../cli/types.js';

export interface RecordedOutput {
  log: string[];
  debug: string[];
  warn: string[];
  error: string[];
}

/**
 * Create a recording CommandContext.
 *
 * @example
 * ```typescript
 * const { ctx, output } = createTestContext();
 * await runCommand(createStatusCommand(() => ctx), ['status']);
 * expect(output.log.join('\n')).toContain('Passages:');
 * ```
 */
export function createTestContext(options: Partial<GlobalOptions> = {}): {
  ctx: CommandContext;
  output: RecordedOutput;
} {
  const output: RecordedOutput = { log: [], debug: [], warn: [], error: [] };
  const ctx: CommandContext = {
    options: { verbose: options.verbose ?? false, json: options.json ?? false },
    log: (message) => output.log.push(message),
    debug: (message) => output.debug.push(message),
    warn: (message) => output.warn.push(message),
    error: (message) => output.error.push(message),
  };
  return { ctx, output };
}
