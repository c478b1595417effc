/**
 * Test Utilities - Running a Command
 */

import { Command } from 'commander';

/**
 * Parse argv against a single command mounted on a fresh program.
 * Commander errors throw instead of exiting the process.
 */
export async function runCommand(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  command.exitOverride();
  program.addCommand(command);
  await program.parseAsync(['node', 'zctx', ...args]);
}
