/**
 * Test Utilities - Temporary Data Directory
 *
 * Points ZCTX_HOME at a fresh temp directory so commands open their own
 * database and config file.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { resetAll } from './reset.js';

export interface TempHome {
  dir: string;
  /** Close the database, restore ZCTX_HOME and delete the directory */
  cleanup: () => void;
}

/**
 * Create a temp data directory and make it the active ZCTX_HOME.
 */
export function useTempHome(prefix = 'zctx-test-'): TempHome {
  const previous = process.env['ZCTX_HOME'];
  const dir = mkdtempSync(join(tmpdir(), prefix));
  resetAll();
  process.env['ZCTX_HOME'] = dir;

  return {
    dir,
    cleanup: () => {
      resetAll();
      if (previous === undefined) {
        delete process.env['ZCTX_HOME'];
      } else {
        process.env['ZCTX_HOME'] = previous;
      }
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
