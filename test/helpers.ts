/**
 * @fileoverview Shared test helpers
 * @module test/helpers
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Creates a temporary directory that is removed after the current test.
 */
export function makeTempDir(prefix = 'gemini-quickstart-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  registerTestCleanup(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}
