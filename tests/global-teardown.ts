/**
 * Vitest Global Teardown
 *
 * Cleans up leaked temporary directories from test runs.
 * Test cleanup hooks don't execute when processes are killed,
 * so this ensures temp dirs are cleaned up after all tests complete.
 *
 * @module tests/global-teardown
 */

import { readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

/** Prefix of every temp directory created through tests/helpers.ts */
const TEMP_DIR_PREFIX = 'docchat-test-';

export function teardown(): void {
  const tmp = tmpdir();
  let entries: string[];

  try {
    entries = readdirSync(tmp);
  } catch (error) {
    console.error(`[global-teardown] Cannot read ${tmp}: ${String(error)}`);
    return;
  }

  let cleaned = 0;
  for (const entry of entries) {
    if (!entry.startsWith(TEMP_DIR_PREFIX)) continue;
    try {
      rmSync(join(tmp, entry), { recursive: true, force: true });
      cleaned++;
    } catch {
      // Best-effort cleanup - ignore errors from locked files
    }
  }

  if (cleaned > 0) {
    // Use stderr to avoid polluting JSON-RPC stdout
    console.error(`[global-teardown] Cleaned ${cleaned} leaked temp directories`);
  }
}
