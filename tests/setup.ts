/**
 * Vitest global setup
 * Removes the temp data dir after the run.
 *
 * PLOOP_DATA_DIR is pointed at a temp dir by vitest.config.ts.
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'

const DATA_DIR = process.env.PLOOP_DATA_DIR || join(tmpdir(), 'ploop-test-data')

// Never clean a non-temp dir
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('ploop-test')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(DATA_DIR)) {
    rmSync(DATA_DIR, { recursive: true, force: true })
  }
})
