/**
 * Storage paths
 *
 * Data directory priority:
 * 1. env PLOOP_DATA_DIR
 * 2. default .promptloop under cwd
 */

import { join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.promptloop'

export function getDataDir(): string {
  const envDir = process.env.PLOOP_DATA_DIR
  if (envDir) {
    return envDir.startsWith('/') ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

export const FILE_NAMES = {
  DATABASE: 'promptloop.db',
} as const

export const DIR_NAMES = {
  TRACES: 'traces',
} as const

/**
 * SQLite path: configured path, then PLOOP_DATABASE_PATH, then <data dir>/promptloop.db
 */
export function getDatabasePath(configured?: string): string {
  if (configured) return configured
  const envPath = process.env.PLOOP_DATABASE_PATH
  if (envPath) return envPath
  return join(getDataDir(), FILE_NAMES.DATABASE)
}

export function getTracesDir(): string {
  return join(getDataDir(), DIR_NAMES.TRACES)
}
