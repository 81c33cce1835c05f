/**
 * JSON file helpers with atomic writes
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('json-io')

/**
 * Read and validate a JSON file.
 *
 * @returns the parsed value, or null when the file is missing, unparsable or fails `validate`
 */
export function readJson<T>(filepath: string, validate: (data: unknown) => data is T): T | null {
  if (!existsSync(filepath)) return null
  try {
    const parsed: unknown = JSON.parse(readFileSync(filepath, 'utf-8'))
    if (!validate(parsed)) {
      logger.warn(`JSON validation failed: ${filepath}`)
      return null
    }
    return parsed
  } catch (e) {
    logger.debug(`Failed to read JSON: ${filepath} (${getErrorMessage(e)})`)
    return null
  }
}

/**
 * Write JSON. Atomic by default: temp file, then rename.
 */
export function writeJson(filepath: string, data: unknown, options?: { atomic?: boolean }): void {
  const atomic = options?.atomic ?? true
  const content = JSON.stringify(data, null, 2)

  ensureDir(dirname(filepath))

  if (atomic) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
