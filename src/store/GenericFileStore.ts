/**
 * Generic JSON file store: one file per entity, named by id.
 */

import { join } from 'path'
import { readJson, writeJson, ensureDir } from './readWriteJson.js'

export interface FileStoreOptions<T> {
  dir: string
  /** Runtime check applied to every read */
  validate: (data: unknown) => data is T
  /** File extension, default .json */
  ext?: string
}

/**
 * @example
 * ```ts
 * const traces = new FileStore<RunTrace>({ dir: getTracesDir(), validate: isRunTrace })
 * traces.setSync(trace.id, trace)
 * ```
 */
export class FileStore<T> {
  private dir: string
  private ext: string
  private validate: (data: unknown) => data is T

  constructor(options: FileStoreOptions<T>) {
    this.dir = options.dir
    this.ext = options.ext ?? '.json'
    this.validate = options.validate
    ensureDir(this.dir)
  }

  private getDataPath(id: string): string {
    return join(this.dir, `${id}${this.ext}`)
  }

  getSync(id: string): T | null {
    return readJson(this.getDataPath(id), this.validate)
  }

  setSync(id: string, data: T): void {
    writeJson(this.getDataPath(id), data)
  }

  /**
   * Read-modify-write. Returns false when the entity does not exist.
   */
  updateSync(id: string, updater: (current: T) => T): boolean {
    const current = this.getSync(id)
    if (current === null) return false
    this.setSync(id, updater(current))
    return true
  }
}
