import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { FileStore } from '../GenericFileStore.js'

interface Note {
  id: string
  text: string
}

function isNote(data: unknown): data is Note {
  return (
    typeof data === 'object' &&
    data !== null &&
    'id' in data &&
    typeof data.id === 'string' &&
    'text' in data &&
    typeof data.text === 'string'
  )
}

const TEST_DIR = join(tmpdir(), `ploop-file-store-${Date.now()}`)

describe('FileStore', () => {
  let store: FileStore<Note>

  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true })
    store = new FileStore<Note>({ dir: TEST_DIR, validate: isNote })
  })

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true })
  })

  it('creates its directory', () => {
    expect(existsSync(TEST_DIR)).toBe(true)
  })

  it('round-trips an entity', () => {
    store.setSync('n1', { id: 'n1', text: 'hello' })
    expect(store.getSync('n1')).toEqual({ id: 'n1', text: 'hello' })
  })

  it('returns null for missing and invalid files', () => {
    expect(store.getSync('missing')).toBeNull()
    writeFileSync(join(TEST_DIR, 'bad.json'), '{"id": 1}')
    expect(store.getSync('bad')).toBeNull()
    writeFileSync(join(TEST_DIR, 'broken.json'), '{not json')
    expect(store.getSync('broken')).toBeNull()
  })

  it('updateSync rewrites existing entities only', () => {
    store.setSync('n1', { id: 'n1', text: 'a' })
    expect(store.updateSync('n1', n => ({ ...n, text: 'b' }))).toBe(true)
    expect(store.getSync('n1')?.text).toBe('b')
    expect(store.updateSync('nope', n => n)).toBe(false)
  })
})
