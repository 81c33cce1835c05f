import { describe, it, expect, beforeEach } from 'vitest'
import { VersionStore } from '../VersionStore.js'
import { createTestRepository } from '../../../tests/helpers/testRepository.js'

describe('VersionStore', () => {
  let versions: VersionStore

  beforeEach(() => {
    versions = new VersionStore(createTestRepository())
  })

  it('numbers versions per session starting at 1', () => {
    const v1 = versions.createVersion('s1', 'A {input}')
    const v2 = versions.createVersion('s1', 'B {input}')
    const other = versions.createVersion('s2', 'C {input}')

    expect([v1.versionNumber, v2.versionNumber, other.versionNumber]).toEqual([1, 2, 1])
    expect(v1.status).toBe('proposed')
  })

  it('distinguishes current (accepted) from latest (any status)', () => {
    const v1 = versions.createVersion('s1', 'A {input}', { status: 'accepted' })
    const v2 = versions.createVersion('s1', 'B {input}', {
      parentVersionId: v1.id,
      status: 'rejected',
    })

    expect(versions.getCurrentVersion('s1')?.id).toBe(v1.id)
    expect(versions.getLatestVersion('s1')?.id).toBe(v2.id)
    expect(versions.getCurrentVersion('empty')).toBeNull()
  })

  it('returns history in ascending order', () => {
    versions.createVersion('s1', 'A')
    versions.createVersion('s1', 'B')
    versions.createVersion('s1', 'C')
    expect(versions.getVersionHistory('s1').map(v => v.promptText)).toEqual(['A', 'B', 'C'])
  })

  it('allows any status transition', () => {
    const v1 = versions.createVersion('s1', 'A', { status: 'rejected' })
    expect(versions.updateStatus(v1.id, 'accepted')?.status).toBe('accepted')
    expect(versions.updateStatus('missing', 'accepted')).toBeNull()
  })

  it('diffs two versions and yields [] when one is missing', () => {
    const v1 = versions.createVersion('s1', 'keep\nold')
    const v2 = versions.createVersion('s1', 'keep\nnew')

    expect(versions.diff(v1.id, v2.id)).toEqual([
      { type: 'unchanged', text: 'keep' },
      { type: 'removed', text: 'old' },
      { type: 'added', text: 'new' },
    ])
    expect(versions.diff(v1.id, 'missing')).toEqual([])
  })

  it('walks the lineage from the root', () => {
    const v1 = versions.createVersion('s1', 'A', { status: 'accepted' })
    const v2 = versions.createVersion('s1', 'B', { parentVersionId: v1.id, status: 'accepted' })
    const v3 = versions.createVersion('s1', 'C', { parentVersionId: v2.id })

    expect(versions.getLineage(v3.id).map(v => v.versionNumber)).toEqual([1, 2, 3])
    expect(versions.getLineage('missing')).toEqual([])
  })
})
