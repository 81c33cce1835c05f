import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SqliteRepository } from '../SqliteRepository.js'
import type { PromptVersion, RunResult, Session } from '../../types/index.js'

function session(id: string, updatedAt: string, overrides: Partial<Session> = {}): Session {
  return {
    id,
    name: `session ${id}`,
    taskDescription: 'Classify sentiment',
    modelProvider: 'openrouter',
    modelName: 'test-model',
    modelTemperature: 0.7,
    batchSize: 10,
    status: 'active',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt,
    ...overrides,
  }
}

function version(id: string, sessionId: string, versionNumber: number): PromptVersion {
  return {
    id,
    sessionId,
    versionNumber,
    promptText: 'Classify: {input}',
    status: 'proposed',
    createdAt: '2026-01-01T00:00:00.000Z',
  }
}

function result(id: string, inputId: string, promptVersionId: string): RunResult {
  return {
    id,
    inputId,
    promptVersionId,
    output: 'positive',
    latencyMs: 5,
    tokensUsed: 10,
    humanFeedback: null,
    feedbackReason: null,
    humanCorrection: null,
    comparisonResult: null,
    traceId: null,
    createdAt: '2026-01-01T00:00:00.000Z',
  }
}

describe('SqliteRepository', () => {
  let repo: SqliteRepository

  beforeEach(() => {
    repo = new SqliteRepository(':memory:')
  })

  afterEach(() => {
    repo.close()
  })

  describe('sessions', () => {
    it('round-trips optional fields as undefined', () => {
      repo.insertSession(session('s1', '2026-01-01T00:00:00.000Z'))
      const loaded = repo.getSession('s1')
      expect(loaded?.outputDescription).toBeUndefined()
      expect(loaded?.status).toBe('active')
    })

    it('lists newest update first, filtered by status', () => {
      repo.insertSession(session('old', '2026-01-01T00:00:00.000Z'))
      repo.insertSession(session('new', '2026-02-01T00:00:00.000Z'))
      repo.insertSession(session('done', '2026-03-01T00:00:00.000Z', { status: 'completed' }))

      expect(repo.listSessions({ limit: 50 }).map(s => s.id)).toEqual(['done', 'new', 'old'])
      expect(repo.listSessions({ status: 'active', limit: 1 }).map(s => s.id)).toEqual(['new'])
    })

    it('updates only the given fields', () => {
      repo.insertSession(session('s1', '2026-01-01T00:00:00.000Z'))
      const updated = repo.updateSession('s1', { batchSize: 3 }, '2026-05-01T00:00:00.000Z')
      expect(updated?.batchSize).toBe(3)
      expect(updated?.name).toBe('session s1')
      expect(repo.getSession('s1')?.updatedAt).toBe('2026-05-01T00:00:00.000Z')
      expect(repo.updateSession('missing', { batchSize: 3 }, 'x')).toBeNull()
    })

    it('cascades deletes to inputs, versions and results', () => {
      repo.insertSession(session('s1', '2026-01-01T00:00:00.000Z'))
      repo.insertInputs([{ id: 'i1', sessionId: 's1', content: 'a', createdAt: 'x' }])
      repo.insertVersion(version('v1', 's1', 1))
      repo.insertResult(result('r1', 'i1', 'v1'))

      expect(repo.deleteSession('s1')).toBe(true)
      expect(repo.getInput('i1')).toBeNull()
      expect(repo.getVersion('v1')).toBeNull()
      expect(repo.getResult('r1')).toBeNull()
      expect(repo.deleteSession('s1')).toBe(false)
    })
  })

  describe('inputs', () => {
    beforeEach(() => {
      repo.insertInputs([
        { id: 'i1', sessionId: 's1', content: 'a', createdAt: '2026-01-01T00:00:00.000Z' },
        { id: 'i2', sessionId: 's1', content: 'b', createdAt: '2026-01-01T00:00:00.000Z' },
        {
          id: 'i3',
          sessionId: 's1',
          content: 'c',
          metadata: { source: 'test' },
          createdAt: '2026-01-01T00:00:00.000Z',
        },
        { id: 'other', sessionId: 's2', content: 'z', createdAt: '2026-01-01T00:00:00.000Z' },
      ])
    })

    it('keeps insertion order for equal timestamps', () => {
      expect(repo.listInputs('s1', { offset: 0 }).map(i => i.id)).toEqual(['i1', 'i2', 'i3'])
      expect(repo.listInputs('s1', { limit: 1, offset: 1 }).map(i => i.id)).toEqual(['i2'])
      expect(repo.countInputs('s1')).toBe(3)
    })

    it('stores metadata as JSON', () => {
      expect(repo.getInput('i3')?.metadata).toEqual({ source: 'test' })
      expect(repo.getInput('i1')?.metadata).toBeUndefined()
    })

    it('lists inputs outside an exclusion set', () => {
      expect(repo.listInputsExcluding('s1', 10, ['i1']).map(i => i.id)).toEqual(['i2', 'i3'])
      expect(repo.listInputsExcluding('s1', 1, []).map(i => i.id)).toEqual(['i1'])
    })

    it('deletes one input', () => {
      expect(repo.deleteInput('i2')).toBe(true)
      expect(repo.deleteInput('i2')).toBe(false)
      expect(repo.countInputs('s1')).toBe(2)
    })
  })

  describe('versions', () => {
    it('reports the highest number, 0 when empty', () => {
      expect(repo.getMaxVersionNumber('s1')).toBe(0)
      repo.insertVersion(version('v1', 's1', 1))
      repo.insertVersion(version('v2', 's1', 2))
      expect(repo.getMaxVersionNumber('s1')).toBe(2)
    })

    it('rejects a duplicate number within a session', () => {
      repo.insertVersion(version('v1', 's1', 1))
      expect(() => repo.insertVersion(version('dup', 's1', 1))).toThrow(/UNIQUE/)
      repo.insertVersion(version('other', 's2', 1))
    })

    it('finds the top version by status', () => {
      repo.insertVersion({ ...version('v1', 's1', 1), status: 'accepted' })
      repo.insertVersion({ ...version('v2', 's1', 2), status: 'rejected' })
      expect(repo.getTopVersion('s1')?.id).toBe('v2')
      expect(repo.getTopVersion('s1', 'accepted')?.id).toBe('v1')
      expect(repo.getTopVersion('s1', 'proposed')).toBeNull()
    })

    it('updates status', () => {
      repo.insertVersion(version('v1', 's1', 1))
      expect(repo.updateVersionStatus('v1', 'rejected')?.status).toBe('rejected')
      expect(repo.updateVersionStatus('missing', 'rejected')).toBeNull()
    })
  })

  describe('results', () => {
    it('patches only the given fields and may clear them', () => {
      repo.insertResult(result('r1', 'i1', 'v1'))
      repo.updateResult('r1', { humanFeedback: 'bad', feedbackReason: 'too verbose' })
      const patched = repo.updateResult('r1', { traceId: 't1' })
      expect(patched?.humanFeedback).toBe('bad')
      expect(patched?.feedbackReason).toBe('too verbose')
      expect(patched?.traceId).toBe('t1')

      const cleared = repo.updateResult('r1', { feedbackReason: null })
      expect(cleared?.feedbackReason).toBeNull()
      expect(repo.getResult('r1')?.feedbackReason).toBeNull()
    })

    it('lists by version and by input in insertion order', () => {
      repo.insertResult(result('r1', 'i1', 'v1'))
      repo.insertResult(result('r2', 'i2', 'v1'))
      repo.insertResult(result('r3', 'i1', 'v2'))
      expect(repo.listResultsForVersion('v1').map(r => r.id)).toEqual(['r1', 'r2'])
      expect(repo.listResultsForInput('i1').map(r => r.id)).toEqual(['r1', 'r3'])
    })
  })
})
