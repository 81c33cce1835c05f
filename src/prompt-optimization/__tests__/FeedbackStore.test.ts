import { describe, it, expect, beforeEach, vi } from 'vitest'
import { FeedbackStore } from '../FeedbackStore.js'
import { BatchRunner } from '../BatchRunner.js'
import { VersionStore } from '../VersionStore.js'
import { FakeCompletionClient } from '../../../tests/helpers/fakeCompletionClient.js'
import {
  createTestRepository,
  seedInputs,
  seedSession,
} from '../../../tests/helpers/testRepository.js'
import type { SqliteRepository } from '../../store/SqliteRepository.js'
import type { TraceLogger } from '../../telemetry/types.js'
import type { RunResult } from '../../types/index.js'

describe('FeedbackStore', () => {
  let repo: SqliteRepository
  let versionId: string
  let results: RunResult[]

  beforeEach(async () => {
    repo = createTestRepository()
    const session = seedSession(repo)
    const inputs = seedInputs(repo, session.id, ['great film', 'awful plot', 'fine'])
    versionId = new VersionStore(repo).createVersion(session.id, 'Classify: {input}').id
    const runner = new BatchRunner({
      repo,
      client: new FakeCompletionClient(['positive', 'The sentiment is negative.', 'neutral']),
    })
    results = await runner.runBatch(
      versionId,
      inputs.map(i => i.id)
    )
  })

  function resultId(index: number): string {
    return results[index]?.id ?? ''
  }

  it('overwrites all three fields together', async () => {
    const feedback = new FeedbackStore(repo)
    await feedback.updateFeedback(resultId(1), 'bad', 'too verbose', 'negative')
    const updated = await feedback.updateFeedback(resultId(1), 'good')

    expect(updated).toMatchObject({
      humanFeedback: 'good',
      feedbackReason: null,
      humanCorrection: null,
    })
  })

  it('returns null for an unknown result', async () => {
    expect(await new FeedbackStore(repo).updateFeedback('missing', 'good')).toBeNull()
  })

  it('summarizes a version', async () => {
    const feedback = new FeedbackStore(repo)
    await feedback.updateFeedback(resultId(0), 'good')
    await feedback.updateFeedback(resultId(1), 'bad', 'too verbose')

    expect(feedback.getFeedbackSummary(versionId)).toEqual({
      good: 1,
      bad: 1,
      pending: 1,
      total: 3,
    })
  })

  it('collects judged items with their input text', async () => {
    const feedback = new FeedbackStore(repo)
    await feedback.updateFeedback(resultId(0), 'good')
    await feedback.updateFeedback(resultId(1), 'bad', 'too verbose', 'negative')

    expect(feedback.collectFeedbackItems(versionId)).toEqual([
      {
        input: 'great film',
        output: 'positive',
        feedback: 'good',
        reason: undefined,
        correction: undefined,
      },
      {
        input: 'awful plot',
        output: 'The sentiment is negative.',
        feedback: 'bad',
        reason: 'too verbose',
        correction: 'negative',
      },
    ])
  })

  it('skips results whose input was deleted', async () => {
    const feedback = new FeedbackStore(repo)
    await feedback.updateFeedback(resultId(0), 'good')
    repo.deleteInput(results[0]?.inputId ?? '')
    expect(feedback.collectFeedbackItems(versionId)).toEqual([])
  })

  describe('with a trace logger', () => {
    it('logs an assessment when the result has a trace', async () => {
      const traceLogger: TraceLogger = {
        logRunTrace: vi.fn(),
        logFeedback: vi.fn().mockResolvedValue(undefined),
      }
      repo.updateResult(resultId(1), { traceId: 'trace-2' })
      const feedback = new FeedbackStore(repo, traceLogger)

      await feedback.updateFeedback(resultId(1), 'bad', 'too verbose')
      await feedback.updateFeedback(resultId(0), 'good')

      expect(traceLogger.logFeedback).toHaveBeenCalledTimes(1)
      expect(traceLogger.logFeedback).toHaveBeenCalledWith({
        traceId: 'trace-2',
        isGood: false,
        reason: 'too verbose',
        correction: null,
      })
    })

    it('still saves feedback when logging fails', async () => {
      const traceLogger: TraceLogger = {
        logRunTrace: vi.fn(),
        logFeedback: vi.fn().mockRejectedValue(new Error('sink down')),
      }
      repo.updateResult(resultId(0), { traceId: 'trace-1' })
      const feedback = new FeedbackStore(repo, traceLogger)

      const updated = await feedback.updateFeedback(resultId(0), 'good')
      expect(updated?.humanFeedback).toBe('good')
    })
  })
})
