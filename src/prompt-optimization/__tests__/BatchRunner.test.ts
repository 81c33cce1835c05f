import { describe, it, expect, beforeEach, vi } from 'vitest'
import { BatchRunner, injectInput } from '../BatchRunner.js'
import { VersionStore } from '../VersionStore.js'
import { AppError } from '../../shared/error.js'
import { FakeCompletionClient } from '../../../tests/helpers/fakeCompletionClient.js'
import {
  createTestRepository,
  seedInputs,
  seedSession,
} from '../../../tests/helpers/testRepository.js'
import type { SqliteRepository } from '../../store/SqliteRepository.js'
import type { TraceLogger } from '../../telemetry/types.js'
import type { Input, PromptVersion } from '../../types/index.js'

describe('injectInput', () => {
  it('replaces only the first token', () => {
    expect(injectInput('A {input} B {input}', 'x')).toBe('A x B {input}')
  })

  it('inserts content verbatim', () => {
    expect(injectInput('Q: {input}', 'cost $& more')).toBe('Q: cost $& more')
  })

  it('leaves a prompt without the token unchanged', () => {
    expect(injectInput('no token', 'x')).toBe('no token')
  })
})

describe('BatchRunner', () => {
  let repo: SqliteRepository
  let version: PromptVersion
  let inputs: Input[]

  beforeEach(() => {
    repo = createTestRepository()
    const session = seedSession(repo)
    inputs = seedInputs(repo, session.id, ['great film', 'awful plot', 'fine'])
    version = new VersionStore(repo).createVersion(session.id, 'Classify: {input}', {
      status: 'accepted',
    })
  })

  it('runs inputs in order and persists each result', async () => {
    const client = new FakeCompletionClient(['positive', 'negative', 'neutral'])
    const runner = new BatchRunner({ repo, client, completionOptions: { temperature: 0.2 } })

    const results = await runner.runBatch(
      version.id,
      inputs.map(i => i.id)
    )

    expect(client.calls.map(c => c.prompt)).toEqual([
      'Classify: great film',
      'Classify: awful plot',
      'Classify: fine',
    ])
    expect(client.calls[0]?.options).toEqual({ temperature: 0.2 })
    expect(results.map(r => r.output)).toEqual(['positive', 'negative', 'neutral'])
    expect(results[0]).toMatchObject({ latencyMs: 5, tokensUsed: 10, humanFeedback: null })
    expect(runner.getResultsForVersion(version.id).map(r => r.id)).toEqual(results.map(r => r.id))
  })

  it('records a failed completion and keeps going', async () => {
    const client = new FakeCompletionClient(['positive', { fail: 'rate limited' }, 'neutral'])
    const runner = new BatchRunner({ repo, client })

    const results = await runner.runBatch(
      version.id,
      inputs.map(i => i.id)
    )

    expect(results).toHaveLength(3)
    expect(results[1]).toMatchObject({
      output: 'Error: Completion failed: rate limited',
      latencyMs: 0,
      tokensUsed: 0,
    })
  })

  it('throws before persisting anything for an unknown version', async () => {
    const runner = new BatchRunner({ repo, client: new FakeCompletionClient() })
    const error = await runner.runBatch('missing', [inputs[0]?.id ?? '']).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AppError)
    if (error instanceof AppError) expect(error.code).toBe('VERSION_NOT_FOUND')
    expect(runner.getResultsForInput(inputs[0]?.id ?? '')).toEqual([])
  })

  it('skips missing inputs without a progress call', async () => {
    const runner = new BatchRunner({ repo, client: new FakeCompletionClient() })
    const onProgress = vi.fn()

    const results = await runner.runBatch(
      version.id,
      [inputs[0]?.id ?? '', 'missing', inputs[1]?.id ?? ''],
      { onProgress }
    )

    expect(results).toHaveLength(2)
    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [3, 3],
    ])
  })

  it('stops before the next item once aborted', async () => {
    const controller = new AbortController()
    const runner = new BatchRunner({ repo, client: new FakeCompletionClient() })

    const results = await runner.runBatch(
      version.id,
      inputs.map(i => i.id),
      {
        signal: controller.signal,
        onProgress: position => {
          if (position === 1) controller.abort()
        },
      }
    )

    expect(results).toHaveLength(1)
    expect(runner.getResultsForVersion(version.id)).toHaveLength(1)
  })

  it('duplicates rows on re-run', async () => {
    const runner = new BatchRunner({ repo, client: new FakeCompletionClient() })
    const inputId = inputs[0]?.id ?? ''
    await runner.runSingle(version.id, inputId)
    await runner.runSingle(version.id, inputId)
    expect(runner.getResultsForInput(inputId)).toHaveLength(2)
  })

  it('runSingle throws when the input does not exist', async () => {
    const runner = new BatchRunner({ repo, client: new FakeCompletionClient() })
    await expect(runner.runSingle(version.id, 'missing')).rejects.toThrow(
      'Failed to run prompt on input missing'
    )
  })

  describe('tracing', () => {
    it('stores the trace id for successful runs only', async () => {
      const traceLogger: TraceLogger = {
        logRunTrace: vi.fn().mockResolvedValue('trace-1'),
        logFeedback: vi.fn(),
      }
      const client = new FakeCompletionClient(['positive', { fail: 'timeout' }])
      const runner = new BatchRunner({ repo, client, traceLogger })

      const results = await runner.runBatch(version.id, [inputs[0]?.id ?? '', inputs[1]?.id ?? ''])

      expect(results.map(r => r.traceId)).toEqual(['trace-1', null])
      expect(runner.getResult(results[0]?.id ?? '')?.traceId).toBe('trace-1')
      expect(traceLogger.logRunTrace).toHaveBeenCalledTimes(1)
      expect(traceLogger.logRunTrace).toHaveBeenCalledWith({
        inputContent: 'great film',
        promptText: 'Classify: {input}',
        output: 'positive',
        modelName: 'fake-model',
        promptVersionId: version.id,
        runResultId: results[0]?.id,
      })
    })

    it('ignores trace failures', async () => {
      const traceLogger: TraceLogger = {
        logRunTrace: vi.fn().mockRejectedValue(new Error('sink down')),
        logFeedback: vi.fn(),
      }
      const runner = new BatchRunner({ repo, client: new FakeCompletionClient(), traceLogger })

      const results = await runner.runBatch(version.id, [inputs[0]?.id ?? ''])
      expect(results[0]?.traceId).toBeNull()
      expect(results[0]?.output).toBe('ok')
    })
  })
})
