/**
 * Run one prompt version over a list of inputs
 *
 * Items run strictly in order, one completion at a time. A failed completion
 * becomes an "Error: ..." result and the batch moves on. Each result is
 * persisted as soon as it exists, so an interrupted batch leaves a prefix.
 */

import { AppError } from '../shared/error.js'
import { getErrorMessage, ensureError } from '../shared/assertError.js'
import { generateId } from '../shared/generateId.js'
import { createLogger, logError } from '../shared/logger.js'
import type { CompletionClient, CompletionOptions } from '../backend/types.js'
import type { RefinementRepository } from '../store/types.js'
import type { TraceLogger } from '../telemetry/types.js'
import type { RunResult } from '../types/runResult.js'

const logger = createLogger('batch-runner')

/** Replaced once with the raw input content, no escaping */
export const INPUT_TOKEN = '{input}'

export interface BatchRunnerDeps {
  repo: RefinementRepository
  client: CompletionClient
  traceLogger?: TraceLogger
  /** Model and temperature for every run, e.g. from the session */
  completionOptions?: CompletionOptions
}

export interface RunBatchOptions {
  /** Called after each processed item with its 1-based position in `inputIds` */
  onProgress?: (position: number, total: number) => void
  /** Checked between items; a call in flight is never interrupted */
  signal?: AbortSignal
}

export function injectInput(promptText: string, content: string): string {
  // Function replacer so `$&` and friends in content stay literal
  return promptText.replace(INPUT_TOKEN, () => content)
}

export class BatchRunner {
  private readonly repo: RefinementRepository
  private readonly client: CompletionClient
  private readonly traceLogger?: TraceLogger
  private readonly completionOptions: CompletionOptions

  constructor(deps: BatchRunnerDeps) {
    this.repo = deps.repo
    this.client = deps.client
    this.traceLogger = deps.traceLogger
    this.completionOptions = deps.completionOptions ?? {}
  }

  /**
   * @throws AppError VERSION_NOT_FOUND before anything is persisted
   */
  async runBatch(
    versionId: string,
    inputIds: string[],
    options: RunBatchOptions = {}
  ): Promise<RunResult[]> {
    const version = this.repo.getVersion(versionId)
    if (!version) {
      throw AppError.versionNotFound(versionId)
    }

    const results: RunResult[] = []
    const total = inputIds.length
    logger.info(`Running v${version.versionNumber} on ${total} input(s)`)

    for (const [index, inputId] of inputIds.entries()) {
      if (options.signal?.aborted) {
        logger.info(`Batch stopped after ${results.length} result(s)`)
        break
      }

      const input = this.repo.getInput(inputId)
      if (!input) continue

      const prompt = injectInput(version.promptText, input.content)

      let output: string
      let latencyMs = 0
      let tokensUsed = 0
      let failed = false
      try {
        const response = await this.client.complete(prompt, this.completionOptions)
        output = response.text
        latencyMs = response.latencyMs
        tokensUsed = response.tokensUsed
      } catch (error) {
        failed = true
        output = `Error: ${getErrorMessage(error)}`
        logger.warn(`Input ${inputId} failed: ${getErrorMessage(error)}`)
      }

      let result: RunResult = {
        id: generateId(),
        inputId,
        promptVersionId: versionId,
        output,
        latencyMs,
        tokensUsed,
        humanFeedback: null,
        feedbackReason: null,
        humanCorrection: null,
        comparisonResult: null,
        traceId: null,
        createdAt: new Date().toISOString(),
      }
      this.repo.insertResult(result)

      if (this.traceLogger && !failed) {
        result = await this.attachTrace(result, input.content, version.promptText)
      }

      results.push(result)
      options.onProgress?.(index + 1, total)
    }

    return results
  }

  /**
   * @throws AppError RUN_PRODUCED_NO_RESULT when the input does not exist
   */
  async runSingle(versionId: string, inputId: string): Promise<RunResult> {
    const [result] = await this.runBatch(versionId, [inputId])
    if (!result) {
      throw AppError.runProducedNoResult(inputId)
    }
    return result
  }

  getResultsForVersion(versionId: string): RunResult[] {
    return this.repo.listResultsForVersion(versionId)
  }

  getResultsForInput(inputId: string): RunResult[] {
    return this.repo.listResultsForInput(inputId)
  }

  getResult(resultId: string): RunResult | null {
    return this.repo.getResult(resultId)
  }

  /** Best-effort; returns the result unchanged when tracing fails */
  private async attachTrace(
    result: RunResult,
    inputContent: string,
    promptText: string
  ): Promise<RunResult> {
    if (!this.traceLogger) return result
    try {
      const traceId = await this.traceLogger.logRunTrace({
        inputContent,
        promptText,
        output: result.output,
        modelName: this.completionOptions.model ?? this.client.defaultModel,
        promptVersionId: result.promptVersionId,
        runResultId: result.id,
      })
      return this.repo.updateResult(result.id, { traceId }) ?? result
    } catch (error) {
      logError(logger, 'Trace logging failed', ensureError(error), { resultId: result.id })
      return result
    }
  }
}
