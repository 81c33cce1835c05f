/**
 * Human good/bad review of run results
 */

import { ensureError } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import type { RefinementRepository } from '../store/types.js'
import type { TraceLogger } from '../telemetry/types.js'
import type { FeedbackItem, FeedbackSummary, HumanFeedback, RunResult } from '../types/index.js'

const logger = createLogger('feedback')

export class FeedbackStore {
  constructor(
    private readonly repo: RefinementRepository,
    private readonly traceLogger?: TraceLogger
  ) {}

  /**
   * Overwrites feedback, reason and correction together; omitted ones become null.
   * Returns null when the result does not exist.
   */
  async updateFeedback(
    resultId: string,
    humanFeedback: HumanFeedback | null,
    reason?: string | null,
    correction?: string | null
  ): Promise<RunResult | null> {
    const updated = this.repo.updateResult(resultId, {
      humanFeedback,
      feedbackReason: reason ?? null,
      humanCorrection: correction ?? null,
    })
    if (!updated) return null

    if (this.traceLogger && updated.traceId && humanFeedback) {
      try {
        await this.traceLogger.logFeedback({
          traceId: updated.traceId,
          isGood: humanFeedback === 'good',
          reason: updated.feedbackReason,
          correction: updated.humanCorrection,
        })
      } catch (error) {
        logError(logger, 'Feedback assessment not recorded', ensureError(error), { resultId })
      }
    }

    return updated
  }

  getFeedbackSummary(versionId: string): FeedbackSummary {
    const results = this.repo.listResultsForVersion(versionId)
    const good = results.filter(r => r.humanFeedback === 'good').length
    const bad = results.filter(r => r.humanFeedback === 'bad').length
    return { good, bad, pending: results.length - good - bad, total: results.length }
  }

  /** Judged results of a version paired with their input text */
  collectFeedbackItems(versionId: string): FeedbackItem[] {
    const items: FeedbackItem[] = []
    for (const result of this.repo.listResultsForVersion(versionId)) {
      if (!result.humanFeedback) continue
      const input = this.repo.getInput(result.inputId)
      if (!input) {
        logger.debug(`Skipping result ${result.id}: input ${result.inputId} is gone`)
        continue
      }
      items.push({
        input: input.content,
        output: result.output,
        feedback: result.humanFeedback,
        reason: result.feedbackReason ?? undefined,
        correction: result.humanCorrection ?? undefined,
      })
    }
    return items
  }
}
