/**
 * Reflection-based prompt mutation
 *
 * One completion per proposal: the model sees the task, the current prompt
 * and the reviewed outputs, and answers with ANALYSIS / CHANGES / NEW PROMPT.
 * Proposing never changes state; only acceptMutation advances the prompt.
 */

import { createLogger } from '../shared/logger.js'
import { buildReflectionPrompt, formatFeedbackText } from './feedbackText.js'
import { buildExplanation, parseReflection } from './parseReflection.js'
import type { CompletionClient, CompletionOptions } from '../backend/types.js'
import type { FeedbackBatchSummary, FeedbackItem, MutationProposal } from '../types/feedback.js'

const logger = createLogger('mutation')

export interface MutationProposerOptions {
  client: CompletionClient
  initialPrompt: string
  taskDescription: string
  /** Model and temperature for the reflection call */
  reflectionOptions?: CompletionOptions
}

export class MutationProposer {
  private readonly client: CompletionClient
  private readonly reflectionOptions: CompletionOptions

  currentPrompt: string
  readonly taskDescription: string
  /** Set by the workflow from judge alignment; '' when unknown */
  accumulatedPrinciples = ''
  iterationCount = 0
  private readonly history: string[]

  constructor(options: MutationProposerOptions) {
    this.client = options.client
    this.reflectionOptions = options.reflectionOptions ?? {}
    this.currentPrompt = options.initialPrompt
    this.taskDescription = options.taskDescription
    this.history = [options.initialPrompt]
  }

  /** Every accepted prompt, starting with the initial one */
  get proposalHistory(): readonly string[] {
    return this.history
  }

  /**
   * @throws CompletionError when the reflection call fails
   */
  async proposeMutation(feedbackBatch: FeedbackItem[]): Promise<MutationProposal> {
    const reflectionPrompt = buildReflectionPrompt({
      taskDescription: this.taskDescription,
      currentPrompt: this.currentPrompt,
      feedbackText: formatFeedbackText(feedbackBatch),
      principles: this.accumulatedPrinciples || undefined,
    })

    logger.info(`Reflecting on ${feedbackBatch.length} reviewed output(s)`)
    const response = await this.client.complete(reflectionPrompt, this.reflectionOptions)
    const parsed = parseReflection(response.text, this.currentPrompt)

    if (parsed.usedFallback) {
      logger.warn(`No NEW PROMPT section found, using ${parsed.promptSource} prompt`)
    }

    return {
      currentPrompt: this.currentPrompt,
      newPrompt: parsed.newPrompt,
      explanation: buildExplanation(parsed.changes),
      analysis: parsed.analysis,
      changes: parsed.changes,
      usedFallback: parsed.usedFallback,
    }
  }

  acceptMutation(proposal: MutationProposal): void {
    this.currentPrompt = proposal.newPrompt
    this.history.push(proposal.newPrompt)
    this.iterationCount++
    logger.debug(`Accepted mutation, iteration ${this.iterationCount}`)
  }

  rejectMutation(_proposal: MutationProposal): void {
    logger.debug('Rejected mutation')
  }

  summarizeFeedbackBatch(batch: FeedbackItem[]): FeedbackBatchSummary {
    const bad = batch.filter(item => item.feedback === 'bad')
    return {
      good: batch.length - bad.length,
      bad: bad.length,
      issues: bad.flatMap(item => (item.reason ? [item.reason] : [])),
    }
  }
}
