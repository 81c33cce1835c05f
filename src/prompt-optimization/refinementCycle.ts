/**
 * One refinement session's workflow state and the steps that move it forward:
 * run a batch, review, propose, accept or reject, compare, keep or revert.
 *
 * The context is a plain object passed by reference; every step reads and
 * writes it explicitly.
 */

import { AppError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import { BatchRunner, type RunBatchOptions } from './BatchRunner.js'
import { ComparisonEngine } from './ComparisonEngine.js'
import { FeedbackStore } from './FeedbackStore.js'
import { MutationProposer } from './MutationProposer.js'
import { VersionStore } from './VersionStore.js'
import { err, ok, type Result } from '../shared/result.js'
import type { CompletionClient } from '../backend/types.js'
import type { RefinementRepository } from '../store/types.js'
import type { JudgeCollaborator, JudgeSuggestion, TraceLogger } from '../telemetry/types.js'
import type {
  ComparisonRow,
  ComparisonSummary,
  MutationProposal,
  PromptVersion,
  RunResult,
  Session,
} from '../types/index.js'

const logger = createLogger('refinement')

export interface RefinementDeps {
  repo: RefinementRepository
  client: CompletionClient
  traceLogger?: TraceLogger
  judge?: JudgeCollaborator
  /** Model for reflection calls; the session model when unset */
  reflectionModel?: string
}

export interface PendingComparison {
  oldVersionId: string
  newVersionId: string
  /** null until prepareCurrentComparison has run */
  rows: ComparisonRow[] | null
}

export interface RefinementContext {
  session: Session
  repo: RefinementRepository
  versions: VersionStore
  runner: BatchRunner
  feedback: FeedbackStore
  comparison: ComparisonEngine
  proposer: MutationProposer
  judge?: JudgeCollaborator
  /** Inputs of the most recent batch */
  batchInputIds: string[]
  pendingProposal: MutationProposal | null
  pendingComparison: PendingComparison | null
  principles: string
}

export interface JudgmentSuggestion extends JudgeSuggestion {
  resultId: string
}

/**
 * @throws AppError SESSION_NOT_FOUND, or VERSION_NOT_FOUND when the session
 *   has no accepted version
 */
export function createRefinementContext(deps: RefinementDeps, sessionId: string): RefinementContext {
  const session = deps.repo.getSession(sessionId)
  if (!session) throw AppError.sessionNotFound(sessionId)

  const versions = new VersionStore(deps.repo)
  const current = versions.getCurrentVersion(sessionId)
  if (!current) throw AppError.versionNotFound(`current version of session ${sessionId}`)

  const runner = new BatchRunner({
    repo: deps.repo,
    client: deps.client,
    traceLogger: deps.traceLogger,
    completionOptions: { model: session.modelName, temperature: session.modelTemperature },
  })

  return {
    session,
    repo: deps.repo,
    versions,
    runner,
    feedback: new FeedbackStore(deps.repo, deps.traceLogger),
    comparison: new ComparisonEngine({ repo: deps.repo, runner, versions }),
    proposer: new MutationProposer({
      client: deps.client,
      initialPrompt: current.promptText,
      taskDescription: session.taskDescription,
      reflectionOptions: { model: deps.reflectionModel ?? session.modelName },
    }),
    judge: deps.judge,
    batchInputIds: [],
    pendingProposal: null,
    pendingComparison: null,
    principles: '',
  }
}

function requireCurrentVersion(ctx: RefinementContext): PromptVersion {
  const current = ctx.versions.getCurrentVersion(ctx.session.id)
  if (!current) throw AppError.versionNotFound(`current version of session ${ctx.session.id}`)
  return current
}

/**
 * Run the current version on up to `batchSize` inputs it has not run on yet.
 * Returns [] once every input has a result.
 */
export async function runNextBatch(
  ctx: RefinementContext,
  options: RunBatchOptions & { batchSize?: number } = {}
): Promise<RunResult[]> {
  const current = requireCurrentVersion(ctx)
  const done = [...new Set(ctx.runner.getResultsForVersion(current.id).map(r => r.inputId))]
  const batch = ctx.repo.listInputsExcluding(
    ctx.session.id,
    options.batchSize ?? ctx.session.batchSize,
    done
  )
  ctx.batchInputIds = batch.map(input => input.id)
  if (batch.length === 0) {
    logger.info('Every input already has a result for the current version')
    return []
  }
  return ctx.runner.runBatch(current.id, ctx.batchInputIds, options)
}

/**
 * Reflect on the reviewed outputs of the current version. The judge is
 * aligned first when present; its failure only costs the principles.
 *
 * @throws AppError NO_FEEDBACK when nothing has been reviewed
 */
export async function proposeImprovement(ctx: RefinementContext): Promise<MutationProposal> {
  const current = requireCurrentVersion(ctx)

  if (ctx.judge) {
    try {
      const alignment = await ctx.judge.align(ctx.session.id)
      ctx.principles = alignment.principlesText
      logger.debug(`Judge aligned on ${alignment.traceCount} trace(s)`)
    } catch (error) {
      logError(logger, 'Judge alignment failed', ensureError(error), { sessionId: ctx.session.id })
    }
  }

  const items = ctx.feedback.collectFeedbackItems(current.id)
  if (items.length === 0) throw AppError.noFeedback(current.id)

  // Keep the proposer on the stored current prompt
  ctx.proposer.currentPrompt = current.promptText
  ctx.proposer.accumulatedPrinciples = ctx.principles

  const proposal = await ctx.proposer.proposeMutation(items)
  ctx.pendingProposal = proposal
  return proposal
}

/**
 * Store the pending proposal (or an edited prompt) as the new accepted version
 * and stage a comparison against the previous one.
 */
export function acceptProposal(ctx: RefinementContext, editedPrompt?: string): PromptVersion {
  const proposal = ctx.pendingProposal
  if (!proposal) throw AppError.nothingPending('proposal')
  const parent = requireCurrentVersion(ctx)

  const promptText = editedPrompt ?? proposal.newPrompt
  const version = ctx.versions.createVersion(ctx.session.id, promptText, {
    parentVersionId: parent.id,
    mutationExplanation: proposal.explanation,
    status: 'accepted',
  })
  ctx.proposer.acceptMutation({ ...proposal, newPrompt: promptText })
  ctx.pendingProposal = null
  ctx.pendingComparison = { oldVersionId: parent.id, newVersionId: version.id, rows: null }
  return version
}

/** Keep the proposal on record as rejected; the current version stays */
export function rejectProposal(ctx: RefinementContext): PromptVersion {
  const proposal = ctx.pendingProposal
  if (!proposal) throw AppError.nothingPending('proposal')
  const parent = requireCurrentVersion(ctx)

  const version = ctx.versions.createVersion(ctx.session.id, proposal.newPrompt, {
    parentVersionId: parent.id,
    mutationExplanation: proposal.explanation,
    status: 'rejected',
  })
  ctx.proposer.rejectMutation(proposal)
  ctx.pendingProposal = null
  return version
}

/**
 * Fill the pending comparison's rows, running the new version as needed.
 * Covers the last reviewed batch, or every input the old version ran on
 * when there was none.
 */
export async function prepareCurrentComparison(
  ctx: RefinementContext,
  options: RunBatchOptions = {}
): Promise<ComparisonRow[]> {
  const pending = ctx.pendingComparison
  if (!pending) throw AppError.nothingPending('comparison')
  const rows = await ctx.comparison.prepareComparison(
    pending.oldVersionId,
    pending.newVersionId,
    ctx.batchInputIds.length > 0 ? ctx.batchInputIds : undefined,
    options
  )
  pending.rows = rows
  return rows
}

/**
 * Close the pending comparison. `keep` fails until the comparison has rows
 * and every one of them carries a stored judgment; `revert` rejects the new
 * version, making the old one current again.
 */
export function finishComparison(
  ctx: RefinementContext,
  decision: 'keep' | 'revert'
): Result<ComparisonSummary, AppError> {
  const pending = ctx.pendingComparison
  if (!pending) throw AppError.nothingPending('comparison')

  // Judgments are written to the store, not to the prepared rows
  const rows = (pending.rows ?? []).map(row => ({
    ...row,
    judgment: ctx.repo.getResult(row.newResultId)?.comparisonResult ?? null,
  }))

  const summary = ctx.comparison.summarizeComparison(rows)
  if (decision === 'keep') {
    if (rows.length === 0) return err(AppError.comparisonEmpty())
    const kept = ctx.comparison.keepNewVersion(rows)
    if (kept.ok) ctx.pendingComparison = null
    return kept
  }

  ctx.comparison.revertNewVersion(pending.newVersionId)
  const restored = ctx.versions.getVersion(pending.oldVersionId)
  if (restored) ctx.proposer.currentPrompt = restored.promptText
  ctx.pendingComparison = null
  return ok(summary)
}

/**
 * Ask the judge about results that have no human feedback yet. Failed and
 * undecided suggestions are dropped.
 */
export async function suggestJudgments(
  ctx: RefinementContext,
  results: RunResult[]
): Promise<JudgmentSuggestion[]> {
  const judge = ctx.judge
  if (!judge) return []

  const suggestions: JudgmentSuggestion[] = []
  for (const result of results) {
    if (result.humanFeedback) continue
    const input = ctx.repo.getInput(result.inputId)
    if (!input) continue
    try {
      const suggestion = await judge.suggest(input.content, result.output)
      if (suggestion) suggestions.push({ resultId: result.id, ...suggestion })
    } catch (error) {
      logError(logger, 'Judge suggestion failed', ensureError(error), { resultId: result.id })
    }
  }
  return suggestions
}
