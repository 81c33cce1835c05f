/**
 * Side-by-side comparison of two prompt versions on the same inputs
 */

import { AppError } from '../shared/error.js'
import { err, ok, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import type { BatchRunner, RunBatchOptions } from './BatchRunner.js'
import type { VersionStore } from './VersionStore.js'
import type { RefinementRepository } from '../store/types.js'
import type {
  ComparisonJudgment,
  ComparisonRow,
  ComparisonSummary,
  PromptVersion,
  RunResult,
} from '../types/index.js'

const logger = createLogger('comparison')

export interface ComparisonEngineDeps {
  repo: RefinementRepository
  runner: BatchRunner
  versions: VersionStore
}

/** Latest result per input; results arrive oldest first */
function latestByInput(results: RunResult[]): Map<string, RunResult> {
  const latest = new Map<string, RunResult>()
  for (const result of results) {
    latest.set(result.inputId, result)
  }
  return latest
}

/**
 * Pair the latest old and new result per input without running anything.
 * Inputs lacking either result are left out.
 *
 * @param inputIds - defaults to the inputs the old version ran on
 */
export function buildComparisonRows(
  repo: RefinementRepository,
  oldVersionId: string,
  newVersionId: string,
  inputIds?: string[]
): ComparisonRow[] {
  const oldResults = latestByInput(repo.listResultsForVersion(oldVersionId))
  const newResults = latestByInput(repo.listResultsForVersion(newVersionId))
  const rows: ComparisonRow[] = []
  for (const inputId of inputIds ?? [...oldResults.keys()]) {
    const oldResult = oldResults.get(inputId)
    const newResult = newResults.get(inputId)
    const input = repo.getInput(inputId)
    if (!oldResult || !newResult || !input) continue
    rows.push({
      inputId,
      inputContent: input.content,
      oldResultId: oldResult.id,
      oldOutput: oldResult.output,
      newResultId: newResult.id,
      newOutput: newResult.output,
      judgment: newResult.comparisonResult,
    })
  }
  return rows
}

export function summarizeComparison(rows: ComparisonRow[]): ComparisonSummary {
  let better = 0
  let worse = 0
  let same = 0
  for (const row of rows) {
    if (row.judgment === 'better') better++
    else if (row.judgment === 'worse') worse++
    else if (row.judgment === 'same') same++
  }
  const pending = rows.length - better - worse - same
  return {
    better,
    worse,
    same,
    pending,
    netImprovement: better - worse,
    allCompared: pending === 0,
  }
}

/** Succeeds only once every row has a judgment */
export function keepNewVersion(rows: ComparisonRow[]): Result<ComparisonSummary, AppError> {
  const summary = summarizeComparison(rows)
  if (!summary.allCompared) {
    return err(AppError.comparisonIncomplete(summary.pending))
  }
  logger.info(`Keeping new version (net ${summary.netImprovement >= 0 ? '+' : ''}${summary.netImprovement})`)
  return ok(summary)
}

export class ComparisonEngine {
  private readonly repo: RefinementRepository
  private readonly runner: BatchRunner
  private readonly versions: VersionStore

  constructor(deps: ComparisonEngineDeps) {
    this.repo = deps.repo
    this.runner = deps.runner
    this.versions = deps.versions
  }

  /**
   * Run the new version where it has no result yet, then pair old and new
   * outputs per input. Inputs lacking either result are left out.
   *
   * @param inputIds - defaults to the inputs the old version ran on
   * @throws AppError VERSION_NOT_FOUND for either version
   */
  async prepareComparison(
    oldVersionId: string,
    newVersionId: string,
    inputIds?: string[],
    options: RunBatchOptions = {}
  ): Promise<ComparisonRow[]> {
    this.requireVersion(oldVersionId)
    this.requireVersion(newVersionId)

    const oldResults = latestByInput(this.repo.listResultsForVersion(oldVersionId))
    const ids = inputIds ?? [...oldResults.keys()]

    const alreadyRun = latestByInput(this.repo.listResultsForVersion(newVersionId))
    const toRun = ids.filter(id => !alreadyRun.has(id))
    if (toRun.length > 0) {
      logger.info(`Running new version on ${toRun.length} input(s) for comparison`)
      await this.runner.runBatch(newVersionId, toRun, options)
    }

    return buildComparisonRows(this.repo, oldVersionId, newVersionId, ids)
  }

  /** Record a judgment on the new-version result of a row */
  updateComparison(resultId: string, judgment: ComparisonJudgment): RunResult | null {
    return this.repo.updateResult(resultId, { comparisonResult: judgment })
  }

  /** Rows as stored, with current judgments; runs nothing */
  buildRows(oldVersionId: string, newVersionId: string, inputIds?: string[]): ComparisonRow[] {
    return buildComparisonRows(this.repo, oldVersionId, newVersionId, inputIds)
  }

  summarizeComparison(rows: ComparisonRow[]): ComparisonSummary {
    return summarizeComparison(rows)
  }

  keepNewVersion(rows: ComparisonRow[]): Result<ComparisonSummary, AppError> {
    return keepNewVersion(rows)
  }

  revertNewVersion(newVersionId: string): PromptVersion | null {
    const reverted = this.versions.updateStatus(newVersionId, 'rejected')
    if (reverted) logger.info(`Reverted v${reverted.versionNumber}`)
    return reverted
  }

  private requireVersion(id: string): PromptVersion {
    const version = this.versions.getVersion(id)
    if (!version) throw AppError.versionNotFound(id)
    return version
  }
}
