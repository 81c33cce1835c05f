import { Command } from 'commander'
import chalk from 'chalk'
import { AppError } from '../../shared/error.js'
import { shortenId } from '../../shared/generateId.js'
import {
  BatchRunner,
  buildComparisonRows,
  ComparisonEngine,
  keepNewVersion,
  VersionStore,
} from '../../prompt-optimization/index.js'
import type { RefinementRepository } from '../../store/types.js'
import { isComparisonJudgment } from '../../types/index.js'
import type { ComparisonRow, ComparisonSummary, PromptVersion, Session } from '../../types/index.js'
import type { Workspace } from '../workspace.js'
import { success, info, header, list, table, progressInline, clip } from '../output.js'
import {
  requireCurrentVersion,
  resolveResult,
  resolveSession,
  resolveVersion,
  withWorkspace,
} from '../workspace.js'

interface PairOptions {
  session?: string
  old?: string
  new?: string
  verbose?: boolean
}

interface VersionPair {
  session: Session
  oldVersion: PromptVersion
  newVersion: PromptVersion
}

/** New defaults to the current version, old to its parent */
function resolvePair(repo: RefinementRepository, options: PairOptions): VersionPair {
  const session = resolveSession(repo, options.session)
  const newVersion = options.new
    ? resolveVersion(repo, session, options.new)
    : requireCurrentVersion(repo, session)
  const oldRef = options.old ?? newVersion.parentVersionId
  if (!oldRef) {
    throw AppError.versionNotFound(`parent of v${newVersion.versionNumber} (pass --old)`)
  }
  const oldVersion = resolveVersion(repo, session, oldRef)
  return { session, oldVersion, newVersion }
}

function createEngine(ws: Workspace, session: Session): ComparisonEngine {
  const runner = new BatchRunner({
    repo: ws.repo,
    client: ws.client(),
    traceLogger: ws.traceLogger,
    completionOptions: { model: session.modelName, temperature: session.modelTemperature },
  })
  return new ComparisonEngine({ repo: ws.repo, runner, versions: new VersionStore(ws.repo) })
}

function judgmentLabel(row: ComparisonRow): string {
  if (row.judgment === 'better') return chalk.green('better')
  if (row.judgment === 'worse') return chalk.red('worse')
  if (row.judgment === 'same') return chalk.yellow('same')
  return chalk.dim('-')
}

function printSummary(summary: ComparisonSummary): void {
  const net = summary.netImprovement
  list([
    { label: 'Better', value: summary.better },
    { label: 'Worse', value: summary.worse },
    { label: 'Same', value: summary.same },
    { label: 'Pending', value: summary.pending },
    { label: 'Net', value: net > 0 ? `+${net}` : String(net) },
  ])
}

export function registerCompareCommands(program: Command) {
  const pairOptions = (command: Command) =>
    command
      .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
      .option('--old <ref>', 'Old version (default: parent of the new one)')
      .option('--new <ref>', 'New version (default: current)')
      .option('-v, --verbose', 'Debug logging')

  pairOptions(
    program.command('compare').description('Run both versions on the same inputs, side by side')
  ).action((options: PairOptions) =>
    withWorkspace(options, async ws => {
      const { session, oldVersion, newVersion } = resolvePair(ws.repo, options)
      const engine = createEngine(ws, session)
      const rows = await engine.prepareComparison(oldVersion.id, newVersion.id, undefined, {
        onProgress: (position, total) => progressInline(`v${newVersion.versionNumber}`, position, total),
      })

      header(`v${oldVersion.versionNumber} vs v${newVersion.versionNumber}`)
      table(
        rows.map(row => ({
          id: shortenId(row.newResultId),
          input: clip(row.inputContent, 24),
          old: clip(row.oldOutput, 32),
          new: clip(row.newOutput, 32),
          judgment: judgmentLabel(row),
        })),
        [
          { key: 'id', header: 'Result', width: 8 },
          { key: 'input', header: 'Input' },
          { key: 'old', header: `v${oldVersion.versionNumber}` },
          { key: 'new', header: `v${newVersion.versionNumber}` },
          { key: 'judgment', header: 'Judgment' },
        ]
      )
      console.log()
      printSummary(engine.summarizeComparison(rows))
      console.log()
      info('Judge each row: ploop judge <result> better|worse|same')
    })
  )

  program
    .command('judge')
    .description('Judge a new-version result against the old one')
    .argument('<result>', 'New-version result id or id prefix')
    .argument('<judgment>', 'better | worse | same')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-v, --verbose', 'Debug logging')
    .action((resultRef: string, judgment: string, options: { session?: string; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        if (!isComparisonJudgment(judgment)) {
          throw new AppError(
            'ERR_VALIDATION',
            `Judgment must be better, worse or same, got "${judgment}"`,
            'VALIDATION'
          )
        }
        const session = resolveSession(repo, options.session)
        const result = resolveResult(repo, session, resultRef)
        repo.updateResult(result.id, { comparisonResult: judgment })
        success(`Judged ${shortenId(result.id)} as ${judgment}`)
      })
    )

  pairOptions(
    program.command('keep').description('Keep the new version once every row is judged')
  ).action((options: PairOptions) =>
    withWorkspace(options, ({ repo }) => {
      const { oldVersion, newVersion } = resolvePair(repo, options)
      const rows = buildComparisonRows(repo, oldVersion.id, newVersion.id)
      if (rows.length === 0) throw AppError.comparisonEmpty()
      const kept = keepNewVersion(rows)
      if (!kept.ok) throw kept.error
      success(`Keeping v${newVersion.versionNumber}`)
      printSummary(kept.value)
    })
  )

  program
    .command('revert')
    .description('Reject a version so the previous accepted one is current again')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('--new <ref>', 'Version to reject (default: current)')
    .option('-v, --verbose', 'Debug logging')
    .action((options: { session?: string; new?: string; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const session = resolveSession(repo, options.session)
        const target = options.new
          ? resolveVersion(repo, session, options.new)
          : requireCurrentVersion(repo, session)
        new VersionStore(repo).updateStatus(target.id, 'rejected')
        const current = repo.getTopVersion(session.id, 'accepted')
        success(`Rejected v${target.versionNumber}`)
        info(current ? `Current version: v${current.versionNumber}` : 'No accepted version left')
      })
    )
}
