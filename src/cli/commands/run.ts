import { Command } from 'commander'
import chalk from 'chalk'
import { shortenId } from '../../shared/generateId.js'
import { createRefinementContext, runNextBatch } from '../../prompt-optimization/index.js'
import type { RefinementRepository } from '../../store/types.js'
import type { RunResult } from '../../types/index.js'
import { success, info, warn, table, progressInline, clip } from '../output.js'
import {
  requireCurrentVersion,
  resolveSession,
  resolveVersion,
  withWorkspace,
} from '../workspace.js'
import { parseNumberOption } from '../parseOptions.js'
import { batchSizeSchema } from '../../config/index.js'

function feedbackLabel(result: RunResult): string {
  if (result.humanFeedback === 'good') return chalk.green('good')
  if (result.humanFeedback === 'bad') return chalk.red('bad')
  return chalk.dim('-')
}

export function printResults(repo: RefinementRepository, results: RunResult[]): void {
  table(
    results.map(r => ({
      id: shortenId(r.id),
      input: clip(repo.getInput(r.inputId)?.content ?? '(deleted)', 30),
      output: clip(r.output, 50),
      feedback: feedbackLabel(r),
    })),
    [
      { key: 'id', header: 'Result', width: 8 },
      { key: 'input', header: 'Input' },
      { key: 'output', header: 'Output' },
      { key: 'feedback', header: 'Feedback' },
    ]
  )
}

export function registerRunCommands(program: Command) {
  program
    .command('run')
    .description('Run the current prompt on the next batch of unseen inputs')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-b, --batch-size <n>', 'Override the session batch size')
    .option('-v, --verbose', 'Debug logging')
    .action((options: { session?: string; batchSize?: string; verbose?: boolean }) =>
      withWorkspace(options, async ws => {
        const session = resolveSession(ws.repo, options.session)
        const ctx = createRefinementContext(ws.refinementDeps(), session.id)
        const current = requireCurrentVersion(ws.repo, session)

        const controller = new AbortController()
        const onInterrupt = () => {
          warn('Stopping after the current item...')
          controller.abort()
        }
        process.once('SIGINT', onInterrupt)

        try {
          const results = await runNextBatch(ctx, {
            batchSize: parseNumberOption(options.batchSize, '--batch-size', batchSizeSchema),
            signal: controller.signal,
            onProgress: (position, total) => progressInline(`v${current.versionNumber}`, position, total),
          })

          if (results.length === 0) {
            info('Every input already has a result for the current version')
            return
          }

          const failed = results.filter(r => r.output.startsWith('Error: ')).length
          success(`Ran ${results.length} input(s) on v${current.versionNumber}`)
          if (failed > 0) warn(`${failed} completion(s) failed`)
          printResults(ws.repo, results)
          info('Review outputs: ploop feedback <result> good|bad')
        } finally {
          process.removeListener('SIGINT', onInterrupt)
        }
      })
    )

  program
    .command('results')
    .description('List run results of a prompt version')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-p, --prompt-version <ref>', 'Version number (v2) or id prefix (default: current)')
    .option('-v, --verbose', 'Debug logging')
    .action((options: { session?: string; promptVersion?: string; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const session = resolveSession(repo, options.session)
        const version = options.promptVersion
          ? resolveVersion(repo, session, options.promptVersion)
          : requireCurrentVersion(repo, session)
        console.log(chalk.bold(`\n${session.name} v${version.versionNumber}\n`))
        printResults(repo, repo.listResultsForVersion(version.id))
      })
    )
}
