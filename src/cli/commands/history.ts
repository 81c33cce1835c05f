import { Command } from 'commander'
import chalk from 'chalk'
import { writeFileSync } from 'fs'
import { AppError } from '../../shared/error.js'
import { shortenId } from '../../shared/generateId.js'
import { VersionStore } from '../../prompt-optimization/index.js'
import { exportPromptMarkdown, exportSessionJson } from '../../session/index.js'
import type { PromptVersion } from '../../types/index.js'
import { success, table, header, printDiff, block, clip } from '../output.js'
import {
  requireCurrentVersion,
  resolveSession,
  resolveVersion,
  withWorkspace,
} from '../workspace.js'

function statusLabel(version: PromptVersion, currentId: string | undefined): string {
  if (version.id === currentId) return chalk.green('current')
  if (version.status === 'accepted') return 'accepted'
  if (version.status === 'rejected') return chalk.red('rejected')
  return chalk.yellow('proposed')
}

export function registerHistoryCommands(program: Command) {
  program
    .command('history')
    .description('Show the prompt versions of a session')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('--full', 'Print every prompt in full')
    .option('-v, --verbose', 'Debug logging')
    .action((options: { session?: string; full?: boolean; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const session = resolveSession(repo, options.session)
        const versions = new VersionStore(repo)
        const history = versions.getVersionHistory(session.id)
        const currentId = versions.getCurrentVersion(session.id)?.id
        const numberOf = new Map(history.map(v => [v.id, v.versionNumber]))

        header(`${session.name}: ${history.length} version(s)`)
        table(
          history.map(v => ({
            version: `v${v.versionNumber}`,
            id: shortenId(v.id),
            status: statusLabel(v, currentId),
            parent: v.parentVersionId ? `v${numberOf.get(v.parentVersionId) ?? '?'}` : '-',
            results: String(repo.listResultsForVersion(v.id).length),
            explanation: clip(v.mutationExplanation ?? '', 40),
          })),
          [
            { key: 'version', header: 'Ver', width: 4 },
            { key: 'id', header: 'ID', width: 8 },
            { key: 'status', header: 'Status' },
            { key: 'parent', header: 'Parent', width: 6 },
            { key: 'results', header: 'Results', align: 'right' },
            { key: 'explanation', header: 'Changes' },
          ]
        )

        if (options.full) {
          for (const v of history) {
            header(`v${v.versionNumber}`)
            block(v.promptText)
          }
        }
      })
    )

  program
    .command('diff')
    .description('Line diff between two prompt versions')
    .argument('<old>', 'Old version (v1, 1 or id prefix)')
    .argument('[new]', 'New version (default: current)')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-v, --verbose', 'Debug logging')
    .action((oldRef: string, newRef: string | undefined, options: { session?: string; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const session = resolveSession(repo, options.session)
        const oldVersion = resolveVersion(repo, session, oldRef)
        const newVersion = newRef
          ? resolveVersion(repo, session, newRef)
          : requireCurrentVersion(repo, session)

        console.log(chalk.red(`--- v${oldVersion.versionNumber}`))
        console.log(chalk.green(`+++ v${newVersion.versionNumber}`))
        printDiff(new VersionStore(repo).diff(oldVersion.id, newVersion.id))
      })
    )

  program
    .command('export')
    .description('Export a session as JSON, or a prompt version as Markdown')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-f, --format <format>', 'json | markdown', 'json')
    .option('-p, --prompt-version <ref>', 'Version for markdown (default: current)')
    .option('--results', 'Include run results in JSON')
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .option('-v, --verbose', 'Debug logging')
    .action(
      (options: {
        session?: string
        format: string
        promptVersion?: string
        results?: boolean
        out?: string
        verbose?: boolean
      }) =>
        withWorkspace(options, ({ repo }) => {
          const session = resolveSession(repo, options.session)

          let text: string
          if (options.format === 'json') {
            text = exportSessionJson(repo, session.id, { includeResults: options.results })
          } else if (options.format === 'markdown' || options.format === 'md') {
            const version = options.promptVersion
              ? resolveVersion(repo, session, options.promptVersion)
              : requireCurrentVersion(repo, session)
            text = exportPromptMarkdown(session, version)
          } else {
            throw new AppError('ERR_VALIDATION', `Unknown format: ${options.format}`, 'VALIDATION')
          }

          if (options.out) {
            writeFileSync(options.out, text)
            success(`Exported ${session.name} to ${options.out}`)
          } else {
            console.log(text)
          }
        })
    )
}
