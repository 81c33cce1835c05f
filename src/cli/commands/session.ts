import { Command } from 'commander'
import chalk from 'chalk'
import { existsSync, readFileSync } from 'fs'
import { AppError } from '../../shared/error.js'
import { shortenId } from '../../shared/generateId.js'
import { isSessionStatus } from '../../types/session.js'
import {
  createSession,
  createInputs,
  deleteSession,
  detectInputFormat,
  listSessions,
  parseInputsFile,
  validatePromptTemplate,
  countInputs,
} from '../../session/index.js'
import { VersionStore } from '../../prompt-optimization/index.js'
import { success, info, table, list, blank } from '../output.js'
import { resolveSession, withWorkspace } from '../workspace.js'
import { listLimitSchema, parseNumberOption } from '../parseOptions.js'
import { batchSizeSchema, temperatureSchema } from '../../config/index.js'

interface CreateOptions {
  name: string
  task: string
  prompt: string
  inputs?: string
  outputDescription?: string
  model?: string
  provider?: string
  temperature?: string
  batchSize?: string
  verbose?: boolean
}

/** A readable file path is read; anything else is taken as the text itself */
function readTextOrFile(value: string): string {
  return existsSync(value) ? readFileSync(value, 'utf-8') : value
}

export function registerSessionCommands(program: Command) {
  const session = program.command('session').description('Manage refinement sessions')

  session
    .command('create')
    .description('Create a session with its first prompt and test inputs')
    .requiredOption('-n, --name <name>', 'Session name')
    .requiredOption('-t, --task <description>', 'What the prompt should accomplish')
    .requiredOption('-p, --prompt <text-or-file>', 'Initial prompt, must contain {input}')
    .option('-i, --inputs <file>', 'Inputs file (.json, .yaml or one per line)')
    .option('-o, --output-description <text>', 'What a good output looks like')
    .option('-m, --model <model>', 'Model that runs the prompt')
    .option('--provider <provider>', 'Provider name recorded on the session')
    .option('--temperature <n>', 'Sampling temperature')
    .option('-b, --batch-size <n>', 'Inputs per batch')
    .option('-v, --verbose', 'Debug logging')
    .action((options: CreateOptions) =>
      withWorkspace(options, ({ config, repo }) => {
        const template = validatePromptTemplate(readTextOrFile(options.prompt).trim())
        if (!template.ok) throw template.error

        let drafts: ReturnType<typeof parseInputsFile> = { ok: true, value: [] }
        if (options.inputs) {
          drafts = parseInputsFile(
            readFileSync(options.inputs, 'utf-8'),
            detectInputFormat(options.inputs)
          )
        }
        if (!drafts.ok) throw drafts.error

        const created = createSession(repo, {
          name: options.name,
          taskDescription: options.task,
          outputDescription: options.outputDescription,
          modelProvider: options.provider ?? config.llm.provider,
          modelName: options.model ?? config.llm.model,
          modelTemperature:
            parseNumberOption(options.temperature, '--temperature', temperatureSchema) ??
            config.llm.temperature,
          batchSize:
            parseNumberOption(options.batchSize, '--batch-size', batchSizeSchema) ??
            config.session.batchSize,
        })
        const inputs = createInputs(repo, created.id, drafts.value)
        const v1 = new VersionStore(repo).createVersion(created.id, template.value, {
          status: 'accepted',
        })

        success(`Created session ${chalk.bold(created.name)}`)
        list([
          { label: 'ID', value: created.id },
          { label: 'Model', value: `${created.modelProvider}/${created.modelName}` },
          { label: 'Inputs', value: inputs.length },
          { label: 'Prompt', value: `v${v1.versionNumber}` },
        ])
        blank()
        info('Next: ploop run')
      })
    )

  session
    .command('list')
    .description('List sessions, most recently updated first')
    .option('-s, --status <status>', 'active | completed | archived')
    .option('-l, --limit <n>', 'Maximum rows', '50')
    .action((options: { status?: string; limit: string; verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const status = options.status
        if (status !== undefined && !isSessionStatus(status)) {
          throw new AppError('ERR_VALIDATION', `Unknown status: ${status}`, 'VALIDATION')
        }
        const sessions = listSessions(repo, {
          status,
          limit: parseNumberOption(options.limit, '--limit', listLimitSchema),
        })
        table(
          sessions.map(s => ({
            id: shortenId(s.id),
            name: s.name,
            status: s.status,
            model: s.modelName,
            inputs: String(countInputs(repo, s.id)),
            updated: s.updatedAt.slice(0, 10),
          })),
          [
            { key: 'id', header: 'ID', width: 8 },
            { key: 'name', header: 'Name' },
            { key: 'status', header: 'Status', width: 9 },
            { key: 'model', header: 'Model' },
            { key: 'inputs', header: 'Inputs', align: 'right' },
            { key: 'updated', header: 'Updated', width: 10 },
          ]
        )
      })
    )

  session
    .command('delete')
    .description('Delete a session with its inputs, versions and results')
    .argument('<session>', 'Session id, id prefix or name')
    .action((ref: string, options: { verbose?: boolean }) =>
      withWorkspace(options, ({ repo }) => {
        const target = resolveSession(repo, ref)
        deleteSession(repo, target.id)
        success(`Deleted session ${target.name}`)
      })
    )
}
