import { Command } from 'commander'
import chalk from 'chalk'
import { readFileSync } from 'fs'
import { AppError } from '../../shared/error.js'
import { shortenId } from '../../shared/generateId.js'
import { isHumanFeedback, type MutationProposal } from '../../types/index.js'
import {
  FeedbackStore,
  acceptProposal,
  createRefinementContext,
  diffPrompts,
  proposeImprovement,
  rejectProposal,
  type RefinementContext,
} from '../../prompt-optimization/index.js'
import { validatePromptTemplate } from '../../session/index.js'
import { success, info, warn, header, bulletList, block, printDiff, blank } from '../output.js'
import { withSpinner } from '../spinner.js'
import { editor, isInteractive, select } from '../prompt.js'
import {
  requireCurrentVersion,
  resolveResult,
  resolveSession,
  withWorkspace,
} from '../workspace.js'

type Decision = 'accept' | 'edit' | 'reject' | 'discard'

interface ProposeOptions {
  session?: string
  accept?: boolean
  edit?: string
  reject?: boolean
  verbose?: boolean
}

function printProposal(ctx: RefinementContext, proposal: MutationProposal): void {
  const current = requireCurrentVersion(ctx.repo, ctx.session)
  const batch = ctx.proposer.summarizeFeedbackBatch(ctx.feedback.collectFeedbackItems(current.id))

  header(`Proposal for ${ctx.session.name} (from v${current.versionNumber})`)
  console.log(`  Reviewed: ${chalk.green(`${batch.good} good`)}, ${chalk.red(`${batch.bad} bad`)}`)
  if (batch.issues.length > 0) bulletList(batch.issues)

  if (proposal.analysis) {
    header('Analysis')
    block(proposal.analysis, 2)
  }
  if (proposal.changes.length > 0) {
    header('Changes')
    bulletList(proposal.changes)
  }
  header('Prompt diff')
  printDiff(diffPrompts(proposal.currentPrompt, proposal.newPrompt))
  blank()
  if (proposal.usedFallback) {
    warn('The reply had no usable NEW PROMPT section; the prompt above is a fallback')
  }
}

async function chooseDecision(options: ProposeOptions): Promise<Decision> {
  if (options.accept) return 'accept'
  if (options.edit) return 'edit'
  if (options.reject) return 'reject'
  if (!isInteractive()) return 'discard'
  return select<Decision>('What should happen to this proposal?', [
    { name: 'Accept as the new current version', value: 'accept' },
    { name: 'Edit, then accept', value: 'edit' },
    { name: 'Reject (kept on record)', value: 'reject' },
    { name: 'Discard without saving', value: 'discard' },
  ])
}

async function editedPrompt(options: ProposeOptions, proposal: MutationProposal): Promise<string> {
  const text = options.edit
    ? readFileSync(options.edit, 'utf-8')
    : await editor('Edit the proposed prompt', proposal.newPrompt)
  const template = validatePromptTemplate(text.trim())
  if (!template.ok) throw template.error
  return template.value
}

export function registerFeedbackCommands(program: Command) {
  program
    .command('feedback')
    .description('Record a good/bad review of a run result')
    .argument('<result>', 'Result id or id prefix')
    .argument('<verdict>', 'good | bad')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('-r, --reason <text>', 'Why the output is wrong')
    .option('-c, --correction <text>', 'What the output should have been')
    .option('-v, --verbose', 'Debug logging')
    .action(
      (
        resultRef: string,
        verdict: string,
        options: { session?: string; reason?: string; correction?: string; verbose?: boolean }
      ) =>
        withWorkspace(options, async ({ repo, traceLogger }) => {
          if (!isHumanFeedback(verdict)) {
            throw new AppError('ERR_VALIDATION', `Verdict must be good or bad, got "${verdict}"`, 'VALIDATION')
          }
          const session = resolveSession(repo, options.session)
          const result = resolveResult(repo, session, resultRef)
          const updated = await new FeedbackStore(repo, traceLogger).updateFeedback(
            result.id,
            verdict,
            options.reason,
            options.correction
          )
          if (!updated) throw AppError.resultNotFound(resultRef)
          success(`Marked ${shortenId(updated.id)} as ${verdict}`)
        })
    )

  program
    .command('propose')
    .description('Reflect on reviewed outputs and propose an improved prompt')
    .option('-s, --session <ref>', 'Session id, id prefix or name (default: latest active)')
    .option('--accept', 'Accept the proposal without asking')
    .option('--edit <file>', 'Accept the prompt in <file> instead of the proposal')
    .option('--reject', 'Reject the proposal without asking')
    .option('-v, --verbose', 'Debug logging')
    .action((options: ProposeOptions) =>
      withWorkspace(options, async ws => {
        const session = resolveSession(ws.repo, options.session)
        const ctx = createRefinementContext(ws.refinementDeps(), session.id)

        const proposal = await withSpinner('Reflecting on feedback...', () => proposeImprovement(ctx), {
          successText: 'Proposal ready',
        })
        printProposal(ctx, proposal)

        const decision = await chooseDecision(options)
        if (decision === 'discard') {
          info('Proposal discarded. Use --accept, --edit <file> or --reject to record it.')
          return
        }
        if (decision === 'reject') {
          const rejected = rejectProposal(ctx)
          info(`Recorded v${rejected.versionNumber} as rejected; the current version is unchanged`)
          return
        }

        const prompt = decision === 'edit' ? await editedPrompt(options, proposal) : undefined
        const accepted = acceptProposal(ctx, prompt)
        success(`v${accepted.versionNumber} is now the current version`)
        info('Compare it with the previous version: ploop compare')
      })
    )
}
