/**
 * Session export: full JSON dump, or one prompt version as Markdown
 */

import { AppError } from '../shared/error.js'
import type { RefinementRepository } from '../store/types.js'
import type { Input, PromptVersion, RunResult, Session } from '../types/index.js'

export interface ExportOptions {
  /** Include every run result of every version */
  includeResults?: boolean
}

function sessionJson(session: Session) {
  return {
    id: session.id,
    name: session.name,
    task_description: session.taskDescription,
    output_description: session.outputDescription ?? null,
    model_provider: session.modelProvider,
    model_name: session.modelName,
    model_temperature: session.modelTemperature,
    batch_size: session.batchSize,
    status: session.status,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
  }
}

function versionJson(version: PromptVersion) {
  return {
    id: version.id,
    version_number: version.versionNumber,
    prompt_text: version.promptText,
    parent_version_id: version.parentVersionId ?? null,
    mutation_explanation: version.mutationExplanation ?? null,
    status: version.status,
    pareto_rank: version.paretoRank ?? null,
    created_at: version.createdAt,
  }
}

function inputJson(input: Input) {
  return {
    id: input.id,
    content: input.content,
    ground_truth: input.groundTruth ?? null,
    metadata: input.metadata ?? null,
    created_at: input.createdAt,
  }
}

function resultJson(result: RunResult) {
  return {
    id: result.id,
    input_id: result.inputId,
    prompt_version_id: result.promptVersionId,
    output: result.output,
    latency_ms: result.latencyMs,
    tokens_used: result.tokensUsed,
    human_feedback: result.humanFeedback,
    feedback_reason: result.feedbackReason,
    human_correction: result.humanCorrection,
    comparison_result: result.comparisonResult,
    created_at: result.createdAt,
  }
}

/**
 * @throws AppError SESSION_NOT_FOUND
 */
export function exportSessionJson(
  repo: RefinementRepository,
  sessionId: string,
  options: ExportOptions = {}
): string {
  const session = repo.getSession(sessionId)
  if (!session) throw AppError.sessionNotFound(sessionId)

  const versions = repo.listVersions(sessionId)
  const results = options.includeResults
    ? versions.flatMap(version => repo.listResultsForVersion(version.id))
    : []

  const data = {
    session: sessionJson(session),
    versions: versions.map(versionJson),
    inputs: repo.listInputs(sessionId, { offset: 0 }).map(inputJson),
    results: results.map(resultJson),
  }
  return JSON.stringify(data, null, 2)
}

export function exportPromptMarkdown(session: Session, version: PromptVersion): string {
  return `# ${session.name} - v${version.versionNumber}

## Prompt

\`\`\`
${version.promptText}
\`\`\`

## Metadata
- Task: ${session.taskDescription}
- Version: ${version.versionNumber}
- Created: ${version.createdAt.slice(0, 10)}
- Model: ${session.modelName}
- Provider: ${session.modelProvider}
- Temperature: ${session.modelTemperature}
`
}
