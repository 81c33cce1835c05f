/**
 * Text rendering for the reflection request
 */

import type { FeedbackItem } from '../types/feedback.js'

function renderEntry(item: FeedbackItem): string {
  let entry = `Input: "${item.input}"\nOutput: "${item.output}"`
  if (item.feedback === 'bad') {
    if (item.reason) entry += `\nWhy wrong: "${item.reason}"`
    if (item.correction) entry += `\nShould be: "${item.correction}"`
  }
  return entry
}

/**
 * Good and bad outputs as two labelled groups separated by `---`.
 * An empty group is left out entirely.
 */
export function formatFeedbackText(items: FeedbackItem[]): string {
  const good = items.filter(item => item.feedback === 'good').map(renderEntry)
  const bad = items.filter(item => item.feedback === 'bad').map(renderEntry)

  const sections: string[] = []
  if (good.length > 0) {
    sections.push('GOOD OUTPUTS (keep doing this):\n\n' + good.join('\n\n'))
  }
  if (bad.length > 0) {
    sections.push('BAD OUTPUTS (fix these):\n\n' + bad.join('\n\n'))
  }
  return sections.join('\n\n---\n\n')
}

export interface ReflectionRequest {
  taskDescription: string
  currentPrompt: string
  feedbackText: string
  /** Principles distilled by the judge; omitted when empty */
  principles?: string
}

export function buildReflectionPrompt(request: ReflectionRequest): string {
  const principlesBlock = request.principles
    ? `\nPRINCIPLES LEARNED FROM PAST FEEDBACK:\n${request.principles}\n`
    : ''

  return `You are an expert prompt engineer analyzing a prompt that needs improvement.

TASK DESCRIPTION:
${request.taskDescription}

CURRENT PROMPT:
"""
${request.currentPrompt}
"""

HUMAN FEEDBACK ON RECENT OUTPUTS:

${request.feedbackText}
${principlesBlock}
INSTRUCTIONS:
1. Analyze the patterns in the bad outputs
2. Identify what the prompt is missing or doing wrong
3. Propose specific changes to fix the issues
4. Write the complete improved prompt

Respond in this exact format:

ANALYSIS:
[Your analysis of the failure patterns]

CHANGES:
- [Change 1]
- [Change 2]
- [Change 3]

NEW PROMPT:
"""
[The complete improved prompt]
"""
`
}
