export type PromptVersionStatus = 'proposed' | 'accepted' | 'rejected'

export const PROMPT_VERSION_STATUSES: readonly PromptVersionStatus[] = [
  'proposed',
  'accepted',
  'rejected',
]

export function isPromptVersionStatus(value: string): value is PromptVersionStatus {
  return PROMPT_VERSION_STATUSES.some(s => s === value)
}

export interface PromptVersion {
  id: string
  sessionId: string
  versionNumber: number // 1, 2, 3... per session
  promptText: string // template containing {input}
  parentVersionId?: string // undefined for v1
  mutationExplanation?: string
  status: PromptVersionStatus
  paretoRank?: number // reserved, never computed
  createdAt: string
}

export interface CreateVersionOptions {
  parentVersionId?: string
  mutationExplanation?: string
  status?: PromptVersionStatus
}

/** Line-level diff record */
export interface DiffLine {
  type: 'added' | 'removed' | 'unchanged'
  text: string
}
