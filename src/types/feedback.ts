import type { HumanFeedback, ComparisonJudgment } from './runResult.js'

/** One reviewed (input, output) pair handed to the proposer */
export interface FeedbackItem {
  input: string
  output: string
  feedback: HumanFeedback
  reason?: string
  correction?: string
}

export interface MutationProposal {
  currentPrompt: string
  newPrompt: string
  explanation: string
  analysis: string
  changes: string[]
  usedFallback: boolean
}

export interface FeedbackBatchSummary {
  good: number
  bad: number
  issues: string[]
}

export interface ComparisonRow {
  inputId: string
  inputContent: string
  oldResultId: string
  oldOutput: string
  newResultId: string
  newOutput: string
  judgment: ComparisonJudgment | null
}

export interface ComparisonSummary {
  better: number
  worse: number
  same: number
  pending: number
  netImprovement: number // better - worse
  allCompared: boolean
}
