export type HumanFeedback = 'good' | 'bad'
export type ComparisonJudgment = 'better' | 'worse' | 'same'

export function isHumanFeedback(value: string): value is HumanFeedback {
  return value === 'good' || value === 'bad'
}

export function isComparisonJudgment(value: string): value is ComparisonJudgment {
  return value === 'better' || value === 'worse' || value === 'same'
}

/**
 * Output of one prompt version on one input, plus the human's review of it.
 * A failed completion is stored with output "Error: <message>" and zero usage.
 */
export interface RunResult {
  id: string
  inputId: string
  promptVersionId: string
  output: string
  latencyMs: number
  tokensUsed: number
  humanFeedback: HumanFeedback | null
  feedbackReason: string | null
  humanCorrection: string | null
  comparisonResult: ComparisonJudgment | null
  traceId: string | null
  createdAt: string
}

export type NewRunResult = Pick<
  RunResult,
  'inputId' | 'promptVersionId' | 'output' | 'latencyMs' | 'tokensUsed' | 'traceId'
>

export interface FeedbackSummary {
  good: number
  bad: number
  pending: number
  total: number
}
