/**
 * Optional collaborators. Both are best-effort: callers catch and drop their
 * failures so a broken trace sink or judge never blocks the loop.
 */

export interface RunTraceInput {
  inputContent: string
  promptText: string
  output: string
  modelName: string
  promptVersionId: string
  runResultId: string
}

export interface FeedbackAssessmentInput {
  traceId: string
  isGood: boolean
  reason?: string | null
  correction?: string | null
}

export interface TraceLogger {
  /** Record one prompt execution; resolves to the trace id */
  logRunTrace(trace: RunTraceInput): Promise<string>
  /** Attach a human assessment to an existing trace */
  logFeedback(feedback: FeedbackAssessmentInput): Promise<void>
}

export interface JudgeAlignment {
  /** Principles distilled from past feedback, '' when there are none */
  principlesText: string
  traceCount: number
}

export interface JudgeSuggestion {
  isGood: boolean
  rationale: string
}

export interface JudgeCollaborator {
  /** Align the judge with all feedback recorded for `scope` (a session id) */
  align(scope: string): Promise<JudgeAlignment>
  /** null when the judge is not aligned or cannot decide */
  suggest(input: string, output: string): Promise<JudgeSuggestion | null>
}
