export type {
  TraceLogger,
  RunTraceInput,
  FeedbackAssessmentInput,
  JudgeCollaborator,
  JudgeAlignment,
  JudgeSuggestion,
} from './types.js'
export { FileTraceLogger, buildRationale, type RunTrace, type TraceAssessment } from './FileTraceLogger.js'
