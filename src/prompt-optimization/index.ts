/**
 * @entry Prompt Optimization
 *
 * Human-in-the-loop prompt refinement: run a prompt version over inputs,
 * collect good/bad reviews, reflect to propose a better prompt, then compare
 * the two versions side by side.
 *
 * Main API:
 * - VersionStore: numbered prompt versions and their status
 * - BatchRunner: sequential execution with per-item failure capture
 * - FeedbackStore: human review of results
 * - MutationProposer: one reflection call per proposal
 * - ComparisonEngine: old vs new on the same inputs
 * - createRefinementContext() and the workflow steps built on it
 */

// ============ Versions ============

export { VersionStore } from './VersionStore.js'
export { diffPrompts, formatDiff, splitLines } from './diffPrompts.js'

// ============ Execution ============

export { BatchRunner, injectInput, INPUT_TOKEN } from './BatchRunner.js'
export type { BatchRunnerDeps, RunBatchOptions } from './BatchRunner.js'

// ============ Feedback ============

export { FeedbackStore } from './FeedbackStore.js'
export { formatFeedbackText, buildReflectionPrompt } from './feedbackText.js'
export type { ReflectionRequest } from './feedbackText.js'

// ============ Mutation ============

export { MutationProposer } from './MutationProposer.js'
export type { MutationProposerOptions } from './MutationProposer.js'
export {
  parseReflection,
  buildExplanation,
  extractAnalysis,
  extractChanges,
  extractPromptSection,
  extractDelimitedBlock,
  extractFencedBlock,
  extractLastFencedBlock,
  stripStrayBackticks,
} from './parseReflection.js'
export type { ParsedReflection, PromptSource } from './parseReflection.js'

// ============ Comparison ============

export {
  buildComparisonRows,
  ComparisonEngine,
  keepNewVersion,
  summarizeComparison,
} from './ComparisonEngine.js'
export type { ComparisonEngineDeps } from './ComparisonEngine.js'

// ============ Workflow ============

export {
  createRefinementContext,
  runNextBatch,
  proposeImprovement,
  acceptProposal,
  rejectProposal,
  prepareCurrentComparison,
  finishComparison,
  suggestJudgments,
} from './refinementCycle.js'
export type {
  RefinementDeps,
  RefinementContext,
  PendingComparison,
  JudgmentSuggestion,
} from './refinementCycle.js'
