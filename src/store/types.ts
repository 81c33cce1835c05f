/**
 * Persistence port for sessions, inputs, prompt versions and run results.
 *
 * Every method is a single statement or one short transaction. Ordering:
 * inputs and results by creation time, versions by version number.
 */

import type {
  Session,
  SessionStatus,
  SessionUpdate,
  Input,
  PromptVersion,
  PromptVersionStatus,
  RunResult,
} from '../types/index.js'

export type ResultPatch = Partial<
  Pick<
    RunResult,
    'humanFeedback' | 'feedbackReason' | 'humanCorrection' | 'comparisonResult' | 'traceId'
  >
>

export interface ListSessionsQuery {
  status?: SessionStatus
  limit: number
}

export interface ListInputsQuery {
  limit?: number
  offset: number
}

export interface RefinementRepository {
  // Sessions
  insertSession(session: Session): void
  getSession(id: string): Session | null
  /** Newest update first */
  listSessions(query: ListSessionsQuery): Session[]
  updateSession(id: string, update: SessionUpdate, updatedAt: string): Session | null
  /** Removes the session with its results, versions and inputs */
  deleteSession(id: string): boolean

  // Inputs
  insertInputs(inputs: Input[]): void
  getInput(id: string): Input | null
  listInputs(sessionId: string, query: ListInputsQuery): Input[]
  countInputs(sessionId: string): number
  deleteInput(id: string): boolean
  /** First `limit` inputs of the session whose id is not in `excludeIds` */
  listInputsExcluding(sessionId: string, limit: number, excludeIds: string[]): Input[]

  // Prompt versions
  insertVersion(version: PromptVersion): void
  getVersion(id: string): PromptVersion | null
  /** 0 when the session has no versions */
  getMaxVersionNumber(sessionId: string): number
  /** Highest-numbered version, optionally restricted to one status */
  getTopVersion(sessionId: string, status?: PromptVersionStatus): PromptVersion | null
  listVersions(sessionId: string): PromptVersion[]
  updateVersionStatus(id: string, status: PromptVersionStatus): PromptVersion | null

  // Run results
  insertResult(result: RunResult): void
  getResult(id: string): RunResult | null
  listResultsForVersion(versionId: string): RunResult[]
  listResultsForInput(inputId: string): RunResult[]
  updateResult(id: string, patch: ResultPatch): RunResult | null

  close(): void
}
