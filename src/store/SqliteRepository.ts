/**
 * SQLite persistence for the refinement loop
 * One short statement (or one short transaction) per call
 */

import Database from 'better-sqlite3'
import { dirname } from 'path'
import { createLogger } from '../shared/logger.js'
import { ensureDir } from './readWriteJson.js'
import {
  isSessionStatus,
  isPromptVersionStatus,
  isHumanFeedback,
  isComparisonJudgment,
  type Session,
  type SessionUpdate,
  type Input,
  type PromptVersion,
  type PromptVersionStatus,
  type RunResult,
} from '../types/index.js'
import type {
  RefinementRepository,
  ResultPatch,
  ListSessionsQuery,
  ListInputsQuery,
} from './types.js'

const logger = createLogger('store')

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    task_description TEXT NOT NULL,
    output_description TEXT,
    model_provider TEXT NOT NULL,
    model_name TEXT NOT NULL,
    model_temperature REAL NOT NULL DEFAULT 0.7,
    batch_size INTEGER NOT NULL DEFAULT 10,
    status TEXT NOT NULL DEFAULT 'active',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS inputs (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL,
    content TEXT NOT NULL,
    ground_truth TEXT,
    metadata TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS prompt_versions (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL,
    version_number INTEGER NOT NULL,
    prompt_text TEXT NOT NULL,
    parent_version_id TEXT,
    mutation_explanation TEXT,
    status TEXT NOT NULL DEFAULT 'proposed',
    pareto_rank INTEGER,
    created_at TEXT NOT NULL,
    UNIQUE (session_id, version_number)
  );

  CREATE TABLE IF NOT EXISTS run_results (
    id TEXT PRIMARY KEY,
    input_id TEXT NOT NULL,
    prompt_version_id TEXT NOT NULL,
    output TEXT NOT NULL,
    latency_ms INTEGER NOT NULL DEFAULT 0,
    tokens_used INTEGER NOT NULL DEFAULT 0,
    human_feedback TEXT,
    feedback_reason TEXT,
    human_correction TEXT,
    comparison_result TEXT,
    trace_id TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status);
  CREATE INDEX IF NOT EXISTS idx_inputs_session ON inputs(session_id);
  CREATE INDEX IF NOT EXISTS idx_versions_session ON prompt_versions(session_id);
  CREATE INDEX IF NOT EXISTS idx_results_input ON run_results(input_id);
  CREATE INDEX IF NOT EXISTS idx_results_version ON run_results(prompt_version_id);
`

// ============ Row shapes ============

interface SessionRow {
  id: string
  name: string
  task_description: string
  output_description: string | null
  model_provider: string
  model_name: string
  model_temperature: number
  batch_size: number
  status: string
  created_at: string
  updated_at: string
}

interface InputRow {
  id: string
  session_id: string
  content: string
  ground_truth: string | null
  metadata: string | null
  created_at: string
}

interface VersionRow {
  id: string
  session_id: string
  version_number: number
  prompt_text: string
  parent_version_id: string | null
  mutation_explanation: string | null
  status: string
  pareto_rank: number | null
  created_at: string
}

interface ResultRow {
  id: string
  input_id: string
  prompt_version_id: string
  output: string
  latency_ms: number
  tokens_used: number
  human_feedback: string | null
  feedback_reason: string | null
  human_correction: string | null
  comparison_result: string | null
  trace_id: string | null
  created_at: string
}

// ============ Row conversion ============

function corrupt(column: string, value: string): Error {
  return new Error(`Unexpected ${column} value in database: ${value}`)
}

function narrowNullable<T extends string>(
  column: string,
  value: string | null,
  guard: (v: string) => v is T
): T | null {
  if (value === null) return null
  if (guard(value)) return value
  throw corrupt(column, value)
}

function parseMetadata(raw: string | null): Record<string, unknown> | undefined {
  if (raw === null) return undefined
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed }
  }
  return { value: parsed }
}

function rowToSession(row: SessionRow): Session {
  if (!isSessionStatus(row.status)) throw corrupt('sessions.status', row.status)
  return {
    id: row.id,
    name: row.name,
    taskDescription: row.task_description,
    outputDescription: row.output_description ?? undefined,
    modelProvider: row.model_provider,
    modelName: row.model_name,
    modelTemperature: row.model_temperature,
    batchSize: row.batch_size,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function sessionToRow(session: Session): SessionRow {
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

function rowToInput(row: InputRow): Input {
  return {
    id: row.id,
    sessionId: row.session_id,
    content: row.content,
    groundTruth: row.ground_truth ?? undefined,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  }
}

function rowToVersion(row: VersionRow): PromptVersion {
  if (!isPromptVersionStatus(row.status)) throw corrupt('prompt_versions.status', row.status)
  return {
    id: row.id,
    sessionId: row.session_id,
    versionNumber: row.version_number,
    promptText: row.prompt_text,
    parentVersionId: row.parent_version_id ?? undefined,
    mutationExplanation: row.mutation_explanation ?? undefined,
    status: row.status,
    paretoRank: row.pareto_rank ?? undefined,
    createdAt: row.created_at,
  }
}

function rowToResult(row: ResultRow): RunResult {
  return {
    id: row.id,
    inputId: row.input_id,
    promptVersionId: row.prompt_version_id,
    output: row.output,
    latencyMs: row.latency_ms,
    tokensUsed: row.tokens_used,
    humanFeedback: narrowNullable('human_feedback', row.human_feedback, isHumanFeedback),
    feedbackReason: row.feedback_reason,
    humanCorrection: row.human_correction,
    comparisonResult: narrowNullable(
      'comparison_result',
      row.comparison_result,
      isComparisonJudgment
    ),
    traceId: row.trace_id,
    createdAt: row.created_at,
  }
}

function resultToRow(result: RunResult): ResultRow {
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
    trace_id: result.traceId,
    created_at: result.createdAt,
  }
}

/** Keep the current value where the patch leaves a field undefined */
function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next
}

// ============ Repository ============

export class SqliteRepository implements RefinementRepository {
  private db: Database.Database

  /**
   * @param dbPath - file path, or `:memory:` for a throwaway database
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      ensureDir(dirname(dbPath))
    }
    this.db = new Database(dbPath)
    this.db.exec(SCHEMA)
    logger.debug(`Database initialized: ${dbPath}`)
  }

  // ============ Sessions ============

  insertSession(session: Session): void {
    this.db
      .prepare<SessionRow>(
        `INSERT INTO sessions
         (id, name, task_description, output_description, model_provider, model_name,
          model_temperature, batch_size, status, created_at, updated_at)
         VALUES (@id, @name, @task_description, @output_description, @model_provider, @model_name,
          @model_temperature, @batch_size, @status, @created_at, @updated_at)`
      )
      .run(sessionToRow(session))
  }

  getSession(id: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(id)
    return row ? rowToSession(row) : null
  }

  listSessions(query: ListSessionsQuery): Session[] {
    const status = query.status ?? null
    return this.db
      .prepare<[string | null, string | null, number], SessionRow>(
        `SELECT * FROM sessions
         WHERE (? IS NULL OR status = ?)
         ORDER BY updated_at DESC, rowid DESC
         LIMIT ?`
      )
      .all(status, status, query.limit)
      .map(rowToSession)
  }

  updateSession(id: string, update: SessionUpdate, updatedAt: string): Session | null {
    const apply = this.db.transaction((): Session | null => {
      const current = this.getSession(id)
      if (!current) return null
      const next: Session = {
        ...current,
        name: pick(update.name, current.name),
        taskDescription: pick(update.taskDescription, current.taskDescription),
        outputDescription: pick(update.outputDescription, current.outputDescription),
        modelProvider: pick(update.modelProvider, current.modelProvider),
        modelName: pick(update.modelName, current.modelName),
        modelTemperature: pick(update.modelTemperature, current.modelTemperature),
        batchSize: pick(update.batchSize, current.batchSize),
        status: pick(update.status, current.status),
        updatedAt,
      }
      this.db
        .prepare<SessionRow>(
          `UPDATE sessions SET
             name = @name, task_description = @task_description,
             output_description = @output_description, model_provider = @model_provider,
             model_name = @model_name, model_temperature = @model_temperature,
             batch_size = @batch_size, status = @status, updated_at = @updated_at,
             created_at = @created_at
           WHERE id = @id`
        )
        .run(sessionToRow(next))
      return next
    })
    return apply()
  }

  deleteSession(id: string): boolean {
    const remove = this.db.transaction((): boolean => {
      if (!this.getSession(id)) return false
      this.db
        .prepare<[string, string]>(
          `DELETE FROM run_results
           WHERE input_id IN (SELECT id FROM inputs WHERE session_id = ?)
              OR prompt_version_id IN (SELECT id FROM prompt_versions WHERE session_id = ?)`
        )
        .run(id, id)
      this.db.prepare<[string]>('DELETE FROM prompt_versions WHERE session_id = ?').run(id)
      this.db.prepare<[string]>('DELETE FROM inputs WHERE session_id = ?').run(id)
      this.db.prepare<[string]>('DELETE FROM sessions WHERE id = ?').run(id)
      return true
    })
    const deleted = remove()
    if (deleted) logger.debug(`Deleted session ${id}`)
    return deleted
  }

  // ============ Inputs ============

  insertInputs(inputs: Input[]): void {
    const stmt = this.db.prepare<InputRow>(
      `INSERT INTO inputs (id, session_id, content, ground_truth, metadata, created_at)
       VALUES (@id, @session_id, @content, @ground_truth, @metadata, @created_at)`
    )
    const insertAll = this.db.transaction((items: Input[]) => {
      for (const input of items) {
        stmt.run({
          id: input.id,
          session_id: input.sessionId,
          content: input.content,
          ground_truth: input.groundTruth ?? null,
          metadata: input.metadata ? JSON.stringify(input.metadata) : null,
          created_at: input.createdAt,
        })
      }
    })
    insertAll(inputs)
  }

  getInput(id: string): Input | null {
    const row = this.db.prepare<[string], InputRow>('SELECT * FROM inputs WHERE id = ?').get(id)
    return row ? rowToInput(row) : null
  }

  listInputs(sessionId: string, query: ListInputsQuery): Input[] {
    // LIMIT -1 means no limit in SQLite
    return this.db
      .prepare<[string, number, number], InputRow>(
        `SELECT * FROM inputs WHERE session_id = ?
         ORDER BY created_at, rowid
         LIMIT ? OFFSET ?`
      )
      .all(sessionId, query.limit ?? -1, query.offset)
      .map(rowToInput)
  }

  countInputs(sessionId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM inputs WHERE session_id = ?'
      )
      .get(sessionId)
    return row?.count ?? 0
  }

  deleteInput(id: string): boolean {
    const info = this.db.prepare<[string]>('DELETE FROM inputs WHERE id = ?').run(id)
    return info.changes > 0
  }

  listInputsExcluding(sessionId: string, limit: number, excludeIds: string[]): Input[] {
    return this.db
      .prepare<[string, string, number], InputRow>(
        `SELECT * FROM inputs
         WHERE session_id = ? AND id NOT IN (SELECT value FROM json_each(?))
         ORDER BY created_at, rowid
         LIMIT ?`
      )
      .all(sessionId, JSON.stringify(excludeIds), limit)
      .map(rowToInput)
  }

  // ============ Prompt versions ============

  insertVersion(version: PromptVersion): void {
    this.db
      .prepare<VersionRow>(
        `INSERT INTO prompt_versions
         (id, session_id, version_number, prompt_text, parent_version_id,
          mutation_explanation, status, pareto_rank, created_at)
         VALUES (@id, @session_id, @version_number, @prompt_text, @parent_version_id,
          @mutation_explanation, @status, @pareto_rank, @created_at)`
      )
      .run({
        id: version.id,
        session_id: version.sessionId,
        version_number: version.versionNumber,
        prompt_text: version.promptText,
        parent_version_id: version.parentVersionId ?? null,
        mutation_explanation: version.mutationExplanation ?? null,
        status: version.status,
        pareto_rank: version.paretoRank ?? null,
        created_at: version.createdAt,
      })
  }

  getVersion(id: string): PromptVersion | null {
    const row = this.db
      .prepare<[string], VersionRow>('SELECT * FROM prompt_versions WHERE id = ?')
      .get(id)
    return row ? rowToVersion(row) : null
  }

  getMaxVersionNumber(sessionId: string): number {
    const row = this.db
      .prepare<[string], { max: number | null }>(
        'SELECT MAX(version_number) AS max FROM prompt_versions WHERE session_id = ?'
      )
      .get(sessionId)
    return row?.max ?? 0
  }

  getTopVersion(sessionId: string, status?: PromptVersionStatus): PromptVersion | null {
    const filter = status ?? null
    const row = this.db
      .prepare<[string, string | null, string | null], VersionRow>(
        `SELECT * FROM prompt_versions
         WHERE session_id = ? AND (? IS NULL OR status = ?)
         ORDER BY version_number DESC
         LIMIT 1`
      )
      .get(sessionId, filter, filter)
    return row ? rowToVersion(row) : null
  }

  listVersions(sessionId: string): PromptVersion[] {
    return this.db
      .prepare<[string], VersionRow>(
        'SELECT * FROM prompt_versions WHERE session_id = ? ORDER BY version_number ASC'
      )
      .all(sessionId)
      .map(rowToVersion)
  }

  updateVersionStatus(id: string, status: PromptVersionStatus): PromptVersion | null {
    const info = this.db
      .prepare<[string, string]>('UPDATE prompt_versions SET status = ? WHERE id = ?')
      .run(status, id)
    if (info.changes === 0) return null
    return this.getVersion(id)
  }

  // ============ Run results ============

  insertResult(result: RunResult): void {
    this.db
      .prepare<ResultRow>(
        `INSERT INTO run_results
         (id, input_id, prompt_version_id, output, latency_ms, tokens_used, human_feedback,
          feedback_reason, human_correction, comparison_result, trace_id, created_at)
         VALUES (@id, @input_id, @prompt_version_id, @output, @latency_ms, @tokens_used,
          @human_feedback, @feedback_reason, @human_correction, @comparison_result,
          @trace_id, @created_at)`
      )
      .run(resultToRow(result))
  }

  getResult(id: string): RunResult | null {
    const row = this.db
      .prepare<[string], ResultRow>('SELECT * FROM run_results WHERE id = ?')
      .get(id)
    return row ? rowToResult(row) : null
  }

  listResultsForVersion(versionId: string): RunResult[] {
    return this.db
      .prepare<[string], ResultRow>(
        'SELECT * FROM run_results WHERE prompt_version_id = ? ORDER BY created_at, rowid'
      )
      .all(versionId)
      .map(rowToResult)
  }

  listResultsForInput(inputId: string): RunResult[] {
    return this.db
      .prepare<[string], ResultRow>(
        'SELECT * FROM run_results WHERE input_id = ? ORDER BY created_at, rowid'
      )
      .all(inputId)
      .map(rowToResult)
  }

  updateResult(id: string, patch: ResultPatch): RunResult | null {
    const apply = this.db.transaction((): RunResult | null => {
      const current = this.getResult(id)
      if (!current) return null
      const next: RunResult = {
        ...current,
        humanFeedback: pick(patch.humanFeedback, current.humanFeedback),
        feedbackReason: pick(patch.feedbackReason, current.feedbackReason),
        humanCorrection: pick(patch.humanCorrection, current.humanCorrection),
        comparisonResult: pick(patch.comparisonResult, current.comparisonResult),
        traceId: pick(patch.traceId, current.traceId),
      }
      this.db
        .prepare<[string | null, string | null, string | null, string | null, string | null, string]>(
          `UPDATE run_results SET
             human_feedback = ?, feedback_reason = ?, human_correction = ?,
             comparison_result = ?, trace_id = ?
           WHERE id = ?`
        )
        .run(
          next.humanFeedback,
          next.feedbackReason,
          next.humanCorrection,
          next.comparisonResult,
          next.traceId,
          id
        )
      return next
    })
    return apply()
  }

  close(): void {
    this.db.close()
  }
}
