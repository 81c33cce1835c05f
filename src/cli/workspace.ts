/**
 * Per-command wiring: config, repository, completion client, optional tracing,
 * plus lookup of sessions, versions and results by short reference.
 */

import { loadConfig, type Config } from '../config/index.js'
import { createCompletionClient, type CompletionClient } from '../backend/index.js'
import { FileTraceLogger } from '../telemetry/index.js'
import { SqliteRepository } from '../store/SqliteRepository.js'
import { getDatabasePath } from '../store/paths.js'
import { AppError, printError } from '../shared/error.js'
import { matchesShortId } from '../shared/generateId.js'
import { setLogLevel } from '../shared/logger.js'
import type { RefinementRepository } from '../store/types.js'
import type { TraceLogger } from '../telemetry/types.js'
import type { RefinementDeps } from '../prompt-optimization/index.js'
import type { PromptVersion, RunResult, Session } from '../types/index.js'

export interface Workspace {
  config: Config
  repo: RefinementRepository
  traceLogger?: TraceLogger
  /** Built on first use so offline commands need no API key */
  client(): CompletionClient
  refinementDeps(): RefinementDeps
}

export async function openWorkspace(): Promise<Workspace> {
  const config = await loadConfig()
  const repo = new SqliteRepository(getDatabasePath(config.storage.databasePath))
  const traceLogger = config.telemetry.enabled ? new FileTraceLogger() : undefined

  let client: CompletionClient | undefined
  const getClient = (): CompletionClient => {
    client ??= createCompletionClient(config.llm)
    return client
  }

  return {
    config,
    repo,
    traceLogger,
    client: getClient,
    refinementDeps: () => ({
      repo,
      client: getClient(),
      traceLogger,
      reflectionModel: config.llm.reflectionModel,
    }),
  }
}

export interface CommandOptions {
  verbose?: boolean
}

/**
 * Run a command body against a fresh workspace. Errors are printed and turn
 * into exit code 1; the database is always closed.
 */
export async function withWorkspace(
  options: CommandOptions,
  body: (ws: Workspace) => Promise<void> | void
): Promise<void> {
  if (options.verbose) setLogLevel('debug')
  let ws: Workspace | undefined
  try {
    ws = await openWorkspace()
    await body(ws)
  } catch (error) {
    printError(error)
    process.exitCode = 1
  } finally {
    ws?.repo.close()
  }
}

// ============ Reference resolution ============

const SESSION_SCAN_LIMIT = 1000

/**
 * Session by id, id prefix or exact name. Without a reference, the most
 * recently updated active session.
 */
export function resolveSession(repo: RefinementRepository, ref?: string): Session {
  if (!ref) {
    const [latest] = repo.listSessions({ status: 'active', limit: 1 })
    if (!latest) throw AppError.sessionNotFound('(no active session)')
    return latest
  }

  const exact = repo.getSession(ref)
  if (exact) return exact

  const candidates = repo
    .listSessions({ limit: SESSION_SCAN_LIMIT })
    .filter(s => s.name === ref || matchesShortId(s.id, ref))
  const [match] = candidates
  if (!match || candidates.length > 1) throw AppError.sessionNotFound(ref)
  return match
}

/** `v3`, `3`, or an id prefix within the session */
export function resolveVersion(
  repo: RefinementRepository,
  session: Session,
  ref: string
): PromptVersion {
  const versions = repo.listVersions(session.id)
  const numbered = /^v?(\d+)$/i.exec(ref)
  const match = numbered
    ? versions.find(v => v.versionNumber === Number(numbered[1]))
    : versions.find(v => matchesShortId(v.id, ref))
  if (!match) throw AppError.versionNotFound(ref)
  return match
}

export function requireCurrentVersion(repo: RefinementRepository, session: Session): PromptVersion {
  const current = repo.getTopVersion(session.id, 'accepted')
  if (!current) throw AppError.versionNotFound(`current version of ${session.name}`)
  return current
}

/** Result by id, or id prefix among the session's results */
export function resolveResult(repo: RefinementRepository, session: Session, ref: string): RunResult {
  const exact = repo.getResult(ref)
  if (exact) return exact

  const candidates = repo
    .listVersions(session.id)
    .flatMap(v => repo.listResultsForVersion(v.id))
    .filter(r => matchesShortId(r.id, ref))
  const [match] = candidates
  if (!match || candidates.length > 1) throw AppError.resultNotFound(ref)
  return match
}
