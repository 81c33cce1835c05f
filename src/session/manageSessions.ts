/**
 * Session CRUD
 */

import { generateId } from '../shared/generateId.js'
import { createLogger } from '../shared/logger.js'
import type { RefinementRepository } from '../store/types.js'
import type { Session, SessionDraft, SessionStatus, SessionUpdate } from '../types/session.js'

const logger = createLogger('session')

export const DEFAULT_TEMPERATURE = 0.7
export const DEFAULT_BATCH_SIZE = 10
export const DEFAULT_LIST_LIMIT = 50

export function createSession(repo: RefinementRepository, draft: SessionDraft): Session {
  const now = new Date().toISOString()
  const session: Session = {
    id: generateId(),
    name: draft.name,
    taskDescription: draft.taskDescription,
    outputDescription: draft.outputDescription,
    modelProvider: draft.modelProvider,
    modelName: draft.modelName,
    modelTemperature: draft.modelTemperature ?? DEFAULT_TEMPERATURE,
    batchSize: draft.batchSize ?? DEFAULT_BATCH_SIZE,
    status: 'active',
    createdAt: now,
    updatedAt: now,
  }
  repo.insertSession(session)
  logger.info(`Created session ${session.name} (${session.id})`)
  return session
}

export function getSession(repo: RefinementRepository, id: string): Session | null {
  return repo.getSession(id)
}

export function listSessions(
  repo: RefinementRepository,
  options: { status?: SessionStatus; limit?: number } = {}
): Session[] {
  return repo.listSessions({ status: options.status, limit: options.limit ?? DEFAULT_LIST_LIMIT })
}

/** Bumps updatedAt; null when the session does not exist */
export function updateSession(
  repo: RefinementRepository,
  id: string,
  update: SessionUpdate
): Session | null {
  return repo.updateSession(id, update, new Date().toISOString())
}

/** Also removes the session's inputs, versions and results */
export function deleteSession(repo: RefinementRepository, id: string): boolean {
  const deleted = repo.deleteSession(id)
  if (deleted) logger.info(`Deleted session ${id}`)
  return deleted
}
