/**
 * Prompt version lifecycle over the repository
 *
 * - createVersion: next number in the session, default status proposed
 * - getCurrentVersion: highest-numbered accepted version
 * - getLineage: root → version via parentVersionId
 */

import { generateId } from '../shared/generateId.js'
import { createLogger } from '../shared/logger.js'
import { diffPrompts } from './diffPrompts.js'
import type { RefinementRepository } from '../store/types.js'
import type {
  PromptVersion,
  PromptVersionStatus,
  CreateVersionOptions,
  DiffLine,
} from '../types/promptVersion.js'

const logger = createLogger('version-store')

const TERMINAL_STATUSES: readonly PromptVersionStatus[] = ['accepted', 'rejected']

export class VersionStore {
  constructor(private readonly repo: RefinementRepository) {}

  /**
   * Number is read-max-then-insert. Two concurrent creators for one session
   * collide on UNIQUE(session_id, version_number) and the second one throws.
   */
  createVersion(
    sessionId: string,
    promptText: string,
    options: CreateVersionOptions = {}
  ): PromptVersion {
    const version: PromptVersion = {
      id: generateId(),
      sessionId,
      versionNumber: this.repo.getMaxVersionNumber(sessionId) + 1,
      promptText,
      parentVersionId: options.parentVersionId,
      mutationExplanation: options.mutationExplanation,
      status: options.status ?? 'proposed',
      createdAt: new Date().toISOString(),
    }
    this.repo.insertVersion(version)
    logger.info(`Created v${version.versionNumber} (${version.status}) in session ${sessionId}`)
    return version
  }

  getVersion(id: string): PromptVersion | null {
    return this.repo.getVersion(id)
  }

  getCurrentVersion(sessionId: string): PromptVersion | null {
    return this.repo.getTopVersion(sessionId, 'accepted')
  }

  getLatestVersion(sessionId: string): PromptVersion | null {
    return this.repo.getTopVersion(sessionId)
  }

  getVersionHistory(sessionId: string): PromptVersion[] {
    return this.repo.listVersions(sessionId)
  }

  /**
   * Any transition is allowed. Leaving accepted/rejected is logged as a warning.
   */
  updateStatus(versionId: string, status: PromptVersionStatus): PromptVersion | null {
    const existing = this.repo.getVersion(versionId)
    if (!existing) return null
    if (TERMINAL_STATUSES.includes(existing.status) && existing.status !== status) {
      logger.warn(`Version ${versionId} moves from terminal status ${existing.status} to ${status}`)
    }
    return this.repo.updateVersionStatus(versionId, status)
  }

  diff(oldVersionId: string, newVersionId: string): DiffLine[] {
    const oldVersion = this.repo.getVersion(oldVersionId)
    const newVersion = this.repo.getVersion(newVersionId)
    if (!oldVersion || !newVersion) return []
    return diffPrompts(oldVersion.promptText, newVersion.promptText)
  }

  /** Root first. Empty when the version does not exist. */
  getLineage(versionId: string): PromptVersion[] {
    const chain: PromptVersion[] = []
    const seen = new Set<string>()
    let cursor: string | undefined = versionId
    while (cursor && !seen.has(cursor)) {
      seen.add(cursor)
      const version = this.repo.getVersion(cursor)
      if (!version) break
      chain.push(version)
      cursor = version.parentVersionId
    }
    return chain.reverse()
  }
}
