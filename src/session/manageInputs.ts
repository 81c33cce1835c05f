/**
 * Test inputs of a session, and the file formats they are imported from
 */

import { parse as parseYaml } from 'yaml'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { generateId } from '../shared/generateId.js'
import { err, ok, type Result } from '../shared/result.js'
import { INPUT_TOKEN } from '../prompt-optimization/BatchRunner.js'
import type { RefinementRepository } from '../store/types.js'
import type { Input, InputDraft } from '../types/session.js'

export type InputFileFormat = 'json' | 'yaml' | 'text'

export function createInputs(
  repo: RefinementRepository,
  sessionId: string,
  drafts: InputDraft[]
): Input[] {
  const createdAt = new Date().toISOString()
  const inputs = drafts.map(draft => ({
    id: generateId(),
    sessionId,
    content: draft.content,
    groundTruth: draft.groundTruth,
    metadata: draft.metadata,
    createdAt,
  }))
  repo.insertInputs(inputs)
  return inputs
}

export function getInput(repo: RefinementRepository, id: string): Input | null {
  return repo.getInput(id)
}

export function listInputs(
  repo: RefinementRepository,
  sessionId: string,
  options: { limit?: number; offset?: number } = {}
): Input[] {
  return repo.listInputs(sessionId, { limit: options.limit, offset: options.offset ?? 0 })
}

export function countInputs(repo: RefinementRepository, sessionId: string): number {
  return repo.countInputs(sessionId)
}

export function deleteInput(repo: RefinementRepository, id: string): boolean {
  return repo.deleteInput(id)
}

/** Next `batchSize` inputs in creation order, skipping `excludeIds` */
export function getBatch(
  repo: RefinementRepository,
  sessionId: string,
  batchSize: number,
  excludeIds: string[] = []
): Input[] {
  return repo.listInputsExcluding(sessionId, batchSize, excludeIds)
}

// ============ Import formats ============

export function detectInputFormat(filePath: string): InputFileFormat {
  const lower = filePath.toLowerCase()
  if (lower.endsWith('.json')) return 'json'
  if (lower.endsWith('.yaml') || lower.endsWith('.yml')) return 'yaml'
  return 'text'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toDraft(entry: unknown, index: number): Result<InputDraft, AppError> {
  if (typeof entry === 'string') {
    return ok({ content: entry })
  }
  const content = isRecord(entry) ? entry.content : undefined
  if (!isRecord(entry) || typeof content !== 'string') {
    return err(AppError.invalidInputFile(`entry ${index + 1} needs a string "content"`))
  }
  const truth = entry.groundTruth ?? entry.ground_truth
  return ok({
    content,
    groundTruth: typeof truth === 'string' ? truth : undefined,
    metadata: isRecord(entry.metadata) ? entry.metadata : undefined,
  })
}

function listToDrafts(data: unknown): Result<InputDraft[], AppError> {
  if (!Array.isArray(data)) {
    return err(AppError.invalidInputFile('expected a list of inputs'))
  }
  const drafts: InputDraft[] = []
  for (const [index, entry] of data.entries()) {
    const draft = toDraft(entry, index)
    if (!draft.ok) return draft
    if (draft.value.content.trim()) drafts.push(draft.value)
  }
  return ok(drafts)
}

/**
 * JSON or YAML: a list of strings or of `{ content, groundTruth?, metadata? }`.
 * Text: one input per non-empty line. Blank entries are dropped.
 */
export function parseInputsFile(
  content: string,
  format: InputFileFormat
): Result<InputDraft[], AppError> {
  if (format === 'text') {
    return ok(
      content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(Boolean)
        .map(line => ({ content: line }))
    )
  }

  let data: unknown
  try {
    data = format === 'json' ? JSON.parse(content) : parseYaml(content)
  } catch (error) {
    return err(AppError.invalidInputFile(getErrorMessage(error)))
  }
  return listToDrafts(data)
}

/** The template must carry the input token exactly once */
export function validatePromptTemplate(text: string): Result<string, AppError> {
  const occurrences = text.split(INPUT_TOKEN).length - 1
  if (occurrences === 0) {
    return err(AppError.invalidPromptTemplate(`missing ${INPUT_TOKEN} placeholder`))
  }
  if (occurrences > 1) {
    return err(AppError.invalidPromptTemplate(`${INPUT_TOKEN} appears ${occurrences} times`))
  }
  return ok(text)
}
