/**
 * Refinement session and its test inputs
 */

export type SessionStatus = 'active' | 'completed' | 'archived'

export interface Session {
  id: string
  name: string
  taskDescription: string
  outputDescription?: string
  modelProvider: string
  modelName: string
  modelTemperature: number
  batchSize: number
  status: SessionStatus
  createdAt: string // ISO timestamp
  updatedAt: string
}

export interface SessionDraft {
  name: string
  taskDescription: string
  outputDescription?: string
  modelProvider: string
  modelName: string
  modelTemperature?: number // default 0.7
  batchSize?: number // default 10
}

export type SessionUpdate = Partial<
  Pick<
    Session,
    | 'name'
    | 'taskDescription'
    | 'outputDescription'
    | 'modelProvider'
    | 'modelName'
    | 'modelTemperature'
    | 'batchSize'
    | 'status'
  >
>

export interface Input {
  id: string
  sessionId: string
  content: string
  groundTruth?: string
  metadata?: Record<string, unknown>
  createdAt: string
}

export interface InputDraft {
  content: string
  groundTruth?: string
  metadata?: Record<string, unknown>
}

export const SESSION_STATUSES: readonly SessionStatus[] = ['active', 'completed', 'archived']

export function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some(s => s === value)
}
