import { SqliteRepository } from '../../src/store/SqliteRepository.js'
import { generateId } from '../../src/shared/generateId.js'
import type { Input, Session } from '../../src/types/index.js'

export function createTestRepository(): SqliteRepository {
  return new SqliteRepository(':memory:')
}

export function seedSession(repo: SqliteRepository, overrides: Partial<Session> = {}): Session {
  const now = new Date().toISOString()
  const session: Session = {
    id: generateId(),
    name: 'sentiment',
    taskDescription: 'Classify sentiment',
    modelProvider: 'openrouter',
    modelName: 'fake-model',
    modelTemperature: 0.7,
    batchSize: 10,
    status: 'active',
    createdAt: now,
    updatedAt: now,
    ...overrides,
  }
  repo.insertSession(session)
  return session
}

export function seedInputs(repo: SqliteRepository, sessionId: string, contents: string[]): Input[] {
  const inputs = contents.map(content => ({
    id: generateId(),
    sessionId,
    content,
    createdAt: new Date().toISOString(),
  }))
  repo.insertInputs(inputs)
  return inputs
}
