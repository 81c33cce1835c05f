import { z } from 'zod'

export const temperatureSchema = z.number().min(0).max(2)
export const batchSizeSchema = z.number().int().positive()

export const llmProviderSchema = z.enum(['openai', 'openrouter', 'openai-compatible'])

export const llmConfigSchema = z.object({
  /** openrouter | openai | openai-compatible (needs baseURL) */
  provider: llmProviderSchema.default('openrouter'),
  /** Model used to run prompt versions */
  model: z.string().default('gpt-4o-mini'),
  temperature: temperatureSchema.default(0.7),
  maxTokens: z.number().int().positive().default(2048),
  baseURL: z.string().url().optional(),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().default(120_000),
  /** Model for the reflection request; falls back to `model` */
  reflectionModel: z.string().optional(),
})

export const storageConfigSchema = z.object({
  /** SQLite file; `:memory:` is accepted */
  databasePath: z.string().optional(),
})

export const sessionDefaultsSchema = z.object({
  batchSize: batchSizeSchema.default(10),
})

export const telemetryConfigSchema = z.object({
  /** Log run traces and feedback assessments under <data dir>/traces */
  enabled: z.boolean().default(false),
})

export const configSchema = z.object({
  llm: llmConfigSchema.default({}),
  storage: storageConfigSchema.default({}),
  session: sessionDefaultsSchema.default({}),
  telemetry: telemetryConfigSchema.default({}),
})

export type LlmProvider = z.infer<typeof llmProviderSchema>
export type LlmConfig = z.infer<typeof llmConfigSchema>
export type StorageConfig = z.infer<typeof storageConfigSchema>
export type SessionDefaults = z.infer<typeof sessionDefaultsSchema>
export type TelemetryConfig = z.infer<typeof telemetryConfigSchema>
export type Config = z.infer<typeof configSchema>
