import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, llmProviderSchema, type Config, type LlmConfig } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.promptloop.yaml'

let cachedConfig: Config | null = null

/**
 * Locate config files (global + project).
 * Global is the base; project overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // cwd is home: load once
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load config: ~/.promptloop.yaml, then ./.promptloop.yaml, then env overrides.
 * An invalid file logs a warning and falls back to defaults.
 */
export async function loadConfig(options?: { cwd?: string }): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options?.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a YAML file; empty or comment-only files give {}
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring ${filePath}: top level is not a mapping`)
    return {}
  }
  return parsed
}

/**
 * Merge config objects: project fields override global fields.
 * Nested mappings merge recursively; arrays are replaced.
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const current = result[key]
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMergeConfig(current, val)
    } else {
      result[key] = val
    }
  }
  return result
}

/**
 * Apply environment variable overrides.
 * Runs after schema validation; malformed values are ignored with a warning.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  const llm: LlmConfig = { ...config.llm }

  if (env.PLOOP_PROVIDER) {
    const provider = llmProviderSchema.safeParse(env.PLOOP_PROVIDER)
    if (provider.success) {
      llm.provider = provider.data
    } else {
      logger.warn(`Ignoring PLOOP_PROVIDER=${env.PLOOP_PROVIDER}`)
    }
  }
  if (env.PLOOP_MODEL) llm.model = env.PLOOP_MODEL
  if (env.PLOOP_TEMPERATURE) {
    const temperature = Number(env.PLOOP_TEMPERATURE)
    if (Number.isFinite(temperature)) {
      llm.temperature = temperature
    } else {
      logger.warn(`Ignoring PLOOP_TEMPERATURE=${env.PLOOP_TEMPERATURE}`)
    }
  }
  if (env.PLOOP_BASE_URL) llm.baseURL = env.PLOOP_BASE_URL
  if (!llm.apiKey) {
    const apiKey =
      llm.provider === 'openrouter'
        ? env.OPENROUTER_API_KEY || env.OPENAI_API_KEY
        : env.OPENAI_API_KEY || env.OPENROUTER_API_KEY
    if (apiKey) llm.apiKey = apiKey
  }

  const storage = env.PLOOP_DATABASE_PATH
    ? { ...config.storage, databasePath: config.storage.databasePath ?? env.PLOOP_DATABASE_PATH }
    : config.storage

  return { ...config, llm, storage }
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
