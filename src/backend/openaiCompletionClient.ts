/**
 * OpenAI SDK completion client
 *
 * Works for OpenAI, OpenRouter and any OpenAI-compatible server (LM Studio,
 * Ollama, vLLM). One user message per request, no history.
 */

import OpenAI from 'openai'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { AppError, CompletionError } from '../shared/error.js'
import type { LlmConfig } from '../config/schema.js'
import type { CompletionClient, CompletionOptions, CompletionResponse } from './types.js'

const logger = createLogger('backend')

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

export function resolveBaseURL(llm: LlmConfig): string | undefined {
  if (llm.provider === 'openrouter') return llm.baseURL ?? OPENROUTER_BASE_URL
  return llm.baseURL
}

export function createCompletionClient(llm: LlmConfig): CompletionClient {
  const baseURL = resolveBaseURL(llm)
  if (llm.provider === 'openai-compatible' && !baseURL) {
    throw AppError.configInvalid('llm.baseURL is required when provider is "openai-compatible"')
  }

  const client = new OpenAI({
    baseURL,
    apiKey: llm.apiKey || 'no-key',
    timeout: llm.timeoutMs,
  })

  return {
    defaultModel: llm.model,

    async complete(prompt: string, options: CompletionOptions = {}): Promise<CompletionResponse> {
      const model = options.model || llm.model
      const temperature = options.temperature ?? llm.temperature
      const maxTokens = options.maxTokens ?? llm.maxTokens

      const startTime = Date.now()

      try {
        const completion = await client.chat.completions.create({
          model,
          messages: [{ role: 'user', content: prompt }],
          temperature,
          max_tokens: maxTokens,
        })

        const latencyMs = Date.now() - startTime
        const text = completion.choices[0]?.message?.content || ''
        const tokensUsed = completion.usage?.total_tokens ?? 0

        logger.debug(`Completed (${latencyMs}ms, model: ${model}, tokens: ${tokensUsed})`)

        return { text, tokensUsed, latencyMs, model }
      } catch (error: unknown) {
        const latencyMs = Date.now() - startTime

        if (error instanceof OpenAI.APIConnectionError) {
          throw new CompletionError(
            `Completion failed: connection to ${baseURL ?? 'api.openai.com'} failed - ${error.message}`,
            latencyMs,
            error
          )
        }
        if (error instanceof OpenAI.APIError) {
          throw new CompletionError(
            `Completion failed: API error (${String(error.status)}): ${error.message}`,
            latencyMs,
            error
          )
        }

        throw new CompletionError(`Completion failed: ${getErrorMessage(error)}`, latencyMs, error)
      }
    },
  }
}
