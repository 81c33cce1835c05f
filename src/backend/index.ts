/**
 * @entry Backend
 *
 * Completion service port and its OpenAI SDK implementation
 */

export type { CompletionClient, CompletionOptions, CompletionResponse } from './types.js'
export { createCompletionClient, resolveBaseURL, OPENROUTER_BASE_URL } from './openaiCompletionClient.js'
