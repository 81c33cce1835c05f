/**
 * Completion service port
 *
 * Everything that talks to a model goes through CompletionClient. The batch
 * runner, the mutation proposer and the CLI never see the SDK.
 */

export interface CompletionOptions {
  /** Falls back to the client's default model */
  model?: string
  temperature?: number
  /** Default 2048 */
  maxTokens?: number
}

export interface CompletionResponse {
  text: string
  tokensUsed: number
  latencyMs: number
  /** Model actually requested */
  model: string
}

/**
 * Rejects with CompletionError (carrying latencyMs) on any failure.
 */
export interface CompletionClient {
  readonly defaultModel: string
  complete(prompt: string, options?: CompletionOptions): Promise<CompletionResponse>
}
