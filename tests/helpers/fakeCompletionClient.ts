import { CompletionError } from '../../src/shared/error.js'
import type {
  CompletionClient,
  CompletionOptions,
  CompletionResponse,
} from '../../src/backend/types.js'

export type ScriptedReply = string | { fail: string }

export interface RecordedCall {
  prompt: string
  options: CompletionOptions
}

/**
 * Replies from a queue, then from `fallback`. `{ fail }` entries reject with
 * a CompletionError the way the real client does.
 */
export class FakeCompletionClient implements CompletionClient {
  readonly defaultModel = 'fake-model'
  readonly calls: RecordedCall[] = []
  private readonly queue: ScriptedReply[]

  constructor(
    replies: ScriptedReply[] = [],
    private readonly fallback: (prompt: string) => string = () => 'ok'
  ) {
    this.queue = [...replies]
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.queue.push(...replies)
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<CompletionResponse> {
    this.calls.push({ prompt, options })
    const reply = this.queue.shift() ?? this.fallback(prompt)
    if (typeof reply !== 'string') {
      throw new CompletionError(`Completion failed: ${reply.fail}`, 0)
    }
    return {
      text: reply,
      tokensUsed: 10,
      latencyMs: 5,
      model: options.model ?? this.defaultModel,
    }
  }
}
