/**
 * Unified error handling
 * Error categories, codes and fix suggestions
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ Categories ============

export type ErrorCategory =
  | 'CONFIG'
  | 'NETWORK'
  | 'API'
  | 'RESOURCE' // missing session/version/input/result
  | 'VALIDATION'
  | 'WORKFLOW'
  | 'TIMEOUT'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'SESSION_NOT_FOUND'
  | 'VERSION_NOT_FOUND'
  | 'INPUT_NOT_FOUND'
  | 'RESULT_NOT_FOUND'
  | 'RUN_PRODUCED_NO_RESULT'
  | 'COMPARISON_INCOMPLETE'
  | 'COMPARISON_EMPTY'
  | 'NO_FEEDBACK'
  | 'NOTHING_PENDING'
  | 'INVALID_PROMPT_TEMPLATE'
  | 'INVALID_INPUT_FILE'
  | 'COMPLETION_FAILED'
  | 'ERR_TIMEOUT'
  | 'ERR_NETWORK'
  | 'ERR_RATE_LIMIT'
  | 'ERR_AUTH'
  | 'ERR_QUOTA'
  | 'ERR_VALIDATION'
  | 'UNKNOWN'

// ============ AppError ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public override readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** Terminal rendering */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .promptloop.yaml against the documented fields'
    )
  }

  static sessionNotFound(id: string): AppError {
    return new AppError(
      'SESSION_NOT_FOUND',
      `Session not found: ${id}`,
      'RESOURCE',
      undefined,
      'List sessions: ploop session list'
    )
  }

  static versionNotFound(id: string): AppError {
    return new AppError(
      'VERSION_NOT_FOUND',
      `Prompt version not found: ${id}`,
      'RESOURCE',
      undefined,
      'Show versions: ploop history [--session <ref>]'
    )
  }

  static inputNotFound(id: string): AppError {
    return new AppError('INPUT_NOT_FOUND', `Input not found: ${id}`, 'RESOURCE')
  }

  static resultNotFound(id: string): AppError {
    return new AppError(
      'RESULT_NOT_FOUND',
      `Run result not found: ${id}`,
      'RESOURCE',
      undefined,
      'List results: ploop results [--session <ref>]'
    )
  }

  static runProducedNoResult(inputId: string): AppError {
    return new AppError(
      'RUN_PRODUCED_NO_RESULT',
      `Failed to run prompt on input ${inputId}`,
      'RESOURCE'
    )
  }

  static comparisonIncomplete(pending: number): AppError {
    return new AppError(
      'COMPARISON_INCOMPLETE',
      `${pending} comparison row(s) still have no judgment`,
      'WORKFLOW',
      undefined,
      'Judge every row first: ploop judge <result-id> better|worse|same'
    )
  }

  static comparisonEmpty(): AppError {
    return new AppError(
      'COMPARISON_EMPTY',
      'No comparison rows to judge',
      'WORKFLOW',
      undefined,
      'Run the comparison first: ploop compare'
    )
  }

  static noFeedback(versionId: string): AppError {
    return new AppError(
      'NO_FEEDBACK',
      `No feedback recorded for version ${versionId}`,
      'WORKFLOW',
      undefined,
      'Review some outputs first: ploop feedback <result-id> good|bad'
    )
  }

  static nothingPending(what: 'proposal' | 'comparison'): AppError {
    return new AppError('NOTHING_PENDING', `No pending ${what}`, 'WORKFLOW')
  }

  static invalidPromptTemplate(reason: string): AppError {
    return new AppError(
      'INVALID_PROMPT_TEMPLATE',
      `Invalid prompt template: ${reason}`,
      'VALIDATION',
      undefined,
      'The prompt must contain the {input} placeholder exactly once'
    )
  }

  static invalidInputFile(reason: string): AppError {
    return new AppError('INVALID_INPUT_FILE', `Invalid inputs file: ${reason}`, 'VALIDATION')
  }

  static completionFailed(message: string, latencyMs: number, cause?: unknown): CompletionError {
    return new CompletionError(message, latencyMs, cause)
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  /**
   * Build an AppError from a plain Error or string by matching known patterns
   */
  static fromError(error: Error | string): AppError {
    const errorMessage = typeof error === 'string' ? error : error.message

    for (const pattern of errorPatterns) {
      if (pattern.pattern.test(errorMessage)) {
        return new AppError(pattern.code, errorMessage, pattern.category, error, pattern.suggestion)
      }
    }

    return new AppError('UNKNOWN', errorMessage, 'UNKNOWN', error)
  }
}

/**
 * Completion service failure. Carries the elapsed latency so callers can
 * still account for the time spent.
 */
export class CompletionError extends AppError {
  constructor(
    message: string,
    public readonly latencyMs: number,
    cause?: unknown
  ) {
    const classified = AppError.fromError(message)
    super(
      'COMPLETION_FAILED',
      message,
      classified.category === 'UNKNOWN' ? 'API' : classified.category,
      cause,
      classified.suggestion
    )
    this.name = 'CompletionError'
  }
}

// ============ Pattern matching ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /timeout|timed out|ETIMEDOUT/i,
    category: 'TIMEOUT',
    code: 'ERR_TIMEOUT',
    suggestion: 'Raise llm.timeoutMs or retry the step',
  },
  {
    pattern: /ECONNREFUSED|ENOTFOUND|network|connection/i,
    category: 'NETWORK',
    code: 'ERR_NETWORK',
    suggestion: 'Check network access and llm.baseURL',
  },
  {
    pattern: /rate.?limit|429|too many requests/i,
    category: 'API',
    code: 'ERR_RATE_LIMIT',
    suggestion: 'Wait a few minutes before retrying',
  },
  {
    pattern: /unauthorized|401|api.?key|authentication/i,
    category: 'API',
    code: 'ERR_AUTH',
    suggestion: 'Check OPENROUTER_API_KEY / OPENAI_API_KEY',
  },
  {
    pattern: /quota|credit|billing|payment|402/i,
    category: 'API',
    code: 'ERR_QUOTA',
    suggestion: 'Check the provider account balance',
  },
  {
    pattern: /invalid|validation|malformed|parse error/i,
    category: 'VALIDATION',
    code: 'ERR_VALIDATION',
    suggestion: 'Check the input format',
  },
]

// ============ Output ============

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  NETWORK: chalk.red,
  API: chalk.red,
  RESOURCE: chalk.yellow,
  VALIDATION: chalk.yellow,
  WORKFLOW: chalk.magenta,
  TIMEOUT: chalk.magenta,
  UNKNOWN: chalk.gray,
}

/** Print an error to the terminal */
export function printError(error: unknown): void {
  if (error instanceof AppError) {
    console.error(error.format())
    return
  }
  const appError = error instanceof Error ? AppError.fromError(error) : AppError.unknown(error)
  console.error(appError.format())
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
