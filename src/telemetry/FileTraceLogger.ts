/**
 * TraceLogger backed by JSON files: one trace per run under <data dir>/traces,
 * human assessments appended to the trace they judge.
 */

import { FileStore } from '../store/GenericFileStore.js'
import { getTracesDir } from '../store/paths.js'
import { generateId } from '../shared/generateId.js'
import { createLogger } from '../shared/logger.js'
import type { FeedbackAssessmentInput, RunTraceInput, TraceLogger } from './types.js'

const logger = createLogger('telemetry')

export interface TraceAssessment {
  name: 'output_quality'
  value: boolean
  rationale: string | null
  source: 'human'
  createdAt: string
}

export interface RunTrace {
  id: string
  name: 'prompt_eval'
  attributes: {
    promptVersionId: string
    runResultId: string
    model: string
  }
  inputs: { input: string; prompt: string }
  outputs: { output: string }
  assessments: TraceAssessment[]
  createdAt: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isRunTrace(data: unknown): data is RunTrace {
  return (
    isRecord(data) &&
    typeof data.id === 'string' &&
    data.name === 'prompt_eval' &&
    isRecord(data.attributes) &&
    isRecord(data.inputs) &&
    isRecord(data.outputs) &&
    Array.isArray(data.assessments)
  )
}

/**
 * `reason` and `Correction: <correction>` joined with "; ", or null when both are empty
 */
export function buildRationale(reason?: string | null, correction?: string | null): string | null {
  const parts: string[] = []
  if (reason) parts.push(reason)
  if (correction) parts.push(`Correction: ${correction}`)
  return parts.length > 0 ? parts.join('; ') : null
}

export class FileTraceLogger implements TraceLogger {
  private store: FileStore<RunTrace>

  constructor(dir: string = getTracesDir()) {
    this.store = new FileStore<RunTrace>({ dir, validate: isRunTrace })
  }

  async logRunTrace(trace: RunTraceInput): Promise<string> {
    const id = generateId()
    this.store.setSync(id, {
      id,
      name: 'prompt_eval',
      attributes: {
        promptVersionId: trace.promptVersionId,
        runResultId: trace.runResultId,
        model: trace.modelName,
      },
      inputs: { input: trace.inputContent, prompt: trace.promptText },
      outputs: { output: trace.output },
      assessments: [],
      createdAt: new Date().toISOString(),
    })
    logger.debug(`Trace ${id} for result ${trace.runResultId}`)
    return id
  }

  async logFeedback(feedback: FeedbackAssessmentInput): Promise<void> {
    const assessment: TraceAssessment = {
      name: 'output_quality',
      value: feedback.isGood,
      rationale: buildRationale(feedback.reason, feedback.correction),
      source: 'human',
      createdAt: new Date().toISOString(),
    }
    const updated = this.store.updateSync(feedback.traceId, trace => ({
      ...trace,
      assessments: [...trace.assessments, assessment],
    }))
    if (!updated) {
      throw new Error(`Trace not found: ${feedback.traceId}`)
    }
  }

  getTrace(id: string): RunTrace | null {
    return this.store.getSync(id)
  }
}
