/**
 * Parse a reflection response of the form
 *
 *   ANALYSIS: ...
 *   CHANGES:
 *   - ...
 *   NEW PROMPT:
 *   """ ... """
 *
 * Every strategy is best-effort. A missing section yields an empty value,
 * and a missing prompt falls back to the current prompt. Nothing here throws.
 */

const ANALYSIS_MARKER = 'ANALYSIS:'
const CHANGES_MARKER = 'CHANGES:'
const NEW_PROMPT_MARKER = 'NEW PROMPT:'
const FENCE = '```'

export type PromptSource = 'section' | 'fenced-block' | 'unchanged'

export interface ParsedReflection {
  analysis: string
  changes: string[]
  newPrompt: string
  /** Where newPrompt came from */
  promptSource: PromptSource
  /** True unless the prompt came from the NEW PROMPT section */
  usedFallback: boolean
}

/** Text between the first ANALYSIS: and the first CHANGES: (or the end) */
export function extractAnalysis(text: string): string {
  const start = text.indexOf(ANALYSIS_MARKER)
  if (start === -1) return ''
  const changesAt = text.indexOf(CHANGES_MARKER)
  const end = changesAt === -1 ? text.length : changesAt
  return text.slice(start + ANALYSIS_MARKER.length, end).trim()
}

/** Bullet lines between the first CHANGES: and the first NEW PROMPT: (or the end) */
export function extractChanges(text: string): string[] {
  const start = text.indexOf(CHANGES_MARKER)
  if (start === -1) return []
  const promptAt = text.indexOf(NEW_PROMPT_MARKER)
  const end = promptAt === -1 ? text.length : promptAt
  return text
    .slice(start + CHANGES_MARKER.length, end)
    .trim()
    .split('\n')
    .filter(line => {
      const trimmed = line.trim()
      return trimmed.startsWith('-') || trimmed.startsWith('*')
    })
    .map(line =>
      line
        .trim()
        .replace(/^[- ]+/, '')
        .replace(/^[* ]+/, '')
    )
}

/** Trimmed text after the last NEW PROMPT:, or null without the marker */
export function extractPromptSection(text: string): string | null {
  const at = text.lastIndexOf(NEW_PROMPT_MARKER)
  if (at === -1) return null
  return text.slice(at + NEW_PROMPT_MARKER.length).trim()
}

/**
 * Content of the first block opened by `delimiter`. An unclosed block runs to
 * the end. Null when the delimiter does not occur.
 */
export function extractDelimitedBlock(section: string, delimiter: '"""' | "'''"): string | null {
  if (!section.includes(delimiter)) return null
  return (section.split(delimiter)[1] ?? '').trim()
}

/**
 * Drop a leading newline, or a first line that is a bare language tag
 * (letters only) or blank.
 */
function stripLanguageTag(content: string): string {
  if (content.startsWith('\n')) return content.slice(1)
  const newlineAt = content.indexOf('\n')
  if (newlineAt === -1) return content
  const firstLine = content.slice(0, newlineAt).trim()
  if (firstLine === '' || /^\p{L}+$/u.test(firstLine)) {
    return content.slice(newlineAt + 1)
  }
  return content
}

/** Content of the first fenced block, or null without a fence */
export function extractFencedBlock(section: string): string | null {
  if (!section.includes(FENCE)) return null
  return stripLanguageTag(section.split(FENCE)[1] ?? '').trim()
}

/** The section itself with surrounding backticks removed */
export function stripStrayBackticks(section: string): string {
  return section.trim().replace(/^`+/, '').replace(/`+$/, '').trim()
}

/**
 * Last complete fenced block anywhere in the response, or null when there
 * is none.
 */
export function extractLastFencedBlock(text: string): string | null {
  const parts = text.split(FENCE)
  if (parts.length < 3) return null
  return stripLanguageTag(parts[parts.length - 2] ?? '').trim()
}

/**
 * Strategies over the NEW PROMPT section, in order. The first one whose
 * delimiter is present decides, even when its block is empty.
 */
function extractFromSection(section: string): string {
  return (
    extractDelimitedBlock(section, '"""') ??
    extractDelimitedBlock(section, "'''") ??
    extractFencedBlock(section) ??
    stripStrayBackticks(section)
  )
}

/**
 * First three changes joined by "; ", with a count of the rest.
 * Never empty.
 */
export function buildExplanation(changes: string[]): string {
  if (changes.length === 0) {
    return `Made ${changes.length} changes to address feedback issues.`
  }
  let explanation = changes.slice(0, 3).join('; ')
  if (changes.length > 3) {
    explanation += `; and ${changes.length - 3} more changes`
  }
  return explanation
}

export function parseReflection(text: string, currentPrompt: string): ParsedReflection {
  const analysis = extractAnalysis(text)
  const changes = extractChanges(text)

  const section = extractPromptSection(text)
  const fromSection = section === null ? '' : extractFromSection(section)
  if (fromSection) {
    return { analysis, changes, newPrompt: fromSection, promptSource: 'section', usedFallback: false }
  }

  const fromFence = extractLastFencedBlock(text)
  if (fromFence) {
    return {
      analysis,
      changes,
      newPrompt: fromFence,
      promptSource: 'fenced-block',
      usedFallback: true,
    }
  }

  return { analysis, changes, newPrompt: currentPrompt, promptSource: 'unchanged', usedFallback: true }
}
