/**
 * Line diff between two prompt texts
 * Longest-common-subsequence table, full context (every unchanged line is kept)
 */

import type { DiffLine } from '../types/promptVersion.js'

/** "" has no lines; a trailing newline does not start a new one */
export function splitLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split(/\r?\n/)
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/**
 * Diff `oldText` against `newText` line by line.
 *
 * Within a changed block all removals come before all additions, as in a
 * unified diff. There is no "changed" record: a replaced line is one
 * `removed` followed by one `added`.
 */
export function diffPrompts(oldText: string, newText: string): DiffLine[] {
  const a = splitLines(oldText)
  const b = splitLines(newText)
  const m = a.length
  const n = b.length

  // lcs[i][j] = LCS length of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0))
  for (let i = m - 1; i >= 0; i--) {
    const row = lcs[i]
    const below = lcs[i + 1]
    if (!row || !below) continue
    for (let j = n - 1; j >= 0; j--) {
      row[j] = a[i] === b[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0)
    }
  }

  const result: DiffLine[] = []
  let i = 0
  let j = 0
  while (i < m && j < n) {
    const oldLine = a[i] ?? ''
    const newLine = b[j] ?? ''
    if (oldLine === newLine) {
      result.push({ type: 'unchanged', text: oldLine })
      i++
      j++
    } else if ((lcs[i + 1]?.[j] ?? 0) >= (lcs[i]?.[j + 1] ?? 0)) {
      result.push({ type: 'removed', text: oldLine })
      i++
    } else {
      result.push({ type: 'added', text: newLine })
      j++
    }
  }
  for (; i < m; i++) result.push({ type: 'removed', text: a[i] ?? '' })
  for (; j < n; j++) result.push({ type: 'added', text: b[j] ?? '' })

  return result
}

/** Render as `+ `, `- ` and `  ` prefixed lines */
export function formatDiff(lines: DiffLine[]): string {
  return lines
    .map(line => {
      if (line.type === 'added') return `+ ${line.text}`
      if (line.type === 'removed') return `- ${line.text}`
      return `  ${line.text}`
    })
    .join('\n')
}
