/**
 * Terminal output for CLI commands
 *
 * User-facing lines only: no timestamps, no scopes. Diagnostics go through
 * shared/logger.ts.
 */

import chalk from 'chalk'
import type { DiffLine } from '../types/promptVersion.js'

// ============ Messages ============

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ Structure ============

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export function blank(): void {
  console.log()
}

export interface ListItem {
  label: string
  value: string | number | undefined
  dim?: boolean
}

/** Aligned `label: value` lines */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    const value = item.value ?? '-'
    const valueStr = item.dim ? chalk.dim(value) : String(value)
    console.log(`${prefix}${label} ${valueStr}`)
  }
}

export function bulletList(items: string[], bullet = '•', indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim(bullet)} ${item}`)
  }
}

/** Indented block for multi-line text such as prompts and outputs */
export function block(text: string, indent = 4): void {
  const prefix = ' '.repeat(indent)
  for (const line of text.split('\n')) {
    console.log(prefix + line)
  }
}

// ============ Progress ============

function renderBar(current: number, total: number, width: number): string {
  const filled = total === 0 ? width : Math.round((current / total) * width)
  return chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(width - filled))
}

/** Rewrites the current line on a TTY; otherwise prints every 10% */
export function progressInline(label: string, current: number, total: number, width = 20): void {
  const percent = total === 0 ? 100 : Math.round((current / total) * 100)
  const line = `${label} [${renderBar(current, total, width)}] ${percent}% (${current}/${total})`

  if (!process.stdout.isTTY) {
    if (percent % 10 === 0 || current === total) console.log(line)
    return
  }

  process.stdout.write(`\r${line}`)
  if (current === total) {
    process.stdout.write('\n')
  }
}

// ============ Tables ============

export interface TableColumn {
  key: string
  header: string
  width?: number
  align?: 'left' | 'right'
}

export function table<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): void {
  if (data.length === 0) {
    console.log(chalk.dim('  (none)'))
    return
  }

  const widths = columns.map(col => {
    if (col.width) return col.width
    const maxDataLen = Math.max(...data.map(row => String(row[col.key] ?? '').length))
    return Math.max(col.header.length, maxDataLen)
  })

  const headerRow = columns
    .map((col, i) => chalk.bold(col.header.padEnd(widths[i] ?? col.header.length)))
    .join('  ')
  console.log('  ' + headerRow)
  console.log('  ' + chalk.dim(widths.map(w => '─'.repeat(w)).join('──')))

  for (const row of data) {
    const rowStr = columns
      .map((col, i) => {
        const width = widths[i] ?? 10
        const value = String(row[col.key] ?? '')
        return col.align === 'right' ? value.padStart(width) : value.padEnd(width)
      })
      .join('  ')
    console.log('  ' + rowStr)
  }
}

// ============ Diff ============

export function printDiff(lines: DiffLine[]): void {
  for (const line of lines) {
    if (line.type === 'added') console.log(chalk.green(`+ ${line.text}`))
    else if (line.type === 'removed') console.log(chalk.red(`- ${line.text}`))
    else console.log(chalk.dim(`  ${line.text}`))
  }
}

/** Fit text to one table cell */
export function clip(text: string, max = 40): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > max ? flat.slice(0, max - 1) + '…' : flat
}
