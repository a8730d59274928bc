/**
 * Terminal UI utilities for the wsk CLI.
 *
 * Design: Refined industrial aesthetic
 * - Clean lines, purposeful spacing
 * - Unicode symbols for visual hierarchy
 * - Sparse, meaningful color
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

import type { ExecutionOutcome, OutcomeKind, RunSummary } from '@wsk/core'
import { countOutcomes, formatDuration } from '@wsk/engine'
import type { RunEventListener } from '@wsk/execution'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette - Muted, purposeful colors
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  // Primary actions and success
  success: chalk.hex('#10b981'), // emerald
  // Informational, neutral
  info: chalk.hex('#6366f1'), // indigo
  // Warnings
  warn: chalk.hex('#f59e0b'), // amber
  // Errors
  error: chalk.hex('#ef4444'), // red
  // Muted/secondary text
  muted: chalk.hex('#6b7280'), // gray-500
  // Emphasized text
  emphasis: chalk.hex('#f3f4f6'), // gray-100
  // Accent for commands/code
  code: chalk.hex('#a78bfa'), // violet-400
  // Dim for less important info
  dim: chalk.hex('#4b5563'), // gray-600
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols - Consistent iconography
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  info: colors.info(figures.info),
  skipped: colors.muted(figures.circle),
  pointer: colors.muted(figures.pointer),
  arrow: colors.muted('→'),
  corner: colors.dim('└'),
  tee: colors.dim('├'),
  dash: colors.dim('─'),
}

/** Symbol per outcome kind */
export function outcomeSymbol(kind: OutcomeKind): string {
  switch (kind) {
    case 'success':
      return symbols.success
    case 'failure':
      return symbols.error
    case 'skipped-upstream-failure':
      return symbols.warning
    case 'skipped-unsupported':
      return symbols.skipped
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner - Progress indication
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
  })
}

/**
 * Event listener that keeps a spinner's text on progress and the
 * packages currently running.
 */
export function spinnerProgress(spinner: Ora): RunEventListener {
  const running = new Set<string>()
  let total = 0
  let done = 0

  const refresh = (): void => {
    const names = [...running].sort().join(', ')
    spinner.text = colors.muted(`[${done}/${total}] ${names || 'waiting'}`)
  }

  return (event) => {
    switch (event.event) {
      case 'run_started':
        total = event.order.length
        refresh()
        break
      case 'package_started':
        running.add(event.package)
        refresh()
        break
      case 'package_completed':
        running.delete(event.package)
        if (!event.willRetry) {
          done++
        }
        refresh()
        break
      case 'package_skipped':
        done++
        refresh()
        break
      default:
        break
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Layout Components
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Print a section header
 */
export function header(text: string): void {
  console.log()
  console.log(colors.emphasis(text))
}

/**
 * Print an info line
 */
export function info(label: string, value: string): void {
  console.log(`  ${colors.muted(label)} ${value}`)
}

/**
 * Print a tree item (for hierarchical display)
 */
export function treeItem(text: string, isLast = false): void {
  const prefix = isLast ? symbols.corner : symbols.tee
  console.log(`  ${prefix}${symbols.dash} ${text}`)
}

/**
 * Print one package outcome
 */
export function outcomeLine(outcome: ExecutionOutcome): void {
  let line = `${outcomeSymbol(outcome.kind)} ${outcome.package}`
  if (outcome.kind === 'success' || outcome.kind === 'failure') {
    line += ` ${colors.muted(formatDuration(outcome.durationMs))}`
  }
  if (outcome.reason) {
    line += ` ${colors.muted(outcome.reason)}`
  }
  console.log(line)
}

/**
 * Print captured output of a package, indented under its outcome line
 */
export function outputBlock(outcome: ExecutionOutcome): void {
  const text = outcome.output.map((chunk) => chunk.text).join('').trimEnd()
  if (!text) return
  for (const line of text.split('\n')) {
    console.log(`    ${colors.dim(line)}`)
  }
}

/**
 * Print a summary block at the end of a run
 */
export function summaryBlock(summary: RunSummary): void {
  const counts = countOutcomes(summary)
  const skipped = counts['skipped-unsupported'] + counts['skipped-upstream-failure']
  const statusColor =
    summary.status === 'failure' ? colors.error : summary.status === 'cancelled' ? colors.warn : colors.success

  console.log()
  console.log(colors.dim('  ─'.repeat(40)))
  console.log()

  const items = [
    { label: 'status', value: statusColor(summary.status) },
    { label: 'skill', value: summary.skill },
    { label: 'packages', value: `${counts.success} ok, ${counts.failure} failed, ${skipped} skipped` },
    { label: 'duration', value: formatDuration(summary.durationMs) },
  ]
  for (const item of items) {
    console.log(`  ${colors.muted(item.label.padEnd(12))} ${item.value}`)
  }
}

/**
 * Print blank line
 */
export function blank(): void {
  console.log()
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string): string {
  const home = process.env['HOME'] ?? ''
  if (home) {
    return filePath.replaceAll(home, '~')
  }
  return filePath
}
