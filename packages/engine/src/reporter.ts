/**
 * Run summary formatting for terminals and machine consumers.
 */

import type { ExecutionOutcome, OutcomeKind, RunSummary } from '@wsk/core'

/** Outcome counts per kind */
export type OutcomeCounts = Record<OutcomeKind, number>

/**
 * Count outcomes by kind.
 */
export function countOutcomes(summary: RunSummary): OutcomeCounts {
  const counts: OutcomeCounts = {
    success: 0,
    failure: 0,
    'skipped-unsupported': 0,
    'skipped-upstream-failure': 0,
  }
  for (const outcome of summary.outcomes) {
    counts[outcome.kind]++
  }
  return counts
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  return `${(ms / 1000).toFixed(1)}s`
}

/**
 * One line for an outcome, e.g. `[failure] api: Exited with code 2 (40ms)`.
 */
export function formatOutcome(outcome: ExecutionOutcome): string {
  let line = `[${outcome.kind}] ${outcome.package}`
  if (outcome.reason) {
    line += `: ${outcome.reason}`
  }
  if (outcome.kind === 'success' || outcome.kind === 'failure') {
    line += ` (${formatDuration(outcome.durationMs)}`
    if (outcome.attempts > 1) {
      line += `, ${outcome.attempts} attempts`
    }
    line += ')'
  }
  return line
}

/**
 * Closing line of a run, e.g. `build: failure (2 succeeded, 1 failed, 1 skipped)`.
 */
export function formatStatusLine(summary: RunSummary): string {
  const counts = countOutcomes(summary)
  const skipped = counts['skipped-unsupported'] + counts['skipped-upstream-failure']
  return `${summary.skill}: ${summary.status} (${counts.success} succeeded, ${counts.failure} failed, ${skipped} skipped)`
}

/**
 * Format a summary as plain text: one line per package in execution
 * order, then the status line.
 */
export function formatText(summary: RunSummary): string {
  return [...summary.outcomes.map(formatOutcome), formatStatusLine(summary)].join('\n')
}

/**
 * Plain-data form of a summary, without the interleaved output chunks.
 */
export function summaryToJson(summary: RunSummary): Record<string, unknown> {
  return {
    skill: summary.skill,
    status: summary.status,
    startedAt: summary.startedAt,
    durationMs: summary.durationMs,
    order: summary.order,
    failed: summary.failed,
    skipped: summary.skipped,
    outcomes: summary.outcomes.map(({ output: _output, ...rest }) => rest),
  }
}

/**
 * Format a summary as JSON.
 */
export function formatJson(summary: RunSummary): string {
  return JSON.stringify(summaryToJson(summary), null, 2)
}
