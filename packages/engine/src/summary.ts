/**
 * Run summary aggregation.
 */

import type {
  ExecutionOutcome,
  PackageId,
  RunStatus,
  RunSummary,
  SkillName,
  SkippedPackage,
} from '@wsk/core'

/**
 * Overall status of a run.
 *
 * `cancelled` wins over everything, then `failure` if any package failed,
 * then `success` if any package ran. A run where nothing ran is a `no-op`.
 */
export function aggregateStatus(outcomes: readonly ExecutionOutcome[], cancelled = false): RunStatus {
  if (cancelled) return 'cancelled'
  if (outcomes.some((outcome) => outcome.kind === 'failure')) return 'failure'
  if (outcomes.some((outcome) => outcome.kind === 'success')) return 'success'
  return 'no-op'
}

export interface SummarizeInput {
  skill: SkillName
  order: readonly PackageId[]
  outcomes: readonly ExecutionOutcome[]
  cancelled?: boolean | undefined
  startedAt: Date
  durationMs: number
}

/**
 * Build the summary of a run, with outcomes listed in execution order.
 */
export function summarize(input: SummarizeInput): RunSummary {
  const byPackage = new Map<string, ExecutionOutcome>()
  for (const outcome of input.outcomes) {
    byPackage.set(outcome.package, outcome)
  }

  const outcomes: ExecutionOutcome[] = []
  for (const id of input.order) {
    const outcome = byPackage.get(id)
    if (outcome) outcomes.push(outcome)
  }

  const failed = outcomes.filter((outcome) => outcome.kind === 'failure').map((outcome) => outcome.package)

  const skipped: SkippedPackage[] = []
  for (const outcome of outcomes) {
    if (outcome.kind === 'skipped-unsupported' || outcome.kind === 'skipped-upstream-failure') {
      skipped.push({ package: outcome.package, kind: outcome.kind, reason: outcome.reason ?? '' })
    }
  }

  return Object.freeze({
    skill: input.skill,
    status: aggregateStatus(outcomes, input.cancelled),
    order: Object.freeze([...input.order]),
    outcomes: Object.freeze(outcomes),
    failed: Object.freeze(failed),
    skipped: Object.freeze(skipped),
    startedAt: input.startedAt.toISOString(),
    durationMs: input.durationMs,
  })
}
