/**
 * Execution outcome and run summary types for wsk
 */

import type { PackageId, SkillName } from './ids.js'

/** Terminal outcome of one (package, skill) pair */
export type OutcomeKind = 'success' | 'failure' | 'skipped-unsupported' | 'skipped-upstream-failure'

/** Outcome kinds that mean "never attempted" */
export type SkippedKind = Extract<OutcomeKind, `skipped-${string}`>

/** Overall status of one orchestrator invocation */
export type RunStatus = 'success' | 'failure' | 'no-op' | 'cancelled'

export type OutputStream = 'stdout' | 'stderr'

/** Why a subprocess was terminated before it exited on its own */
export type Interruption = 'timeout' | 'cancelled'

/** A piece of captured output, kept in arrival order across both streams */
export interface OutputChunk {
  readonly stream: OutputStream
  readonly text: string
}

/** Result of one (package, skill) pair. Never mutated after creation. */
export interface ExecutionOutcome {
  readonly package: PackageId
  readonly skill: SkillName
  readonly kind: OutcomeKind
  /** Process exit code; null when not attempted, -1 when it never started */
  readonly exitCode: number | null
  /** Failure or skip reason */
  readonly reason?: string | undefined
  /** Set when the subprocess was terminated by wsk */
  readonly interrupted?: Interruption | undefined
  /** Concrete argv that ran (undefined for skipped packages) */
  readonly command?: readonly string[] | undefined
  /** Working directory the command ran in */
  readonly cwd?: string | undefined
  readonly output: readonly OutputChunk[]
  readonly stdout: string
  readonly stderr: string
  readonly durationMs: number
  /** Number of executions (more than 1 when a retry policy applied) */
  readonly attempts: number
}

/** A package that was scheduled but not attempted */
export interface SkippedPackage {
  readonly package: PackageId
  readonly kind: SkippedKind
  readonly reason: string
}

/** Aggregate of all outcomes for one invocation */
export interface RunSummary {
  readonly skill: SkillName
  readonly status: RunStatus
  /** Resolved execution order (dependencies first) */
  readonly order: readonly PackageId[]
  /** One outcome per package in `order` */
  readonly outcomes: readonly ExecutionOutcome[]
  readonly failed: readonly PackageId[]
  readonly skipped: readonly SkippedPackage[]
  /** ISO 8601 timestamp */
  readonly startedAt: string
  readonly durationMs: number
}
