/**
 * Orchestrator - runs one skill across a set of packages.
 *
 * Each instance handles exactly one invocation and moves through
 * planning, executing and aggregating to done. Packages start in plan
 * order as soon as every dependency has a terminal outcome and a
 * concurrency slot is free. Failures propagate to dependents as
 * `skipped-upstream-failure`; a dependency the skill does not apply to
 * does not block anything.
 */

import { availableParallelism } from 'node:os'

import {
  ConfigError,
  type EnvironmentContext,
  type ExecutionOutcome,
  OrchestratorReusedError,
  type PackageId,
  type RunSummary,
  type Skill,
  type SkippedKind,
} from '@wsk/core'
import {
  type RunEventEmitter,
  type Runner,
  type SkillRegistry,
  createOutcome,
  skippedOutcome,
} from '@wsk/execution'
import type { PackageGraph } from '@wsk/graph'

import { type PlanOptions, type PlanStep, type RunPlan, planRun } from './plan.js'
import { summarize } from './summary.js'

export type OrchestratorState = 'idle' | 'planning' | 'executing' | 'aggregating' | 'done'

/**
 * Re-execution of failed packages.
 */
export interface RetryPolicy {
  /** Total executions allowed per package, including the first */
  attempts: number
  /** Whether a failed attempt should be retried (default: always) */
  shouldRetry?: ((outcome: ExecutionOutcome, attempt: number) => boolean) | undefined
}

export interface OrchestratorOptions {
  graph: PackageGraph
  registry: SkillRegistry
  runner: Runner
  environment: EnvironmentContext
  /** Maximum concurrent subprocesses (default: available parallelism) */
  concurrency?: number | undefined
  retry?: RetryPolicy | undefined
  /** Aborting cancels the run */
  signal?: AbortSignal | undefined
  events?: RunEventEmitter | undefined
}

export interface OrchestratorResult {
  plan: RunPlan
  summary: RunSummary
}

/** Reason recorded for packages never started because the run was cancelled */
export const CANCELLED_BEFORE_START = 'Cancelled before start'

type RunStep = Extract<PlanStep, { action: 'run' }>

export class Orchestrator {
  private readonly graph: PackageGraph
  private readonly registry: SkillRegistry
  private readonly runner: Runner
  private readonly environment: EnvironmentContext
  private readonly concurrency: number
  private readonly retry: RetryPolicy | undefined
  private readonly signal: AbortSignal | undefined
  private readonly events: RunEventEmitter | undefined

  private _state: OrchestratorState = 'idle'
  private readonly outcomes = new Map<PackageId, ExecutionOutcome>()
  /** Append-only record of outcomes in completion order */
  private readonly recorded: ExecutionOutcome[] = []
  /** Failed package each upstream skip traces back to */
  private readonly blame = new Map<PackageId, PackageId>()

  constructor(options: OrchestratorOptions) {
    this.graph = options.graph
    this.registry = options.registry
    this.runner = options.runner
    this.environment = options.environment
    this.concurrency = options.concurrency ?? availableParallelism()
    this.retry = options.retry
    this.signal = options.signal
    this.events = options.events

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ConfigError(
        `concurrency must be a positive integer, got ${this.concurrency}`,
        'INVALID_CONCURRENCY',
        'options'
      )
    }
    if (this.retry && (!Number.isInteger(this.retry.attempts) || this.retry.attempts < 1)) {
      throw new ConfigError(
        `retry.attempts must be a positive integer, got ${this.retry.attempts}`,
        'INVALID_RETRY',
        'options'
      )
    }
  }

  get state(): OrchestratorState {
    return this._state
  }

  /**
   * Outcomes recorded so far, in completion order.
   */
  completed(): readonly ExecutionOutcome[] {
    return [...this.recorded]
  }

  /**
   * Run a skill on targets (every package when `targets` is empty).
   *
   * Configuration errors (unknown skill or package) are thrown before
   * anything executes. Execution failures never throw; they are outcomes.
   *
   * @throws OrchestratorReusedError when called a second time
   */
  async run(
    skillName: string,
    targets: readonly string[] = [],
    options: PlanOptions = {}
  ): Promise<OrchestratorResult> {
    if (this._state !== 'idle') {
      throw new OrchestratorReusedError()
    }

    const startedAt = new Date()
    const started = performance.now()

    try {
      this._state = 'planning'
      const plan = planRun(this.graph, this.registry, this.runner, skillName, targets, options)

      this.events?.emitRunStarted({
        skill: plan.skill.name,
        targets: [...plan.targets],
        order: [...plan.order],
        concurrency: this.concurrency,
      })

      this._state = 'executing'
      await this.execute(plan)

      this._state = 'aggregating'
      const summary = summarize({
        skill: plan.skill.name,
        order: plan.order,
        outcomes: this.recorded,
        cancelled: this.signal?.aborted ?? false,
        startedAt,
        durationMs: Math.round(performance.now() - started),
      })

      this.events?.emitRunCompleted({
        status: summary.status,
        failed: [...summary.failed],
        skipped: summary.skipped.length,
      })

      return { plan, summary }
    } finally {
      this._state = 'done'
    }
  }

  private record(outcome: ExecutionOutcome): void {
    this.outcomes.set(outcome.package, outcome)
    this.recorded.push(outcome)
  }

  private skip(step: PlanStep, kind: SkippedKind, reason: string, skill: Skill): void {
    this.record(skippedOutcome(step.package, skill.name, kind, reason))
    this.events?.emitPackageSkipped({ package: step.package, kind, reason })
  }

  private async execute(plan: RunPlan): Promise<void> {
    const { skill } = plan
    let pending: RunStep[] = []

    for (const step of plan.steps) {
      if (step.action === 'skip') {
        this.skip(step, 'skipped-unsupported', step.reason, skill)
      } else {
        pending.push(step)
      }
    }

    const running = new Map<PackageId, Promise<void>>()

    while (pending.length > 0 || running.size > 0) {
      if (!this.signal?.aborted) {
        pending = this.launchEligible(pending, running, skill)
      }
      if (running.size === 0) break
      await Promise.race(running.values())
    }

    for (const step of pending) {
      this.skip(step, 'skipped-upstream-failure', CANCELLED_BEFORE_START, skill)
    }
  }

  /**
   * Start every eligible package that fits under the concurrency limit and
   * record upstream skips. Returns the packages still waiting.
   */
  private launchEligible(
    pending: RunStep[],
    running: Map<PackageId, Promise<void>>,
    skill: Skill
  ): RunStep[] {
    let waiting = pending
    let progressed = true

    // Recording a skip can make later packages decidable, so rescan until stable
    while (progressed) {
      progressed = false
      const next: RunStep[] = []

      for (const step of waiting) {
        const deps = this.graph.dependenciesOf(step.package)
        if (deps.some((dep) => !this.outcomes.has(dep))) {
          next.push(step)
          continue
        }

        const culprit = this.upstreamFailure(deps)
        if (culprit !== undefined) {
          this.blame.set(step.package, culprit)
          this.skip(step, 'skipped-upstream-failure', `Upstream dependency failed: ${culprit}`, skill)
          progressed = true
          continue
        }

        if (running.size >= this.concurrency) {
          next.push(step)
          continue
        }

        const task = this.executePackage(step, skill).then((outcome) => {
          this.record(outcome)
          running.delete(step.package)
        })
        running.set(step.package, task)
      }

      waiting = next
    }

    return waiting
  }

  /**
   * The failed package behind the first dependency that did not succeed.
   */
  private upstreamFailure(deps: readonly PackageId[]): PackageId | undefined {
    for (const dep of [...deps].sort()) {
      const outcome = this.outcomes.get(dep)
      if (outcome?.kind === 'failure') return dep
      if (outcome?.kind === 'skipped-upstream-failure') return this.blame.get(dep) ?? dep
    }
    return undefined
  }

  private async executePackage(step: RunStep, skill: Skill): Promise<ExecutionOutcome> {
    const pkg = this.graph.require(step.package)
    const maxAttempts = this.retry?.attempts ?? 1
    let attempt = 0

    while (true) {
      attempt++
      this.events?.emitPackageStarted({
        package: step.package,
        command: step.command,
        cwd: step.cwd,
        attempt,
      })

      const outcome = await this.runner.execute(skill, pkg, this.environment, { signal: this.signal })

      const willRetry =
        outcome.kind === 'failure' &&
        outcome.interrupted !== 'cancelled' &&
        !this.signal?.aborted &&
        attempt < maxAttempts &&
        (this.retry?.shouldRetry?.(outcome, attempt) ?? true)

      this.events?.emitPackageCompleted({
        package: step.package,
        kind: outcome.kind,
        exitCode: outcome.exitCode,
        durationMs: outcome.durationMs,
        attempt,
        reason: outcome.reason,
        willRetry,
      })

      if (!willRetry) {
        return createOutcome({ ...outcome, attempts: attempt })
      }
    }
  }
}
