/**
 * Top-level entry points: run a skill, or plan it without executing.
 *
 * Both load the workspace (unless one is supplied), build the environment
 * context once for the invocation and render the artifacts. A fresh
 * Orchestrator is created per call.
 */

import { type EnvironmentContext, type LockOptions, type RunSummary, withArtifactsLock } from '@wsk/core'
import {
  type AmbientEnvironment,
  type RunEventListener,
  Runner,
  createEventEmitter,
} from '@wsk/execution'

import {
  type ArtifactPaths,
  type RunArtifacts,
  renderArtifacts,
  writeArtifactFiles,
  writeArtifacts,
} from './artifacts.js'
import { Orchestrator, type RetryPolicy } from './orchestrator.js'
import { type RunPlan, planRun } from './plan.js'
import { type LocateOptions, type Workspace, loadWorkspace, workspaceEnvironment } from './workspace.js'

/**
 * Options shared by run and plan.
 */
export interface InvocationOptions extends LocateOptions {
  /** Pre-loaded workspace; skips locating and reading wsk.toml */
  workspace?: Workspace | undefined
  /** Pre-built environment; skips reading the environment roots */
  environment?: EnvironmentContext | undefined
  /** Ambient variables inherited where no root defines them (default: process.env) */
  ambient?: AmbientEnvironment | undefined
  /** Also schedule every package that transitively depends on a target */
  onlyAffected?: boolean | undefined
  /** Directory to write artifacts into */
  artifactsDir?: string | undefined
  /** Lock settings for the artifacts directory */
  artifactsLock?: LockOptions | undefined
}

/**
 * Options for run.
 */
export interface RunOptions extends InvocationOptions {
  /** Maximum concurrent subprocesses (default: available parallelism) */
  concurrency?: number | undefined
  /** Default per-package timeout in milliseconds; a skill's own timeout wins */
  timeoutPerPackage?: number | undefined
  /** Delay between SIGTERM and SIGKILL when terminating */
  killGraceMs?: number | undefined
  retry?: RetryPolicy | undefined
  signal?: AbortSignal | undefined
  /** JSONL event log path (appended) */
  eventsPath?: string | undefined
  /** Write events to stdout as JSONL */
  eventsToStdout?: boolean | undefined
  /** Called for every run event */
  onEvent?: RunEventListener | undefined
  /** Heartbeat interval for the event log (default: disabled) */
  heartbeatIntervalMs?: number | undefined
}

/**
 * Result of run: the summary plus the plan and artifacts behind it.
 */
export interface RunResult {
  summary: RunSummary
  plan: RunPlan
  workspace: Workspace
  artifacts: RunArtifacts
  /** Set when artifacts were written */
  artifactPaths?: ArtifactPaths | undefined
  /** Set when the run finished but writing its artifacts failed */
  artifactsError?: Error | undefined
}

/**
 * Result of plan.
 */
export interface PlanResult {
  plan: RunPlan
  workspace: Workspace
  artifacts: RunArtifacts
  artifactPaths?: ArtifactPaths | undefined
}

async function prepare(
  options: InvocationOptions
): Promise<{ workspace: Workspace; environment: EnvironmentContext }> {
  const workspace = options.workspace ?? (await loadWorkspace(options))
  const environment =
    options.environment ?? (await workspaceEnvironment(workspace, options.ambient ?? process.env))
  return { workspace, environment }
}

/**
 * Run a skill on targets (every package when `targets` is empty).
 *
 * The artifacts directory is locked before anything executes and stays
 * locked until its files are written. A failure to write them after the
 * run is reported on the result, next to the summary.
 *
 * @throws ConfigError subclasses before anything executes
 * @throws LockError if the artifacts directory cannot be locked
 */
export async function run(
  skillName: string,
  targets: readonly string[] = [],
  options: RunOptions = {}
): Promise<RunResult> {
  const { workspace, environment } = await prepare(options)

  const runner = new Runner({
    workspaceRoot: workspace.root,
    timeoutMs: options.timeoutPerPackage,
    killGraceMs: options.killGraceMs,
  })

  const events = await createEventEmitter({
    outputPath: options.eventsPath,
    stdout: options.eventsToStdout,
    listener: options.onEvent,
    heartbeatIntervalMs: options.heartbeatIntervalMs,
  })

  const execute = async (): Promise<RunResult> => {
    const orchestrator = new Orchestrator({
      graph: workspace.graph,
      registry: workspace.registry,
      runner,
      environment,
      concurrency: options.concurrency,
      retry: options.retry,
      signal: options.signal,
      events,
    })

    const { plan, summary } = await orchestrator.run(skillName, targets, {
      onlyAffected: options.onlyAffected,
    })

    const artifacts = renderArtifacts(plan, environment, summary)
    const result: RunResult = { summary, plan, workspace, artifacts }
    if (options.artifactsDir) {
      try {
        result.artifactPaths = await writeArtifactFiles(options.artifactsDir, artifacts, summary)
      } catch (error) {
        result.artifactsError = error instanceof Error ? error : new Error(String(error))
      }
    }
    return result
  }

  try {
    const { artifactsDir } = options
    return artifactsDir ? await withArtifactsLock(artifactsDir, execute, options.artifactsLock) : await execute()
  } finally {
    await events.close()
  }
}

/**
 * Plan a skill on targets without executing anything.
 */
export async function plan(
  skillName: string,
  targets: readonly string[] = [],
  options: InvocationOptions = {}
): Promise<PlanResult> {
  const { workspace, environment } = await prepare(options)
  const runner = new Runner({ workspaceRoot: workspace.root })

  const result = planRun(workspace.graph, workspace.registry, runner, skillName, targets, {
    onlyAffected: options.onlyAffected,
  })

  const artifacts = renderArtifacts(result, environment)
  const artifactPaths = options.artifactsDir
    ? await writeArtifacts(options.artifactsDir, artifacts, undefined, options.artifactsLock)
    : undefined

  return { plan: result, workspace, artifacts, artifactPaths }
}
