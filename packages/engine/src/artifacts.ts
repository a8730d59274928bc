/**
 * Run artifacts: the implementation plan, the verification walkthrough and
 * the machine-readable run summary.
 *
 * Rendering is pure; writing happens under the artifacts directory lock
 * and replaces each file atomically.
 */

import { join } from 'node:path'

import {
  type EnvironmentContext,
  type ExecutionOutcome,
  type RunSummary,
  atomicWrite,
  atomicWriteJson,
  type LockOptions,
  withArtifactsLock,
} from '@wsk/core'
import { definedVariables, formatCommand, shellQuote } from '@wsk/execution'

import type { RunPlan } from './plan.js'
import { formatDuration, summaryToJson } from './reporter.js'

export const IMPLEMENTATION_PLAN_FILE = 'implementation-plan.md'
export const VERIFICATION_WALKTHROUGH_FILE = 'verification-walkthrough.md'
export const RUN_SUMMARY_FILE = 'run-summary.json'

/** Rendered artifact documents */
export interface RunArtifacts {
  implementationPlan: string
  verificationWalkthrough: string
}

/** Paths of written artifacts */
export interface ArtifactPaths {
  implementationPlan: string
  verificationWalkthrough: string
  /** Present when a summary was written */
  runSummary?: string | undefined
}

/**
 * Render the implementation plan: scope, skill, order and skipped packages.
 */
export function renderImplementationPlan(plan: RunPlan): string {
  const lines: string[] = [`# Implementation plan: ${plan.skill.name}`, '']

  lines.push(`- Skill: \`${plan.skill.name}\``)
  if (plan.skill.description) {
    lines.push(`- Description: ${plan.skill.description}`)
  }
  lines.push(`- Targets: ${plan.targets.join(', ') || '(none)'}`)
  lines.push(`- Scope: ${plan.onlyAffected ? 'targets and every package they affect' : 'targets and their dependencies'}`)
  lines.push('')

  const runs = plan.steps.filter((step) => step.action === 'run')
  lines.push('## Execution order', '')
  if (runs.length === 0) {
    lines.push('Nothing to run.')
  } else {
    runs.forEach((step, index) => {
      lines.push(`${index + 1}. ${step.package}`)
    })
  }
  lines.push('')

  lines.push('## Skipped', '')
  let skipped = 0
  for (const step of plan.steps) {
    if (step.action === 'skip') {
      lines.push(`- ${step.package}: ${step.reason}`)
      skipped++
    }
  }
  if (skipped === 0) {
    lines.push('None.')
  }

  return `${lines.join('\n')}\n`
}

function describeOutcome(outcome: ExecutionOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `success (exit ${outcome.exitCode ?? '?'}, ${formatDuration(outcome.durationMs)})`
    case 'failure':
      return `failure (${outcome.reason ?? `exit ${outcome.exitCode ?? '?'}`}, ${formatDuration(outcome.durationMs)})`
    default:
      return `${outcome.kind} (${outcome.reason ?? 'not run'})`
  }
}

/**
 * Render the verification walkthrough: the literal commands, with their
 * working directory and environment, that reproduce each step.
 */
export function renderVerificationWalkthrough(
  plan: RunPlan,
  environment: EnvironmentContext,
  summary?: RunSummary
): string {
  const lines: string[] = [`# Verification walkthrough: ${plan.skill.name}`, '']

  if (summary) {
    lines.push(`Status: **${summary.status}**`, '')
  }

  lines.push('## Environment', '')
  if (environment.layers.length === 0) {
    lines.push('No environment roots; commands inherit the ambient environment.')
  } else {
    lines.push('Roots, later ones shadowing earlier ones:', '')
    for (const layer of environment.layers) {
      lines.push(`- ${layer.root}`)
    }
    const vars = definedVariables(environment)
    if (vars.length > 0) {
      lines.push('', '```sh')
      for (const [name, value] of vars) {
        lines.push(`export ${name}=${shellQuote(value)}`)
      }
      lines.push('```')
    }
  }
  lines.push('')

  lines.push('## Steps', '')
  const outcomes = new Map<string, ExecutionOutcome>()
  for (const outcome of summary?.outcomes ?? []) {
    outcomes.set(outcome.package, outcome)
  }

  plan.steps.forEach((step, index) => {
    lines.push(`### ${index + 1}. ${step.package}`, '')
    if (step.action === 'run') {
      lines.push('```sh', `cd ${shellQuote(step.cwd)}`, formatCommand(step.command), '```', '')
    } else {
      lines.push(`Not run: ${step.reason}`, '')
    }
    const outcome = outcomes.get(step.package)
    if (outcome && step.action === 'run') {
      lines.push(`Outcome: ${describeOutcome(outcome)}`, '')
    }
  })

  return `${lines.join('\n').trimEnd()}\n`
}

/**
 * Render both documents.
 */
export function renderArtifacts(
  plan: RunPlan,
  environment: EnvironmentContext,
  summary?: RunSummary
): RunArtifacts {
  return {
    implementationPlan: renderImplementationPlan(plan),
    verificationWalkthrough: renderVerificationWalkthrough(plan, environment, summary),
  }
}

/**
 * Write artifacts into `dir` without taking its lock. For callers that
 * already hold it.
 */
export async function writeArtifactFiles(
  dir: string,
  artifacts: RunArtifacts,
  summary?: RunSummary
): Promise<ArtifactPaths> {
  const paths: ArtifactPaths = {
    implementationPlan: join(dir, IMPLEMENTATION_PLAN_FILE),
    verificationWalkthrough: join(dir, VERIFICATION_WALKTHROUGH_FILE),
  }

  await atomicWrite(paths.implementationPlan, artifacts.implementationPlan)
  await atomicWrite(paths.verificationWalkthrough, artifacts.verificationWalkthrough)
  if (summary) {
    const runSummary = join(dir, RUN_SUMMARY_FILE)
    await atomicWriteJson(runSummary, summaryToJson(summary))
    return { ...paths, runSummary }
  }
  return paths
}

/**
 * Write the artifacts of a run (or of a plan, without a summary) into `dir`.
 *
 * @throws LockTimeoutError if another run holds the directory lock
 */
export async function writeArtifacts(
  dir: string,
  artifacts: RunArtifacts,
  summary?: RunSummary,
  lockOptions?: LockOptions
): Promise<ArtifactPaths> {
  return withArtifactsLock(dir, () => writeArtifactFiles(dir, artifacts, summary), lockOptions)
}
