/**
 * Planning: which packages a skill runs on, in what order, with what command.
 */

import type { PackageId, Skill } from '@wsk/core'
import { type Runner, type SkillRegistry, missingCapabilities } from '@wsk/execution'
import type { PackageGraph } from '@wsk/graph'

/** One package of a plan, in execution order */
export type PlanStep =
  | {
      action: 'run'
      package: PackageId
      command: string[]
      cwd: string
    }
  | {
      action: 'skip'
      package: PackageId
      reason: string
    }

/** Result of the planning phase */
export interface RunPlan {
  skill: Skill
  /** Targets as requested (every package when none were given) */
  targets: PackageId[]
  /** Whether the targets were widened to everything they affect */
  onlyAffected: boolean
  /** Every scheduled package, dependencies first */
  order: PackageId[]
  steps: PlanStep[]
}

export interface PlanOptions {
  /** Also schedule every package that transitively depends on a target */
  onlyAffected?: boolean | undefined
}

/**
 * Resolve a skill and targets into an ordered plan.
 *
 * Packages that do not declare the skill's required capabilities stay in
 * the plan as `skip` steps.
 *
 * @throws UnknownSkillError if the skill is not registered
 * @throws UnknownPackageError if a target is not in the graph
 */
export function planRun(
  graph: PackageGraph,
  registry: SkillRegistry,
  runner: Runner,
  skillName: string,
  targets: readonly string[],
  options: PlanOptions = {}
): RunPlan {
  const skill = registry.resolve(skillName)
  const requested =
    targets.length > 0 ? [...new Set(targets.map((id) => graph.require(id).id))] : graph.ids()
  const onlyAffected = options.onlyAffected ?? false
  const scope = onlyAffected ? graph.affectedBy(requested) : requested
  const order = graph.topologicalOrder(scope)

  const steps = order.map((id): PlanStep => {
    const pkg = graph.require(id)
    if (!registry.appliesTo(skill, pkg)) {
      const missing = missingCapabilities(skill, pkg)
      return { action: 'skip', package: id, reason: `missing capability: ${missing.join(', ')}` }
    }
    const { command, cwd } = runner.plan(skill, pkg)
    return { action: 'run', package: id, command, cwd }
  })

  return { skill, targets: requested, onlyAffected, order, steps }
}
