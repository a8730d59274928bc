/**
 * Plan command - show what a run would do without running anything.
 */

import type { Command } from 'commander'

import { type PlanResult, plan } from '@wsk/engine'
import { formatCommand } from '@wsk/execution'

import { type CommonOptions, getWorkspaceContext, handleCliError } from '../helpers.js'
import { blank, colors, formatPath, header, info, symbols } from '../ui.js'

interface PlanCommandOptions extends CommonOptions {
  onlyAffected?: boolean | undefined
  artifacts?: string | undefined
}

/**
 * Plain-data form of a plan, for --json.
 */
export function planToJson(result: PlanResult): Record<string, unknown> {
  return {
    skill: result.plan.skill.name,
    targets: result.plan.targets,
    onlyAffected: result.plan.onlyAffected,
    order: result.plan.order,
    steps: result.plan.steps,
  }
}

function outputPlanText(result: PlanResult): void {
  header(`${result.plan.skill.name} ${formatPath(result.workspace.root)}`)
  blank()

  result.plan.steps.forEach((step, index) => {
    const position = colors.dim(`${index + 1}.`.padStart(4))
    if (step.action === 'run') {
      console.log(`${position} ${step.package}`)
      console.log(`     ${colors.muted('cwd')} ${formatPath(step.cwd)}`)
      console.log(`     ${symbols.pointer} ${colors.code(formatCommand(step.command))}`)
    } else {
      console.log(`${position} ${colors.muted(step.package)} ${colors.dim(`skipped: ${step.reason}`)}`)
    }
  })

  if (result.artifactPaths) {
    blank()
    info('plan', formatPath(result.artifactPaths.implementationPlan))
    info('walkthrough', formatPath(result.artifactPaths.verificationWalkthrough))
  }
}

/**
 * Register the plan command.
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the order and commands a run would use, without running')
    .argument('<skill>', 'Skill to plan')
    .argument('[packages...]', 'Target packages')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--only-affected', 'Also plan every package that depends on a target')
    .option('--artifacts <dir>', 'Write the plan and walkthrough to this directory')
    .option('--json', 'Output as JSON')
    .action(async (skill: string, packages: string[], options: PlanCommandOptions) => {
      try {
        const workspace = await getWorkspaceContext(options)
        const result = await plan(skill, packages, {
          workspace,
          onlyAffected: options.onlyAffected,
          artifactsDir: options.artifacts,
        })

        if (options.json) {
          console.log(JSON.stringify(planToJson(result), null, 2))
        } else {
          outputPlanText(result)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
