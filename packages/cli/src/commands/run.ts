/**
 * Run command - run a skill across packages.
 */

import type { Command } from 'commander'

import { type RunResult, formatJson, run } from '@wsk/engine'

import {
  type CommonOptions,
  exitCodeForStatus,
  formatError,
  getWorkspaceContext,
  handleCliError,
  parseNonNegativeInt,
  parsePositiveInt,
} from '../helpers.js'
import {
  blank,
  createSpinner,
  formatPath,
  header,
  info,
  outcomeLine,
  outputBlock,
  spinnerProgress,
  summaryBlock,
} from '../ui.js'

interface RunCommandOptions extends CommonOptions {
  concurrency?: number | undefined
  timeout?: number | undefined
  onlyAffected?: boolean | undefined
  retries?: number | undefined
  artifacts?: string | undefined
  events?: string | undefined
  verbose?: boolean | undefined
}

/**
 * Print a run result for humans: every outcome, captured output of
 * failures (of everything with --verbose), then the summary block.
 */
function outputRunText(result: RunResult, verbose: boolean): void {
  header(`${result.summary.skill} ${formatPath(result.workspace.root)}`)
  blank()

  for (const outcome of result.summary.outcomes) {
    outcomeLine(outcome)
    if (verbose || outcome.kind === 'failure') {
      outputBlock(outcome)
    }
  }

  summaryBlock(result.summary)

  if (result.artifactPaths) {
    blank()
    info('plan', formatPath(result.artifactPaths.implementationPlan))
    info('walkthrough', formatPath(result.artifactPaths.verificationWalkthrough))
    if (result.artifactPaths.runSummary) {
      info('summary', formatPath(result.artifactPaths.runSummary))
    }
  }
}

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a skill on packages and their dependencies (default: every package)')
    .argument('<skill>', 'Skill to run')
    .argument('[packages...]', 'Target packages')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--concurrency <n>', 'Maximum concurrent packages', parsePositiveInt)
    .option('--timeout <ms>', 'Default per-package timeout in milliseconds', parsePositiveInt)
    .option('--only-affected', 'Also run every package that depends on a target')
    .option('--retries <n>', 'Re-run a failed package up to n times', parseNonNegativeInt)
    .option('--artifacts <dir>', 'Write plan, walkthrough and summary to this directory')
    .option('--events <file>', 'Append JSONL run events to this file')
    .option('--verbose', 'Show output of every package, not only failures')
    .option('--json', 'Output the run summary as JSON')
    .action(async (skill: string, packages: string[], options: RunCommandOptions) => {
      const controller = new AbortController()
      const onSigint = (): void => controller.abort()
      process.once('SIGINT', onSigint)

      const spinner = options.json ? undefined : createSpinner(`Running ${skill}...`)

      try {
        const workspace = await getWorkspaceContext(options)

        spinner?.start()
        const result = await run(skill, packages, {
          workspace,
          concurrency: options.concurrency,
          timeoutPerPackage: options.timeout,
          onlyAffected: options.onlyAffected,
          retry: options.retries ? { attempts: options.retries + 1 } : undefined,
          signal: controller.signal,
          artifactsDir: options.artifacts,
          eventsPath: options.events,
          onEvent: spinner ? spinnerProgress(spinner) : undefined,
        })
        spinner?.stop()

        if (options.json) {
          console.log(formatJson(result.summary))
        } else {
          outputRunText(result, options.verbose ?? false)
        }
        if (result.artifactsError) {
          console.error(formatError(result.artifactsError))
        }

        process.exit(exitCodeForStatus(result.summary.status))
      } catch (error) {
        spinner?.stop()
        handleCliError(error)
      } finally {
        process.off('SIGINT', onSigint)
      }
    })
}
