/**
 * Shared CLI helper utilities.
 *
 * Workspace resolution, option parsing, error handling and exit codes
 * used by every command.
 */

import chalk from 'chalk'
import { InvalidArgumentError } from 'commander'

import { type RunStatus, WorkspaceNotFoundError, isConfigError, isWskError } from '@wsk/core'
import { type Workspace, loadWorkspace } from '@wsk/engine'

/**
 * Common CLI options that most commands accept.
 */
export interface CommonOptions {
  workspace?: string | undefined
  json?: boolean | undefined
}

/** Process exit codes */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  config: 2,
  cancelled: 130,
} as const

/**
 * Load the workspace named by --workspace, WSK_WORKSPACE or discovery.
 */
export async function getWorkspaceContext(options: CommonOptions): Promise<Workspace> {
  return loadWorkspace({ workspaceRoot: options.workspace })
}

/**
 * Exit code for the status of a finished run.
 */
export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case 'success':
    case 'no-op':
      return EXIT_CODES.success
    case 'failure':
      return EXIT_CODES.failure
    case 'cancelled':
      return EXIT_CODES.cancelled
  }
}

/**
 * Exit code for an error that aborted a command.
 */
export function exitCodeForError(error: unknown): number {
  return isConfigError(error) ? EXIT_CODES.config : EXIT_CODES.failure
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isWskError(error)) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    if (error instanceof WorkspaceNotFoundError) {
      lines.push(chalk.gray('Run this command inside a workspace, or use --workspace or WSK_WORKSPACE'))
    }
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}

/**
 * Handle CLI errors with consistent formatting.
 * Configuration errors exit with 2, anything else with 1.
 */
export function handleCliError(error: unknown): never {
  console.error(formatError(error))
  process.exit(exitCodeForError(error))
}

/**
 * Commander option parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

/**
 * Commander option parser for non-negative integers.
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return parsed
}

/** Result of one doctor check */
export interface CheckResult {
  name: string
  status: 'ok' | 'warning' | 'error'
  message: string
  detail?: string | undefined
}

/**
 * Get status icon for doctor check results.
 */
export function getStatusIcon(status: CheckResult['status']): string {
  switch (status) {
    case 'ok':
      return chalk.green('✓')
    case 'warning':
      return chalk.yellow('!')
    case 'error':
      return chalk.red('✗')
  }
}

/**
 * Get chalk color function for status.
 */
export function getStatusColor(status: CheckResult['status']): (text: string) => string {
  switch (status) {
    case 'ok':
      return chalk.green
    case 'warning':
      return chalk.yellow
    case 'error':
      return chalk.red
  }
}

/**
 * Format and output check results for doctor command.
 */
export function formatCheckResults(
  checks: CheckResult[],
  options: { json?: boolean | undefined }
): { hasError: boolean; hasWarning: boolean } {
  const hasError = checks.some((c) => c.status === 'error')
  const hasWarning = checks.some((c) => c.status === 'warning')

  if (options.json) {
    console.log(JSON.stringify({ checks }, null, 2))
    return { hasError, hasWarning }
  }

  console.log(chalk.blue('wsk doctor\n'))

  for (const check of checks) {
    const icon = getStatusIcon(check.status)
    const color = getStatusColor(check.status)

    console.log(`${icon} ${color(check.message)}`)
    if (check.detail) {
      console.log(`  ${chalk.gray(check.detail)}`)
    }
  }

  return { hasError, hasWarning }
}

/**
 * Output final doctor summary.
 */
export function outputDoctorSummary(hasError: boolean, hasWarning: boolean): void {
  console.log('')
  if (hasError) {
    console.log(chalk.red('Some checks failed. Please fix the issues above.'))
  } else if (hasWarning) {
    console.log(chalk.yellow('Some warnings found. Review the messages above.'))
  } else {
    console.log(chalk.green('All checks passed!'))
  }
}
