/**
 * Doctor command - check the workspace manifest, environment roots,
 * package directories and skill programs.
 */

import { access, constants, stat } from 'node:fs/promises'
import { delimiter, isAbsolute, join, resolve } from 'node:path'
import type { Command } from 'commander'

import type { EnvironmentContext, Skill } from '@wsk/core'
import { type Workspace, loadWorkspace, locateWorkspace, workspaceEnvironment } from '@wsk/engine'
import { type AmbientEnvironment, renderTemplate } from '@wsk/execution'

import {
  type CheckResult,
  EXIT_CODES,
  formatCheckResults,
  outputDoctorSummary,
} from '../helpers.js'

export interface DoctorOptions {
  workspace?: string | undefined
  cwd?: string | undefined
  /** Ambient environment (default: process.env) */
  env?: AmbientEnvironment | undefined
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Check if a file exists and is executable.
 */
async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Search a PATH value for a program.
 */
async function searchPath(program: string, pathEnv: string): Promise<string | null> {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue
    const candidate = join(dir, program)
    if (await isExecutable(candidate)) {
      return candidate
    }
  }
  return null
}

/**
 * Check that a skill's program can be found with the environment it runs in.
 */
async function checkSkillProgram(
  skill: Skill,
  root: string,
  environment: EnvironmentContext
): Promise<CheckResult> {
  const name = `skill:${skill.name}`
  const template = skill.command[0] ?? ''

  if (template.includes('{package')) {
    return { name, status: 'ok', message: `Skill "${skill.name}": program resolved per package` }
  }

  const values = { package: '', packageDir: '', workspaceRoot: root }
  const program = renderTemplate(template, values)
  let found: string | null
  if (isAbsolute(program)) {
    found = (await isExecutable(program)) ? program : null
  } else if (program.includes('/')) {
    // Relative paths are spawned from the skill's working directory
    if (skill.cwd.includes('{package')) {
      return { name, status: 'ok', message: `Skill "${skill.name}": program resolved per package` }
    }
    const candidate = resolve(root, renderTemplate(skill.cwd, values), program)
    found = (await isExecutable(candidate)) ? candidate : null
  } else {
    found = await searchPath(program, environment.vars['PATH'] ?? '')
  }

  if (found) {
    return { name, status: 'ok', message: `Skill "${skill.name}": ${found}` }
  }
  return {
    name,
    status: 'error',
    message: `Skill "${skill.name}": program not found: ${program}`,
    detail: 'Check the PATH set by the environment roots',
  }
}

/**
 * Check that every package directory exists.
 */
async function checkPackageDirs(workspace: Workspace): Promise<CheckResult> {
  const missing: string[] = []
  for (const id of workspace.graph.ids()) {
    const pkg = workspace.graph.require(id)
    try {
      const info = await stat(resolve(workspace.root, pkg.path))
      if (!info.isDirectory()) missing.push(id)
    } catch {
      missing.push(id)
    }
  }

  if (missing.length === 0) {
    return {
      name: 'packages',
      status: 'ok',
      message: `${workspace.graph.size} package(s), all directories present`,
    }
  }
  return {
    name: 'packages',
    status: 'warning',
    message: `Missing package directories: ${missing.join(', ')}`,
  }
}

/**
 * Run every check. Later checks are skipped when the workspace cannot be
 * loaded.
 */
export async function runChecks(options: DoctorOptions = {}): Promise<CheckResult[]> {
  const checks: CheckResult[] = []

  let root: string
  try {
    root = await locateWorkspace({ workspaceRoot: options.workspace, cwd: options.cwd, env: options.env })
    checks.push({ name: 'workspace', status: 'ok', message: `Workspace: ${root}` })
  } catch (error) {
    checks.push({ name: 'workspace', status: 'error', message: 'No workspace found', detail: message(error) })
    return checks
  }

  let workspace: Workspace
  try {
    workspace = await loadWorkspace({ workspaceRoot: root })
    checks.push({
      name: 'manifest',
      status: 'ok',
      message: `Manifest valid: ${workspace.graph.size} package(s), ${workspace.registry.names().length} skill(s)`,
    })
  } catch (error) {
    checks.push({ name: 'manifest', status: 'error', message: 'Invalid manifest', detail: message(error) })
    return checks
  }

  let environment: EnvironmentContext
  try {
    environment = await workspaceEnvironment(workspace, options.env ?? process.env)
    checks.push({
      name: 'environment',
      status: 'ok',
      message:
        environment.layers.length === 0
          ? 'No environment roots declared'
          : `Environment: ${environment.layers.length} root(s), ${environment.defined.length} variable(s)`,
    })
  } catch (error) {
    checks.push({
      name: 'environment',
      status: 'error',
      message: 'Environment roots unusable',
      detail: message(error),
    })
    return checks
  }

  checks.push(await checkPackageDirs(workspace))

  for (const skill of workspace.registry.list()) {
    checks.push(await checkSkillProgram(skill, workspace.root, environment))
  }

  return checks
}

/**
 * Register the doctor command.
 */
export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check the workspace manifest, environment roots and skill programs')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--json', 'Output as JSON')
    .action(async (options: { workspace?: string | undefined; json?: boolean | undefined }) => {
      const checks = await runChecks({ workspace: options.workspace })

      const { hasError, hasWarning } = formatCheckResults(checks, options)
      if (!options.json) {
        outputDoctorSummary(hasError, hasWarning)
      }
      if (hasError) {
        process.exit(EXIT_CODES.config)
      }
    })
}
