/**
 * Skills command - list registered skills.
 */

import type { Command } from 'commander'

import type { Skill } from '@wsk/core'
import { formatCommand } from '@wsk/execution'

import { type CommonOptions, getWorkspaceContext, handleCliError } from '../helpers.js'
import { colors, header, info } from '../ui.js'

/** One skill as shown by the skills command */
export interface SkillEntry {
  name: string
  description?: string | undefined
  command: string
  cwd: string
  requires: string[]
  successExitCodes: number[]
  timeoutMs?: number | undefined
  classifiers: Array<{ pattern: string; reason: string }>
}

export function skillEntry(skill: Skill): SkillEntry {
  return {
    name: skill.name,
    description: skill.description,
    command: formatCommand(skill.command),
    cwd: skill.cwd,
    requires: [...skill.requires],
    successExitCodes: [...skill.successExitCodes],
    timeoutMs: skill.timeoutMs,
    classifiers: skill.classifiers.map((c) => ({ pattern: c.regex.source, reason: c.reason })),
  }
}

/**
 * Register the skills command.
 */
export function registerSkillsCommand(program: Command): void {
  program
    .command('skills')
    .description('List the skills of the workspace')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      try {
        const workspace = await getWorkspaceContext(options)
        const entries = workspace.registry.list().map(skillEntry)

        if (options.json) {
          console.log(JSON.stringify({ skills: entries }, null, 2))
          return
        }

        if (entries.length === 0) {
          console.log(colors.muted('No skills defined'))
          return
        }

        for (const entry of entries) {
          header(entry.name)
          if (entry.description) {
            console.log(`  ${colors.muted(entry.description)}`)
          }
          info('command', colors.code(entry.command))
          info('requires', entry.requires.join(', '))
          if (entry.timeoutMs !== undefined) {
            info('timeout', `${entry.timeoutMs}ms`)
          }
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
