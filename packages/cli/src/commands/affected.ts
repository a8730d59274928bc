/**
 * Affected command - list the packages a change can affect.
 */

import type { Command } from 'commander'

import { type CommonOptions, getWorkspaceContext, handleCliError } from '../helpers.js'
import { colors, symbols } from '../ui.js'

/**
 * Register the affected command.
 */
export function registerAffectedCommand(program: Command): void {
  program
    .command('affected')
    .description('List changed packages and every package that depends on them')
    .argument('<packages...>', 'Changed packages')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--json', 'Output as JSON')
    .action(async (packages: string[], options: CommonOptions) => {
      try {
        const workspace = await getWorkspaceContext(options)
        const affected = workspace.graph.affectedBy(packages)

        if (options.json) {
          console.log(JSON.stringify({ changed: packages, affected }, null, 2))
          return
        }

        const changed = new Set(packages)
        for (const id of affected) {
          const marker = changed.has(id) ? colors.dim('(changed)') : ''
          console.log(`${symbols.pointer} ${id} ${marker}`.trimEnd())
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
