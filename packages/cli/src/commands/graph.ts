/**
 * Graph command - show packages in dependency order.
 */

import type { Command } from 'commander'

import type { PackageGraph } from '@wsk/graph'

import { type CommonOptions, getWorkspaceContext, handleCliError } from '../helpers.js'
import { colors, header, symbols, treeItem } from '../ui.js'

/** One package as shown by the graph command */
export interface GraphEntry {
  id: string
  path: string
  dependencies: string[]
  dependents: string[]
  capabilities: string[]
}

/**
 * Packages (every package, or the targets and their dependencies) in
 * dependency-first order.
 */
export function graphEntries(graph: PackageGraph, targets: readonly string[]): GraphEntry[] {
  const order = graph.topologicalOrder(targets.length > 0 ? targets : graph.ids())
  return order.map((id) => {
    const pkg = graph.require(id)
    return {
      id,
      path: pkg.path,
      dependencies: [...pkg.dependencies],
      dependents: [...graph.dependentsOf(id)],
      capabilities: [...pkg.capabilities],
    }
  })
}

function outputGraphText(entries: GraphEntry[]): void {
  header('Packages (dependencies first)')
  for (const entry of entries) {
    console.log()
    console.log(`  ${colors.emphasis(entry.id)} ${colors.dim(entry.path)}`)
    const lines = [
      `capabilities: ${entry.capabilities.join(', ') || colors.dim('none')}`,
      ...entry.dependencies.map((dep) => `${symbols.arrow} ${dep}`),
    ]
    lines.forEach((line, index) => {
      treeItem(line, index === lines.length - 1)
    })
  }
}

/**
 * Register the graph command.
 */
export function registerGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Show packages in dependency order')
    .argument('[packages...]', 'Restrict to these packages and their dependencies')
    .option('--workspace <path>', 'Workspace root (default: WSK_WORKSPACE or auto-detect)')
    .option('--json', 'Output as JSON')
    .action(async (packages: string[], options: CommonOptions) => {
      try {
        const workspace = await getWorkspaceContext(options)
        const entries = graphEntries(workspace.graph, packages)

        if (options.json) {
          console.log(JSON.stringify({ packages: entries }, null, 2))
        } else {
          outputGraphText(entries)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
