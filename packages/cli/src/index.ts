/**
 * @wsk/cli - command line interface for wsk.
 *
 * A thin argument parsing layer; all orchestration lives in the engine
 * package.
 */

import { Command } from 'commander'

import { registerAffectedCommand } from './commands/affected.js'
import { registerDoctorCommand } from './commands/doctor.js'
import { registerGraphCommand } from './commands/graph.js'
import { registerPlanCommand } from './commands/plan.js'
import { registerRunCommand } from './commands/run.js'
import { registerSkillsCommand } from './commands/skills.js'
import { handleCliError } from './helpers.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('wsk')
    .description('Run skills (build, test, lint, ...) across the packages of a workspace')
    .version(VERSION)

  registerRunCommand(program)
  registerPlanCommand(program)
  registerGraphCommand(program)
  registerAffectedCommand(program)
  registerSkillsCommand(program)
  registerDoctorCommand(program)

  return program
}

/**
 * Main entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(argv)
  } catch (error) {
    handleCliError(error)
  }
}
