/**
 * Runner - executes one skill against one package as a subprocess.
 *
 * The command is spawned from an argv array (no shell) with the flattened
 * variables of the environment context and nothing else. stdout and
 * stderr are captured separately while their interleaving is kept for
 * display. The Runner never retries; retry is a policy of its caller.
 */

import { spawn } from 'node:child_process'
import { isAbsolute, join, resolve } from 'node:path'

import type {
  EnvironmentContext,
  ExecutionOutcome,
  Interruption,
  OutputChunk,
  Package,
  Skill,
  TemplateValues,
} from '@wsk/core'

import { createOutcome, joinStream } from './outcome.js'
import { renderCommand, renderTemplate } from './template.js'

/** Default delay between SIGTERM and SIGKILL */
export const DEFAULT_KILL_GRACE_MS = 5000

/**
 * Options for a Runner.
 */
export interface RunnerOptions {
  /** Absolute workspace root; package paths are relative to it */
  workspaceRoot: string
  /** Default per-subprocess timeout in milliseconds (default: none) */
  timeoutMs?: number | undefined
  /** Delay between SIGTERM and SIGKILL when terminating (default: 5000) */
  killGraceMs?: number | undefined
}

/**
 * Options for a single execution.
 */
export interface ExecuteOptions {
  /** Aborting terminates the subprocess; the outcome reason is "Cancelled" */
  signal?: AbortSignal | undefined
  /** Timeout for this execution, overriding the skill and runner defaults */
  timeoutMs?: number | undefined
  /** Called for every chunk of output as it arrives */
  onOutput?: ((chunk: OutputChunk) => void) | undefined
}

/** Concrete command for one (skill, package) pair */
export interface PlannedCommand {
  command: string[]
  cwd: string
}

interface ProcessExit {
  exitCode: number | null
  signal: NodeJS.Signals | null
  spawnError?: Error | undefined
}

/**
 * Find the reason of the first classifier whose pattern matches the output.
 */
export function classifyOutput(skill: Skill, output: string): string | undefined {
  for (const classifier of skill.classifiers) {
    // Fresh lastIndex for patterns compiled with the g or y flag
    classifier.regex.lastIndex = 0
    if (classifier.regex.test(output)) {
      return classifier.reason
    }
  }
  return undefined
}

export class Runner {
  readonly workspaceRoot: string
  private readonly timeoutMs: number | undefined
  private readonly killGraceMs: number

  constructor(options: RunnerOptions) {
    this.workspaceRoot = resolve(options.workspaceRoot)
    this.timeoutMs = options.timeoutMs
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS
  }

  /** Placeholder values for a package */
  templateValues(pkg: Package): TemplateValues {
    const packageDir = isAbsolute(pkg.path) ? pkg.path : join(this.workspaceRoot, pkg.path)
    return {
      package: pkg.id,
      packageDir,
      workspaceRoot: this.workspaceRoot,
    }
  }

  /**
   * Render the command and working directory a skill would run for a package.
   */
  plan(skill: Skill, pkg: Package): PlannedCommand {
    const values = this.templateValues(pkg)
    return {
      command: renderCommand(skill.command, values),
      cwd: resolve(this.workspaceRoot, renderTemplate(skill.cwd, values)),
    }
  }

  /**
   * Execute a skill against a package.
   *
   * Never throws for process failures: a nonzero exit, a timeout, a
   * cancellation or a program that cannot be started all produce a
   * `failure` outcome.
   */
  async execute(
    skill: Skill,
    pkg: Package,
    env: EnvironmentContext,
    options: ExecuteOptions = {}
  ): Promise<ExecutionOutcome> {
    const { command, cwd } = this.plan(skill, pkg)
    const timeoutMs = options.timeoutMs ?? skill.timeoutMs ?? this.timeoutMs
    const output: OutputChunk[] = []
    const startedAt = performance.now()

    const finish = (fields: {
      kind: 'success' | 'failure'
      exitCode: number
      reason?: string | undefined
      interrupted?: Interruption | undefined
    }): ExecutionOutcome =>
      createOutcome({
        package: pkg.id,
        skill: skill.name,
        ...fields,
        command,
        cwd,
        output,
        stdout: joinStream(output, 'stdout'),
        stderr: joinStream(output, 'stderr'),
        durationMs: Math.round(performance.now() - startedAt),
        attempts: 1,
      })

    if (options.signal?.aborted) {
      return finish({ kind: 'failure', exitCode: -1, reason: 'Cancelled', interrupted: 'cancelled' })
    }

    const [program, ...args] = command
    if (program === undefined) {
      return finish({ kind: 'failure', exitCode: -1, reason: 'Failed to start: empty command' })
    }

    // Own process group, so termination reaches everything the command starts
    const child = spawn(program, args, {
      cwd,
      env: { ...env.vars },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    })

    const record = (stream: OutputChunk['stream']) => (data: string) => {
      const chunk: OutputChunk = { stream, text: data }
      output.push(chunk)
      options.onOutput?.(chunk)
    }
    child.stdout.setEncoding('utf8')
    child.stderr.setEncoding('utf8')
    child.stdout.on('data', record('stdout'))
    child.stderr.on('data', record('stderr'))

    let interrupted: Interruption | undefined
    let exited: ProcessExit | undefined
    let settle: (exit: ProcessExit) => void = () => undefined

    const signalGroup = (signal: NodeJS.Signals): void => {
      if (child.pid !== undefined) {
        try {
          process.kill(-child.pid, signal)
          return
        } catch {
          // group already gone or not supported; fall back to the child
        }
      }
      child.kill(signal)
    }

    // Descendants may hold the pipes open after the child exits, so an
    // interrupted run settles on 'exit' and drops its streams.
    const stopWaiting = (exit: ProcessExit): void => {
      child.stdout.destroy()
      child.stderr.destroy()
      settle(exit)
    }

    const terminate = (why: Interruption): void => {
      if (interrupted !== undefined) return
      interrupted = why
      signalGroup('SIGTERM')
      // Stays armed after settling, for descendants that ignore SIGTERM
      setTimeout(() => signalGroup('SIGKILL'), this.killGraceMs).unref()
      if (exited) {
        stopWaiting(exited)
      }
    }

    const timeoutTimer =
      timeoutMs !== undefined ? setTimeout(() => terminate('timeout'), timeoutMs) : undefined
    const onAbort = (): void => terminate('cancelled')
    options.signal?.addEventListener('abort', onAbort, { once: true })

    const exit = await new Promise<ProcessExit>((resolvePromise) => {
      let settled = false
      settle = (result) => {
        if (settled) return
        settled = true
        resolvePromise(result)
      }
      child.on('error', (error) => settle({ exitCode: null, signal: null, spawnError: error }))
      child.on('exit', (code, signal) => {
        exited = { exitCode: code, signal }
        if (interrupted !== undefined) {
          stopWaiting(exited)
        }
      })
      child.on('close', (code, signal) => settle({ exitCode: code, signal }))
    })

    if (timeoutTimer) clearTimeout(timeoutTimer)
    options.signal?.removeEventListener('abort', onAbort)

    if (exit.spawnError) {
      return finish({
        kind: 'failure',
        exitCode: -1,
        reason: `Failed to start: ${exit.spawnError.message}`,
      })
    }

    const exitCode = exit.exitCode ?? -1

    if (interrupted === 'timeout') {
      return finish({
        kind: 'failure',
        exitCode,
        reason: `Timeout after ${timeoutMs}ms`,
        interrupted,
      })
    }
    if (interrupted === 'cancelled') {
      return finish({ kind: 'failure', exitCode, reason: 'Cancelled', interrupted })
    }

    if (exit.exitCode === null) {
      return finish({ kind: 'failure', exitCode, reason: `Killed by ${exit.signal ?? 'signal'}` })
    }

    if (skill.successExitCodes.includes(exit.exitCode)) {
      return finish({ kind: 'success', exitCode: exit.exitCode })
    }

    const all = output.map((chunk) => chunk.text).join('')
    return finish({
      kind: 'failure',
      exitCode: exit.exitCode,
      reason: classifyOutput(skill, all) ?? `Exited with code ${exit.exitCode}`,
    })
  }
}
