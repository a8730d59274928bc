/**
 * Environment context construction.
 *
 * A context records which variables a subprocess must see: a base
 * toolchain root plus overlays applied in order, on top of the ambient
 * process environment captured once at build time. It does not source
 * anything through a shell.
 */

import { readFile, stat } from 'node:fs/promises'
import { join, resolve } from 'node:path'

import {
  ENV_FILENAME,
  type EnvironmentContext,
  type EnvironmentLayer,
  MissingRootError,
  parseEnvToml,
} from '@wsk/core'

/** Ambient variables, shaped like `process.env` */
export type AmbientEnvironment = Readonly<Record<string, string | undefined>>

export interface BuildEnvironmentOptions {
  /** Ambient environment to inherit from (default: process.env) */
  ambient?: AmbientEnvironment | undefined
}

const REFERENCE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/** Name that expands to the directory of the root defining a value */
export const ROOT_REFERENCE = 'ROOT'

/**
 * Build the environment context for one invocation.
 *
 * @param baseRoot - Base toolchain root directory
 * @param overlays - Overlay roots, later ones shadow earlier ones
 * @throws MissingRootError if a root does not exist or has no env.toml
 */
export async function buildEnvironment(
  baseRoot: string,
  overlays: readonly string[] = [],
  options: BuildEnvironmentOptions = {}
): Promise<EnvironmentContext> {
  const layers: EnvironmentLayer[] = []
  for (const root of [baseRoot, ...overlays]) {
    layers.push(await loadLayer(resolve(root)))
  }
  return mergeEnvironment(layers, options.ambient ?? process.env)
}

/**
 * Context with no roots: the ambient environment as-is.
 */
export function ambientEnvironment(ambient: AmbientEnvironment = process.env): EnvironmentContext {
  return mergeEnvironment([], ambient)
}

/**
 * Merge layers over the ambient environment.
 *
 * For each variable, the last layer defining it wins. A variable no layer
 * defines keeps its ambient value. `${NAME}` in a value expands to NAME as
 * merged so far (empty when unset) and `${ROOT}` to the defining layer's
 * directory.
 */
export function mergeEnvironment(
  layers: readonly EnvironmentLayer[],
  ambient: AmbientEnvironment = {}
): EnvironmentContext {
  const vars: Record<string, string> = {}
  for (const [name, value] of Object.entries(ambient)) {
    if (value !== undefined) {
      vars[name] = value
    }
  }

  const defined = new Set<string>()
  for (const layer of layers) {
    for (const [name, raw] of Object.entries(layer.vars)) {
      vars[name] = expandValue(raw, vars, layer.root)
      defined.add(name)
    }
  }

  return Object.freeze({
    layers: Object.freeze([...layers]),
    vars: Object.freeze(vars),
    defined: Object.freeze([...defined].sort()),
  })
}

/**
 * Variables the roots define, with their final values, sorted by name.
 */
export function definedVariables(context: EnvironmentContext): Array<[string, string]> {
  return context.defined.map((name): [string, string] => [name, context.vars[name] ?? ''])
}

function expandValue(raw: string, current: Readonly<Record<string, string>>, root: string): string {
  return raw.replace(REFERENCE_PATTERN, (_match, name: string) => {
    if (name === ROOT_REFERENCE) return root
    return current[name] ?? ''
  })
}

async function loadLayer(root: string): Promise<EnvironmentLayer> {
  try {
    const info = await stat(root)
    if (!info.isDirectory()) {
      throw new MissingRootError(root, 'not a directory')
    }
  } catch (err) {
    if (err instanceof MissingRootError) throw err
    throw new MissingRootError(root, 'directory does not exist')
  }

  const envPath = join(root, ENV_FILENAME)
  let content: string
  try {
    content = await readFile(envPath, 'utf8')
  } catch {
    throw new MissingRootError(root, `no ${ENV_FILENAME} to source`)
  }

  const file = parseEnvToml(content, envPath)
  return Object.freeze({ root, vars: Object.freeze({ ...(file.vars ?? {}) }) })
}
