/**
 * Workspace loading.
 *
 * A workspace is the package graph, the skill registry and the environment
 * roots declared by one wsk.toml, or handed over directly by a caller.
 */

import { join, resolve } from 'node:path'

import {
  type EnvironmentContext,
  type PackageManifest,
  type SkillDefinition,
  WORKSPACE_ENV_VAR,
  WORKSPACE_FILENAME,
  WorkspaceNotFoundError,
  findWorkspaceRoot,
  readWorkspaceToml,
  toPackageManifests,
  toSkillDefinitions,
} from '@wsk/core'
import {
  type AmbientEnvironment,
  SkillRegistry,
  ambientEnvironment,
  buildEnvironment,
} from '@wsk/execution'
import { type PackageGraph, loadGraph } from '@wsk/graph'

/** Environment roots, resolved to absolute paths */
export interface WorkspaceEnvironment {
  base: string
  overlays: string[]
}

export interface Workspace {
  /** Absolute workspace root */
  root: string
  /** wsk.toml the workspace was read from, if any */
  manifestPath?: string | undefined
  graph: PackageGraph
  registry: SkillRegistry
  environment?: WorkspaceEnvironment | undefined
}

/** Workspace contents supplied by a caller instead of a wsk.toml */
export interface WorkspaceDefinition {
  packages: readonly PackageManifest[]
  skills?: readonly SkillDefinition[] | undefined
  /** Roots relative to the workspace root */
  environment?: { base: string; overlays?: readonly string[] | undefined } | undefined
}

export interface LocateOptions {
  /** Explicit workspace root; skips discovery */
  workspaceRoot?: string | undefined
  /** Directory to search upwards from (default: process.cwd()) */
  cwd?: string | undefined
  /** Variables consulted for WSK_WORKSPACE (default: process.env) */
  env?: AmbientEnvironment | undefined
}

/**
 * Find the workspace root: an explicit root, then WSK_WORKSPACE, then the
 * nearest directory at or above `cwd` containing wsk.toml.
 *
 * @throws WorkspaceNotFoundError if none is found
 */
export async function locateWorkspace(options: LocateOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd()
  if (options.workspaceRoot) {
    return resolve(cwd, options.workspaceRoot)
  }

  const fromEnv = (options.env ?? process.env)[WORKSPACE_ENV_VAR]
  if (fromEnv) {
    return resolve(cwd, fromEnv)
  }

  const found = await findWorkspaceRoot(cwd)
  if (!found) {
    throw new WorkspaceNotFoundError(resolve(cwd))
  }
  return found
}

/**
 * Build a workspace from in-memory manifests.
 *
 * @throws ConfigError subclasses for invalid graphs or skills
 */
export function createWorkspace(root: string, definition: WorkspaceDefinition): Workspace {
  const absoluteRoot = resolve(root)
  return {
    root: absoluteRoot,
    graph: loadGraph(definition.packages),
    registry: SkillRegistry.fromDefinitions(definition.skills ?? []),
    environment: definition.environment && {
      base: resolve(absoluteRoot, definition.environment.base),
      overlays: (definition.environment.overlays ?? []).map((overlay) =>
        resolve(absoluteRoot, overlay)
      ),
    },
  }
}

/**
 * Locate and read a workspace's wsk.toml.
 *
 * @throws WorkspaceNotFoundError if no workspace can be located
 * @throws ConfigError subclasses for invalid manifests
 */
export async function loadWorkspace(options: LocateOptions = {}): Promise<Workspace> {
  const root = await locateWorkspace(options)
  const manifestPath = join(root, WORKSPACE_FILENAME)
  const file = await readWorkspaceToml(manifestPath)

  const workspace = createWorkspace(root, {
    packages: toPackageManifests(file),
    skills: toSkillDefinitions(file.skills),
    environment: file.environment,
  })
  return { ...workspace, manifestPath }
}

/**
 * Build the environment context of a workspace.
 *
 * @throws MissingRootError if a declared root is missing
 */
export async function workspaceEnvironment(
  workspace: Workspace,
  ambient: AmbientEnvironment = process.env
): Promise<EnvironmentContext> {
  if (!workspace.environment) {
    return ambientEnvironment(ambient)
  }
  return buildEnvironment(workspace.environment.base, workspace.environment.overlays, { ambient })
}
