/**
 * Workspace manifest (wsk.toml) parser
 */

import { access, readFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { validateWorkspaceFile } from '../schemas/index.js'
import type { PackageManifest } from '../types/package.js'
import type { SkillDefinition } from '../types/skill.js'
import type { WorkspaceFile } from '../types/workspace.js'

/** Default filename for the workspace manifest */
export const WORKSPACE_FILENAME = 'wsk.toml'

/** Environment variable that overrides workspace discovery */
export const WORKSPACE_ENV_VAR = 'WSK_WORKSPACE'

/**
 * Parse wsk.toml content into a validated WorkspaceFile
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseWorkspaceToml(content: string, filePath?: string): WorkspaceFile {
  const source = filePath ?? WORKSPACE_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  // @iarna/toml attaches symbol-keyed metadata; round-trip to plain data
  const plain: unknown = JSON.parse(JSON.stringify(parsed))

  const result = validateWorkspaceFile(plain)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${WORKSPACE_FILENAME}`, source, result.errors)
  }

  return result.data
}

/**
 * Read and parse a wsk.toml file from disk
 */
export async function readWorkspaceToml(filePath: string): Promise<WorkspaceFile> {
  try {
    const content = await readFile(filePath, 'utf8')
    return parseWorkspaceToml(content, filePath)
  } catch (err) {
    if (err instanceof ConfigParseError || err instanceof ConfigValidationError) {
      throw err
    }
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
}

/**
 * Find the workspace root by walking up from `startDir` looking for wsk.toml.
 * Returns null when no manifest is found before the filesystem root.
 */
export async function findWorkspaceRoot(startDir: string = process.cwd()): Promise<string | null> {
  let dir = resolve(startDir)

  while (true) {
    try {
      await access(join(dir, WORKSPACE_FILENAME))
      return dir
    } catch {
      // not here, keep walking
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}

/**
 * Convert the `[packages.*]` tables into manifest records, sorted by id.
 */
export function toPackageManifests(file: WorkspaceFile): PackageManifest[] {
  return Object.keys(file.packages)
    .sort()
    .map((id) => {
      const entry = file.packages[id] ?? {}
      return {
        id,
        path: entry.path ?? id,
        dependencies: entry.dependencies ?? [],
        capabilities: entry.capabilities ?? [],
      }
    })
}

/**
 * Convert the `[skills.*]` tables into skill definitions, sorted by name.
 */
export function toSkillDefinitions(skills: WorkspaceFile['skills'] = {}): SkillDefinition[] {
  const definitions: SkillDefinition[] = []

  for (const name of Object.keys(skills).sort()) {
    const entry = skills[name]
    if (!entry) continue
    definitions.push({
      name,
      description: entry.description,
      command: entry.command,
      cwd: entry.cwd,
      requires: entry.requires,
      successExitCodes: entry.success_exit_codes,
      timeoutMs: entry.timeout_ms,
      classifiers: entry.classify?.map((c) => ({
        pattern: c.pattern,
        flags: c.flags,
        reason: c.reason,
      })),
    })
  }

  return definitions
}
