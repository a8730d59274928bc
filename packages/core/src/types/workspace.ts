/**
 * Workspace manifest (wsk.toml) types
 *
 * Field names mirror the TOML keys (snake_case).
 */

/** `[packages.<id>]` table */
export interface WorkspacePackageEntry {
  path?: string | undefined
  dependencies?: string[] | undefined
  capabilities?: string[] | undefined
}

/** `[[skills.<name>.classify]]` entry */
export interface WorkspaceClassifierEntry {
  pattern: string
  flags?: string | undefined
  reason: string
}

/** `[skills.<name>]` table */
export interface WorkspaceSkillEntry {
  description?: string | undefined
  command: string[]
  cwd?: string | undefined
  requires?: string[] | undefined
  success_exit_codes?: number[] | undefined
  timeout_ms?: number | undefined
  classify?: WorkspaceClassifierEntry[] | undefined
}

/** `[environment]` table; paths are relative to the workspace root */
export interface WorkspaceEnvironmentEntry {
  base: string
  overlays?: string[] | undefined
}

/** Parsed wsk.toml */
export interface WorkspaceFile {
  schema: 1
  environment?: WorkspaceEnvironmentEntry | undefined
  packages: Record<string, WorkspacePackageEntry>
  skills?: Record<string, WorkspaceSkillEntry> | undefined
}
