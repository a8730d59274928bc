/**
 * Skill types for wsk
 *
 * A skill's command is an argv template. Each element may contain the
 * placeholders below, substituted per package before launch:
 *
 * - `{package}`       package identity
 * - `{packageDir}`    absolute package directory
 * - `{workspaceRoot}` absolute workspace root
 */

import type { SkillName } from './ids.js'

/** Placeholder names understood by command and cwd templates */
export const SKILL_PLACEHOLDERS = ['package', 'packageDir', 'workspaceRoot'] as const

export type SkillPlaceholder = (typeof SKILL_PLACEHOLDERS)[number]

/** Values substituted into a skill template */
export type TemplateValues = Record<SkillPlaceholder, string>

/** Maps a pattern in captured output to a more specific failure reason */
export interface OutputClassifier {
  /** Regular expression source */
  pattern: string
  /** Regular expression flags (default: none) */
  flags?: string | undefined
  /** Reason attached to a failed outcome when the pattern matches */
  reason: string
}

/** Skill definition as written by a caller or in wsk.toml */
export interface SkillDefinition {
  name: string
  description?: string | undefined
  /** argv template; no shell is involved */
  command: string[]
  /** Working directory template (default: `{packageDir}`) */
  cwd?: string | undefined
  /** Capabilities a package must declare (default: the skill name) */
  requires?: string[] | undefined
  /** Exit codes treated as success (default: [0]) */
  successExitCodes?: number[] | undefined
  /** Output classifiers, first match wins */
  classifiers?: OutputClassifier[] | undefined
  /** Per-subprocess timeout, overriding the runner default */
  timeoutMs?: number | undefined
}

/** A compiled output classifier */
export interface CompiledClassifier {
  readonly regex: RegExp
  readonly reason: string
}

/** A registered, immutable skill */
export interface Skill {
  readonly name: SkillName
  readonly description: string | undefined
  readonly command: readonly string[]
  readonly cwd: string
  readonly requires: readonly SkillName[]
  readonly successExitCodes: readonly number[]
  readonly classifiers: readonly CompiledClassifier[]
  readonly timeoutMs: number | undefined
}
