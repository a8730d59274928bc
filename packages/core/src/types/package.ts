/**
 * Package types for wsk
 */

import type { PackageId, SkillName } from './ids.js'

/**
 * Read-only manifest record for one package, as supplied by the manifest
 * loader (wsk.toml or a programmatic caller).
 */
export interface PackageManifest {
  /** Unique package identity */
  id: string
  /** Directory relative to the workspace root (default: the id) */
  path?: string | undefined
  /** Identities of packages this one depends on */
  dependencies?: string[] | undefined
  /** Skills this package supports */
  capabilities?: string[] | undefined
}

/** A validated, immutable package node */
export interface Package {
  readonly id: PackageId
  readonly path: string
  readonly dependencies: readonly PackageId[]
  readonly capabilities: readonly SkillName[]
}
