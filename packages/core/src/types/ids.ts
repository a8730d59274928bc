/**
 * Identifier types for wsk
 *
 * Packages are identified by their manifest key (e.g. `core`, `@acme/tool`).
 * Skills are lowercase kebab-case names (e.g. `build`, `type-check`) and
 * double as the capability a package declares to support them.
 */

/** Package identifier, unique within a workspace */
export type PackageId = string & { readonly __brand: 'PackageId' }

/** Skill name, also used as a capability name */
export type SkillName = string & { readonly __brand: 'SkillName' }

// ============================================================================
// Type guards and constructors
// ============================================================================

const PACKAGE_ID_PATTERN = /^[A-Za-z0-9@][A-Za-z0-9._/@-]*$/
const SKILL_NAME_PATTERN = /^[a-z][a-z0-9-]*$/

export function isPackageId(value: string): value is PackageId {
  return PACKAGE_ID_PATTERN.test(value)
}

export function isSkillName(value: string): value is SkillName {
  return SKILL_NAME_PATTERN.test(value)
}

/** Create a PackageId, throwing on an invalid identifier */
export function asPackageId(value: string): PackageId {
  if (!isPackageId(value)) {
    throw new Error(`Invalid package id: "${value}"`)
  }
  return value
}

/** Create a SkillName, throwing on an invalid name */
export function asSkillName(value: string): SkillName {
  if (!isSkillName(value)) {
    throw new Error(`Invalid skill name: "${value}" (must be lowercase kebab-case)`)
  }
  return value
}
