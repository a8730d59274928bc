/**
 * Typed error classes for wsk
 *
 * Error hierarchy:
 * - WskError (base)
 *   - ConfigError (fatal: reported before any package executes)
 *     - ConfigParseError (TOML parse / file read failures)
 *     - ConfigValidationError (schema validation failures)
 *     - CyclicDependencyError (circular package deps)
 *     - MissingDependencyError (dependency on an unknown package)
 *     - DuplicatePackageError (two manifests with one id)
 *     - UnknownPackageError (target names an unknown package)
 *     - UnknownSkillError (skill name not registered)
 *     - DuplicateSkillError (skill registered twice)
 *     - InvalidSkillError (skill definition unusable)
 *     - MissingRootError (environment root absent or not sourceable)
 *   - LockError (file locking)
 *     - LockTimeoutError
 *   - OrchestratorReusedError (second run on one orchestrator)
 *
 * Execution failures (nonzero exit, timeout) are never thrown; they are
 * recorded as outcomes in the run summary.
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all wsk errors */
export class WskError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'WskError'
    this.code = code
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends WskError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML parsing or reading a config file fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

/** Error thrown when the package graph contains a cycle */
export class CyclicDependencyError extends ConfigError {
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' -> ')}`, 'CYCLIC_DEPENDENCY_ERROR', 'graph')
    this.name = 'CyclicDependencyError'
    this.cycle = cycle
  }
}

/** Error thrown when a package depends on a package that does not exist */
export class MissingDependencyError extends ConfigError {
  readonly packageId: string
  readonly dependsOn: string

  constructor(packageId: string, dependsOn: string) {
    super(
      `Package "${packageId}" depends on unknown package: "${dependsOn}"`,
      'MISSING_DEPENDENCY_ERROR',
      'graph'
    )
    this.name = 'MissingDependencyError'
    this.packageId = packageId
    this.dependsOn = dependsOn
  }
}

/** Error thrown when two manifests declare the same package id */
export class DuplicatePackageError extends ConfigError {
  readonly packageId: string

  constructor(packageId: string) {
    super(`Package declared more than once: "${packageId}"`, 'DUPLICATE_PACKAGE_ERROR', 'graph')
    this.name = 'DuplicatePackageError'
    this.packageId = packageId
  }
}

/** Error thrown when a requested target is not in the graph */
export class UnknownPackageError extends ConfigError {
  readonly packageId: string

  constructor(packageId: string, available: string[]) {
    const hint = available.length > 0 ? ` (known: ${available.join(', ')})` : ''
    super(`Unknown package: "${packageId}"${hint}`, 'UNKNOWN_PACKAGE_ERROR', 'graph')
    this.name = 'UnknownPackageError'
    this.packageId = packageId
  }
}

/** Error thrown when a skill name cannot be resolved */
export class UnknownSkillError extends ConfigError {
  readonly skill: string

  constructor(skill: string, available: string[]) {
    const hint = available.length > 0 ? ` (available: ${available.join(', ')})` : ''
    super(`Unknown skill: "${skill}"${hint}`, 'UNKNOWN_SKILL_ERROR', 'skills')
    this.name = 'UnknownSkillError'
    this.skill = skill
  }
}

/** Error thrown when a skill name is registered twice */
export class DuplicateSkillError extends ConfigError {
  readonly skill: string

  constructor(skill: string) {
    super(`Skill already registered: "${skill}"`, 'DUPLICATE_SKILL_ERROR', 'skills')
    this.name = 'DuplicateSkillError'
    this.skill = skill
  }
}

/** Error thrown when a skill definition cannot be executed */
export class InvalidSkillError extends ConfigError {
  readonly skill: string

  constructor(skill: string, message: string) {
    super(`Invalid skill "${skill}": ${message}`, 'INVALID_SKILL_ERROR', 'skills')
    this.name = 'InvalidSkillError'
    this.skill = skill
  }
}

/** Error thrown when an environment root is missing or has no env file */
export class MissingRootError extends ConfigError {
  readonly root: string

  constructor(root: string, message: string) {
    super(`Environment root "${root}": ${message}`, 'MISSING_ROOT_ERROR', root)
    this.name = 'MissingRootError'
    this.root = root
  }
}

/** Error thrown when no wsk.toml can be found for a run */
export class WorkspaceNotFoundError extends ConfigError {
  constructor(startDir: string) {
    super(
      `No wsk.toml found in ${startDir} or its parents`,
      'WORKSPACE_NOT_FOUND_ERROR',
      startDir
    )
    this.name = 'WorkspaceNotFoundError'
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends WskError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Orchestration errors
// ============================================================================

/** Error thrown when an orchestrator instance is asked to run twice */
export class OrchestratorReusedError extends WskError {
  constructor() {
    super(
      'Orchestrator instances are single-use; create a new one for each run',
      'ORCHESTRATOR_REUSED_ERROR'
    )
    this.name = 'OrchestratorReusedError'
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isWskError(error: unknown): error is WskError {
  return error instanceof WskError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isLockError(error: unknown): error is LockError {
  return error instanceof LockError
}
