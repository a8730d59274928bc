/**
 * @wsk/core
 *
 * Types, errors, schemas, workspace manifest parsing, locks and atomic
 * writes shared by every wsk package.
 */

// Types
export * from './types/index.js'

// Schemas
export { envSchema, validateEnvFile, validateWorkspaceFile, workspaceSchema } from './schemas/index.js'
export type { ValidationError, ValidationResult } from './schemas/index.js'

// Config parsers
export {
  ENV_FILENAME,
  WORKSPACE_ENV_VAR,
  WORKSPACE_FILENAME,
  findWorkspaceRoot,
  parseEnvToml,
  parseWorkspaceToml,
  readWorkspaceToml,
  toPackageManifests,
  toSkillDefinitions,
} from './config/index.js'

// Errors
export {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  CyclicDependencyError,
  DuplicatePackageError,
  DuplicateSkillError,
  InvalidSkillError,
  LockError,
  LockTimeoutError,
  MissingDependencyError,
  MissingRootError,
  OrchestratorReusedError,
  UnknownPackageError,
  UnknownSkillError,
  WorkspaceNotFoundError,
  WskError,
  isConfigError,
  isLockError,
  isWskError,
} from './errors.js'

// Locks
export { ARTIFACTS_LOCK_FILE, isArtifactsLocked, withArtifactsLock } from './locks.js'
export type { LockOptions } from './locks.js'

// Atomic file operations
export { atomicWrite, atomicWriteJson } from './atomic.js'
export type { AtomicWriteOptions } from './atomic.js'
