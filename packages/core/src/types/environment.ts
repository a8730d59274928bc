/**
 * Environment context types for wsk
 */

/** Parsed env.toml of one environment root */
export interface EnvFile {
  description?: string | undefined
  vars?: Record<string, string> | undefined
}

/** One root's contribution to the environment */
export interface EnvironmentLayer {
  /** Absolute path of the root directory */
  readonly root: string
  /** Variables declared by the root, values unexpanded */
  readonly vars: Readonly<Record<string, string>>
}

/**
 * Immutable snapshot of the environment every subprocess of one
 * invocation sees.
 */
export interface EnvironmentContext {
  /** Base root first, then overlays in order */
  readonly layers: readonly EnvironmentLayer[]
  /** Flattened variable table passed to subprocesses */
  readonly vars: Readonly<Record<string, string>>
  /** Names of variables defined by some root (as opposed to ambient) */
  readonly defined: readonly string[]
}
