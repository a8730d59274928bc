/**
 * Environment root file (env.toml) parser
 *
 * An environment root is a directory holding an env.toml whose `[vars]`
 * table lists the variables the root contributes:
 *
 *   [vars]
 *   TOOLCHAIN_HOME = "${ROOT}"
 *   PATH = "${ROOT}/bin:${PATH}"
 */

import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { validateEnvFile } from '../schemas/index.js'
import type { EnvFile } from '../types/environment.js'

/** Filename every environment root must contain */
export const ENV_FILENAME = 'env.toml'

/**
 * Parse env.toml content into a validated EnvFile
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseEnvToml(content: string, filePath?: string): EnvFile {
  const source = filePath ?? ENV_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateEnvFile(JSON.parse(JSON.stringify(parsed)))
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${ENV_FILENAME}`, source, result.errors)
  }

  return result.data
}
