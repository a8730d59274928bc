/**
 * JSON Schema validation for wsk config files
 */

import { createRequire } from 'node:module'
import AjvModule from 'ajv'
import type { ErrorObject } from 'ajv'
import addFormatsModule from 'ajv-formats'

import type { EnvFile } from '../types/environment.js'
import type { WorkspaceFile } from '../types/workspace.js'

const require = createRequire(import.meta.url)
const workspaceSchema = require('./workspace.schema.json')
const envSchema = require('./env.schema.json')

// ajv and ajv-formats are CommonJS; under NodeNext the default import is the
// module object, and the class/plugin live on `.default`
const Ajv = AjvModule.default
const addFormats = addFormatsModule.default

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

addFormats(ajv)

const validateWorkspaceSchema = ajv.compile<WorkspaceFile>(workspaceSchema)
const validateEnvSchema = ajv.compile<EnvFile>(envSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message ?? 'Unknown error'

  if (err.keyword === 'additionalProperties') {
    const prop = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'propertyNames' || err.keyword === 'pattern') {
    if (err.instancePath.startsWith('/skills') || err.instancePath.includes('/capabilities')) {
      return `${defaultMsg} (skill names are lowercase kebab-case, e.g. "build" or "type-check")`
    }
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a workspace manifest (wsk.toml parsed to object)
 */
export function validateWorkspaceFile(data: unknown): ValidationResult<WorkspaceFile> {
  if (validateWorkspaceSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateWorkspaceSchema.errors) }
}

/**
 * Validate an environment root file (env.toml parsed to object)
 */
export function validateEnvFile(data: unknown): ValidationResult<EnvFile> {
  if (validateEnvSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateEnvSchema.errors) }
}

export { envSchema, workspaceSchema }
