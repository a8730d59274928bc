/**
 * SkillRegistry - catalog of named, parameterized operations.
 *
 * Skills are registered explicitly and validated on registration, so an
 * unknown or duplicate name fails before anything runs.
 */

import {
  type CompiledClassifier,
  DuplicateSkillError,
  InvalidSkillError,
  type Package,
  type Skill,
  type SkillDefinition,
  type SkillName,
  UnknownSkillError,
  type WorkspaceFile,
  isSkillName,
  toSkillDefinitions,
} from '@wsk/core'

import { unknownPlaceholders } from './template.js'

/** Default working directory template */
export const DEFAULT_SKILL_CWD = '{packageDir}'

/**
 * Validate a definition and compile it into an immutable Skill.
 *
 * @throws InvalidSkillError if the definition cannot be executed
 */
export function defineSkill(definition: SkillDefinition): Skill {
  const { name } = definition
  if (!isSkillName(name)) {
    throw new InvalidSkillError(name, 'name must be lowercase kebab-case')
  }

  const [program] = definition.command
  if (program === undefined || program.trim() === '') {
    throw new InvalidSkillError(name, 'command must name a program')
  }

  const cwd = definition.cwd ?? DEFAULT_SKILL_CWD
  for (const template of [...definition.command, cwd]) {
    const unknown = unknownPlaceholders(template)
    if (unknown.length > 0) {
      throw new InvalidSkillError(name, `unknown placeholder {${unknown.join('}, {')}}`)
    }
  }

  const requires: SkillName[] = []
  for (const capability of definition.requires ?? [name]) {
    if (!isSkillName(capability)) {
      throw new InvalidSkillError(name, `required capability "${capability}" is not a skill name`)
    }
    requires.push(capability)
  }

  const successExitCodes = definition.successExitCodes ?? [0]
  if (successExitCodes.length === 0) {
    throw new InvalidSkillError(name, 'successExitCodes must not be empty')
  }

  if (definition.timeoutMs !== undefined && !(definition.timeoutMs > 0)) {
    throw new InvalidSkillError(name, 'timeoutMs must be positive')
  }

  const classifiers: CompiledClassifier[] = (definition.classifiers ?? []).map((classifier) => {
    try {
      return Object.freeze({
        regex: new RegExp(classifier.pattern, classifier.flags ?? ''),
        reason: classifier.reason,
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new InvalidSkillError(name, `classifier pattern "${classifier.pattern}": ${message}`)
    }
  })

  return Object.freeze({
    name,
    description: definition.description,
    command: Object.freeze([...definition.command]),
    cwd,
    requires: Object.freeze(requires),
    successExitCodes: Object.freeze([...successExitCodes]),
    classifiers: Object.freeze(classifiers),
    timeoutMs: definition.timeoutMs,
  })
}

/**
 * Whether a package declares every capability a skill requires.
 */
export function appliesTo(skill: Skill, pkg: Package): boolean {
  return missingCapabilities(skill, pkg).length === 0
}

/** Capabilities a skill requires that a package does not declare */
export function missingCapabilities(skill: Skill, pkg: Package): SkillName[] {
  return skill.requires.filter((capability) => !pkg.capabilities.includes(capability))
}

/**
 * Registry of skills, keyed by name.
 */
export class SkillRegistry {
  private skills = new Map<string, Skill>()

  /**
   * Build a registry from definitions.
   */
  static fromDefinitions(definitions: readonly SkillDefinition[]): SkillRegistry {
    const registry = new SkillRegistry()
    for (const definition of definitions) {
      registry.register(definition)
    }
    return registry
  }

  /**
   * Build a registry from the `[skills.*]` tables of wsk.toml.
   */
  static fromConfig(skills: WorkspaceFile['skills']): SkillRegistry {
    return SkillRegistry.fromDefinitions(toSkillDefinitions(skills))
  }

  /**
   * Register a skill
   *
   * @returns The compiled skill
   * @throws DuplicateSkillError if a skill with the same name is registered
   * @throws InvalidSkillError if the definition is unusable
   */
  register(definition: SkillDefinition): Skill {
    if (this.skills.has(definition.name)) {
      throw new DuplicateSkillError(definition.name)
    }
    const skill = defineSkill(definition)
    this.skills.set(skill.name, skill)
    return skill
  }

  /**
   * Resolve a skill by name
   *
   * @throws UnknownSkillError if no such skill is registered
   */
  resolve(name: string): Skill {
    const skill = this.skills.get(name)
    if (!skill) {
      throw new UnknownSkillError(name, this.names())
    }
    return skill
  }

  get(name: string): Skill | undefined {
    return this.skills.get(name)
  }

  has(name: string): boolean {
    return this.skills.has(name)
  }

  /** All registered skills, sorted by name */
  list(): Skill[] {
    return [...this.skills.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  /** All registered skill names, sorted */
  names(): SkillName[] {
    return this.list().map((skill) => skill.name)
  }

  appliesTo(skill: Skill, pkg: Package): boolean {
    return appliesTo(skill, pkg)
  }
}
