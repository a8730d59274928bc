/**
 * Tests for SkillRegistry and skill definitions.
 */

import {
  DuplicateSkillError,
  InvalidSkillError,
  type Package,
  UnknownSkillError,
  asPackageId,
  asSkillName,
} from '@wsk/core'
import { beforeEach, describe, expect, test } from 'vitest'

import { SkillRegistry, appliesTo, defineSkill, missingCapabilities } from './registry.js'

function pkg(id: string, capabilities: string[]): Package {
  return {
    id: asPackageId(id),
    path: id,
    dependencies: [],
    capabilities: capabilities.map(asSkillName),
  }
}

describe('defineSkill', () => {
  test('fills defaults', () => {
    const skill = defineSkill({ name: 'build', command: ['make'] })
    expect(skill.cwd).toBe('{packageDir}')
    expect(skill.requires).toEqual(['build'])
    expect(skill.successExitCodes).toEqual([0])
    expect(skill.classifiers).toEqual([])
    expect(skill.timeoutMs).toBeUndefined()
    expect(Object.isFrozen(skill)).toBe(true)
  })

  test('compiles classifiers', () => {
    const skill = defineSkill({
      name: 'lint',
      command: ['lint'],
      classifiers: [{ pattern: 'WARN', flags: 'i', reason: 'lint violations found' }],
    })
    expect(skill.classifiers[0]?.regex.test('warn: unused')).toBe(true)
    expect(skill.classifiers[0]?.reason).toBe('lint violations found')
  })

  test('rejects an empty command', () => {
    expect(() => defineSkill({ name: 'build', command: [] })).toThrow(InvalidSkillError)
    expect(() => defineSkill({ name: 'build', command: [' '] })).toThrow(InvalidSkillError)
  })

  test('rejects unknown placeholders', () => {
    expect(() => defineSkill({ name: 'build', command: ['make', '{pkg}'] })).toThrow(
      'Invalid skill "build": unknown placeholder {pkg}'
    )
  })

  test('rejects invalid names, patterns and timeouts', () => {
    expect(() => defineSkill({ name: 'Build', command: ['make'] })).toThrow(InvalidSkillError)
    expect(() =>
      defineSkill({ name: 'build', command: ['make'], classifiers: [{ pattern: '(', reason: 'x' }] })
    ).toThrow(InvalidSkillError)
    expect(() => defineSkill({ name: 'build', command: ['make'], timeoutMs: 0 })).toThrow(
      'timeoutMs must be positive'
    )
    expect(() => defineSkill({ name: 'build', command: ['make'], successExitCodes: [] })).toThrow(
      InvalidSkillError
    )
  })
})

describe('appliesTo', () => {
  test('requires every capability', () => {
    const skill = defineSkill({ name: 'release', command: ['release'], requires: ['build', 'test'] })
    expect(appliesTo(skill, pkg('core', ['build', 'test', 'lint']))).toBe(true)
    expect(appliesTo(skill, pkg('docs', ['build']))).toBe(false)
  })

  test('defaults to the skill name as capability', () => {
    const lint = defineSkill({ name: 'lint', command: ['lint'] })
    expect(appliesTo(lint, pkg('core', ['lint']))).toBe(true)
    expect(appliesTo(lint, pkg('tool', ['build']))).toBe(false)
  })

  test('missingCapabilities lists what a package lacks, in required order', () => {
    const skill = defineSkill({ name: 'release', command: ['release'], requires: ['build', 'test', 'sign'] })
    expect(missingCapabilities(skill, pkg('docs', ['test']))).toEqual(['build', 'sign'])
    expect(missingCapabilities(skill, pkg('core', ['sign', 'test', 'build']))).toEqual([])
  })
})

describe('SkillRegistry', () => {
  let registry: SkillRegistry

  beforeEach(() => {
    registry = new SkillRegistry()
  })

  test('registers and resolves skills', () => {
    const skill = registry.register({ name: 'build', command: ['make'] })
    expect(registry.resolve('build')).toBe(skill)
    expect(registry.has('build')).toBe(true)
    expect(registry.get('test')).toBeUndefined()
  })

  test('rejects duplicate names', () => {
    registry.register({ name: 'build', command: ['make'] })
    expect(() => registry.register({ name: 'build', command: ['ninja'] })).toThrow(DuplicateSkillError)
  })

  test('resolve throws UnknownSkillError listing available skills', () => {
    registry.register({ name: 'test', command: ['make', 'test'] })
    registry.register({ name: 'build', command: ['make'] })
    expect(() => registry.resolve('deploy')).toThrow(UnknownSkillError)
    expect(() => registry.resolve('deploy')).toThrow('Unknown skill: "deploy" (available: build, test)')
  })

  test('lists skills sorted by name', () => {
    const fromDefs = SkillRegistry.fromDefinitions([
      { name: 'test', command: ['t'] },
      { name: 'build', command: ['b'] },
      { name: 'lint', command: ['l'] },
    ])
    expect(fromDefs.names()).toEqual(['build', 'lint', 'test'])
  })

  test('fromConfig compiles wsk.toml skill tables', () => {
    const fromConfig = SkillRegistry.fromConfig({
      test: { command: ['make', 'check'], success_exit_codes: [0, 5], timeout_ms: 1000 },
      build: { command: ['make'], classify: [{ pattern: 'error:', reason: 'compiler error' }] },
    })
    expect(fromConfig.names()).toEqual(['build', 'test'])
    expect(fromConfig.resolve('test').successExitCodes).toEqual([0, 5])
    expect(fromConfig.resolve('test').timeoutMs).toBe(1000)
    expect(fromConfig.resolve('build').classifiers[0]?.reason).toBe('compiler error')
  })
})
