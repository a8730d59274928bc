/**
 * Tests for run planning.
 */

import { UnknownPackageError } from '@wsk/core'
import { Runner, SkillRegistry } from '@wsk/execution'
import { PackageGraph } from '@wsk/graph'
import { describe, expect, test, vi } from 'vitest'

import { planRun } from './plan.js'

const graph = PackageGraph.load([
  { id: 'core', capabilities: ['build'] },
  { id: 'docs' },
  { id: 'tool', path: 'apps/tool', dependencies: ['core'], capabilities: ['build'] },
])

const runner = new Runner({ workspaceRoot: '/work' })

function registry(): SkillRegistry {
  return SkillRegistry.fromDefinitions([
    { name: 'build', command: ['make', '-C', '{packageDir}'] },
    { name: 'release', command: ['release', '{package}'], requires: ['build', 'sign'] },
  ])
}

describe('planRun', () => {
  test('renders run steps and skips packages without the capability', () => {
    const plan = planRun(graph, registry(), runner, 'build', [])

    expect(plan.order).toEqual(['core', 'docs', 'tool'])
    expect(plan.steps).toEqual([
      { action: 'run', package: 'core', command: ['make', '-C', '/work/core'], cwd: '/work/core' },
      { action: 'skip', package: 'docs', reason: 'missing capability: build' },
      { action: 'run', package: 'tool', command: ['make', '-C', '/work/apps/tool'], cwd: '/work/apps/tool' },
    ])
  })

  test('asks the registry whether each package applies', () => {
    const skills = registry()
    const appliesTo = vi.spyOn(skills, 'appliesTo')

    planRun(graph, skills, runner, 'build', ['tool'])

    expect(appliesTo.mock.calls.map(([, pkg]) => pkg.id)).toEqual(['core', 'tool'])
  })

  test('names every missing capability', () => {
    const plan = planRun(graph, registry(), runner, 'release', ['core'])
    expect(plan.steps).toEqual([{ action: 'skip', package: 'core', reason: 'missing capability: sign' }])
  })

  test('widens targets to their dependents with onlyAffected', () => {
    const plan = planRun(graph, registry(), runner, 'build', ['core'], { onlyAffected: true })
    expect(plan.targets).toEqual(['core'])
    expect(plan.order).toEqual(['core', 'tool'])
  })

  test('rejects an unknown target', () => {
    expect(() => planRun(graph, registry(), runner, 'build', ['nope'])).toThrow(UnknownPackageError)
  })
})
