/**
 * Tests for the package graph.
 *
 * Covers load-time validation (duplicates, unknown deps, cycles),
 * deterministic topological order, closures and affected sets.
 */

import {
  ConfigError,
  CyclicDependencyError,
  DuplicatePackageError,
  MissingDependencyError,
  type PackageManifest,
  UnknownPackageError,
  asSkillName,
} from '@wsk/core'
import { describe, expect, test } from 'vitest'

import { PackageGraph, loadGraph } from './graph.js'

/**
 *        app
 *       /   \
 *     ui    api
 *       \   /  \
 *       core   db
 *
 * plus an unrelated `docs`.
 */
const diamond: PackageManifest[] = [
  { id: 'app', dependencies: ['ui', 'api'], capabilities: ['build', 'test'] },
  { id: 'ui', dependencies: ['core'], capabilities: ['build', 'lint'] },
  { id: 'api', dependencies: ['core', 'db'], capabilities: ['build', 'test'] },
  { id: 'core', capabilities: ['build', 'test', 'lint'] },
  { id: 'db', capabilities: ['build'] },
  { id: 'docs', capabilities: ['lint'] },
]

describe('PackageGraph.load', () => {
  test('loadGraph builds the same graph as PackageGraph.load', () => {
    expect(loadGraph(diamond).topologicalOrder(['app'])).toEqual(PackageGraph.load(diamond).topologicalOrder(['app']))
  })

  test('loads packages and fills defaults', () => {
    const graph = PackageGraph.load([{ id: 'core' }])
    expect(graph.size).toBe(1)
    expect(graph.get('core')).toEqual({ id: 'core', path: 'core', dependencies: [], capabilities: [] })
  })

  test('freezes loaded packages', () => {
    const graph = PackageGraph.load(diamond)
    expect(Object.isFrozen(graph.require('app'))).toBe(true)
    expect(Object.isFrozen(graph.require('app').dependencies)).toBe(true)
  })

  test('rejects duplicate ids', () => {
    expect(() => PackageGraph.load([{ id: 'core' }, { id: 'core' }])).toThrow(DuplicatePackageError)
  })

  test('rejects dependencies on unknown packages', () => {
    expect(() => PackageGraph.load([{ id: 'tool', dependencies: ['core'] }])).toThrow(
      MissingDependencyError
    )
  })

  test('rejects a cycle with the cycle path', () => {
    const manifests: PackageManifest[] = [
      { id: 'a', dependencies: ['b'] },
      { id: 'b', dependencies: ['c'] },
      { id: 'c', dependencies: ['a'] },
    ]
    try {
      PackageGraph.load(manifests)
      expect.unreachable('should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(CyclicDependencyError)
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof CyclicDependencyError) {
        expect(err.cycle).toEqual(['a', 'b', 'c', 'a'])
      }
    }
  })

  test('rejects a self-dependency', () => {
    expect(() => PackageGraph.load([{ id: 'a', dependencies: ['a'] }])).toThrow(CyclicDependencyError)
  })

  test('rejects invalid capability names as configuration errors', () => {
    expect(() => PackageGraph.load([{ id: 'a', capabilities: ['Not A Skill'] }])).toThrow(ConfigError)
  })
})

describe('PackageGraph.topologicalOrder', () => {
  const graph = PackageGraph.load(diamond)

  test('places every package after its dependencies', () => {
    const order = graph.topologicalOrder(graph.ids())
    for (const id of order) {
      for (const dep of graph.dependenciesOf(id)) {
        expect(order.indexOf(dep)).toBeLessThan(order.indexOf(id))
      }
    }
    expect(order).toHaveLength(6)
  })

  test('breaks ties lexicographically', () => {
    expect(graph.topologicalOrder(graph.ids())).toEqual(['core', 'db', 'api', 'docs', 'ui', 'app'])
  })

  test('includes transitive dependencies of the targets only', () => {
    expect(graph.topologicalOrder(['ui'])).toEqual(['core', 'ui'])
    expect(graph.topologicalOrder(['api'])).toEqual(['core', 'db', 'api'])
  })

  test('is independent of target order and duplicates', () => {
    expect(graph.topologicalOrder(['ui', 'api', 'ui'])).toEqual(graph.topologicalOrder(['api', 'ui']))
  })

  test('throws UnknownPackageError for unknown targets', () => {
    expect(() => graph.topologicalOrder(['ghost'])).toThrow(UnknownPackageError)
  })
})

describe('PackageGraph queries', () => {
  const graph = PackageGraph.load(diamond)

  test('affectedBy returns changed packages and transitive dependents', () => {
    expect(graph.affectedBy(['core'])).toEqual(['api', 'app', 'core', 'ui'])
    expect(graph.affectedBy(['db'])).toEqual(['api', 'app', 'db'])
    expect(graph.affectedBy(['docs'])).toEqual(['docs'])
  })

  test('closure returns targets plus dependencies', () => {
    expect([...graph.closure(['app'])].sort()).toEqual(['api', 'app', 'core', 'db', 'ui'])
  })

  test('dependentsOf is sorted', () => {
    expect(graph.dependentsOf('core')).toEqual(['api', 'ui'])
  })

  test('supports checks declared capabilities', () => {
    expect(graph.supports('docs', asSkillName('lint'))).toBe(true)
    expect(graph.supports('docs', asSkillName('build'))).toBe(false)
  })
})
