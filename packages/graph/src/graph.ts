/**
 * Package dependency graph.
 *
 * Built once from manifest records and immutable afterwards. Loading
 * rejects duplicate ids, dependencies on unknown packages and cycles, so
 * every query below may assume a valid DAG.
 */

import {
  ConfigError,
  CyclicDependencyError,
  DuplicatePackageError,
  MissingDependencyError,
  type Package,
  type PackageId,
  type PackageManifest,
  type SkillName,
  UnknownPackageError,
  isPackageId,
  isSkillName,
} from '@wsk/core'

/**
 * Immutable directed acyclic graph of workspace packages.
 * Edges point from a package to the packages it depends on.
 */
export class PackageGraph {
  private readonly packages: ReadonlyMap<string, Package>
  private readonly dependents: ReadonlyMap<string, readonly PackageId[]>

  private constructor(packages: Map<string, Package>) {
    this.packages = packages

    const dependents = new Map<string, PackageId[]>()
    for (const id of packages.keys()) {
      dependents.set(id, [])
    }
    for (const pkg of packages.values()) {
      for (const dep of pkg.dependencies) {
        dependents.get(dep)?.push(pkg.id)
      }
    }
    for (const list of dependents.values()) {
      list.sort()
    }
    this.dependents = dependents
  }

  /**
   * Build a graph from manifest records.
   *
   * @throws DuplicatePackageError if two records share an id
   * @throws MissingDependencyError if a dependency names an unknown package
   * @throws CyclicDependencyError if the dependencies form a cycle
   */
  static load(manifests: readonly PackageManifest[]): PackageGraph {
    const packages = new Map<string, Package>()

    for (const manifest of manifests) {
      const id = toPackageId(manifest.id, manifest.id)
      if (packages.has(id)) {
        throw new DuplicatePackageError(id)
      }
      const pkg: Package = Object.freeze({
        id,
        path: manifest.path ?? manifest.id,
        dependencies: Object.freeze(
          [...new Set(manifest.dependencies ?? [])].map((dep) => toPackageId(dep, id))
        ),
        capabilities: Object.freeze(
          [...new Set(manifest.capabilities ?? [])].map((cap) => toCapability(cap, id))
        ),
      })
      packages.set(id, pkg)
    }

    for (const pkg of packages.values()) {
      for (const dep of pkg.dependencies) {
        if (!packages.has(dep)) {
          throw new MissingDependencyError(pkg.id, dep)
        }
      }
    }

    assertAcyclic(packages)
    return new PackageGraph(packages)
  }

  /** Number of packages in the graph */
  get size(): number {
    return this.packages.size
  }

  /** All package ids, sorted */
  ids(): PackageId[] {
    return [...this.packages.values()].map((pkg) => pkg.id).sort()
  }

  has(id: string): id is PackageId {
    return this.packages.has(id)
  }

  get(id: string): Package | undefined {
    return this.packages.get(id)
  }

  /**
   * Get a package, throwing UnknownPackageError if it is not in the graph.
   */
  require(id: string): Package {
    const pkg = this.get(id)
    if (!pkg) {
      throw new UnknownPackageError(id, this.ids())
    }
    return pkg
  }

  /** Direct dependencies of a package */
  dependenciesOf(id: string): readonly PackageId[] {
    return this.require(id).dependencies
  }

  /** Packages that directly depend on `id`, sorted */
  dependentsOf(id: string): readonly PackageId[] {
    return this.dependents.get(this.require(id).id) ?? []
  }

  /** Whether a package declares a capability */
  supports(id: string, capability: SkillName): boolean {
    return this.require(id).capabilities.includes(capability)
  }

  /**
   * Targets plus all of their transitive dependencies.
   */
  closure(targets: Iterable<string>): Set<PackageId> {
    return this.reach(targets, (id) => this.dependenciesOf(id))
  }

  /**
   * Changed packages plus every package that transitively depends on them,
   * sorted. Used to scope a run to what a change can affect.
   */
  affectedBy(changed: Iterable<string>): PackageId[] {
    return [...this.reach(changed, (id) => this.dependentsOf(id))].sort()
  }

  /**
   * Targets and their transitive dependencies in dependency-first order.
   * Ties between packages that are ready at the same time break
   * lexicographically by id, so the order is reproducible.
   */
  topologicalOrder(targets: Iterable<string>): PackageId[] {
    const members = this.closure(targets)

    // Remaining in-closure dependency count per member
    const pending = new Map<PackageId, number>()
    for (const id of members) {
      pending.set(id, this.dependenciesOf(id).length)
    }

    const ready = [...members].filter((id) => pending.get(id) === 0).sort()
    const order: PackageId[] = []

    while (ready.length > 0) {
      const next = ready.shift()
      if (next === undefined) break
      order.push(next)

      for (const dependent of this.dependentsOf(next)) {
        const count = pending.get(dependent)
        if (count === undefined) continue
        pending.set(dependent, count - 1)
        if (count - 1 === 0) {
          insertSorted(ready, dependent)
        }
      }
    }

    return order
  }

  /**
   * Breadth-first reachability from `start` along `edges`.
   */
  private reach(start: Iterable<string>, edges: (id: PackageId) => readonly PackageId[]): Set<PackageId> {
    const seen = new Set<PackageId>()
    const queue: PackageId[] = []

    for (const id of start) {
      const pkg = this.require(id)
      if (!seen.has(pkg.id)) {
        seen.add(pkg.id)
        queue.push(pkg.id)
      }
    }

    while (queue.length > 0) {
      const id = queue.shift()
      if (id === undefined) break
      for (const next of edges(id)) {
        if (!seen.has(next)) {
          seen.add(next)
          queue.push(next)
        }
      }
    }

    return seen
  }
}

/**
 * DFS with visiting/visited marks; reports the first cycle found as a path
 * that starts and ends with the same package.
 */
function assertAcyclic(packages: ReadonlyMap<string, Package>): void {
  const visitState = new Map<PackageId, 'visiting' | 'visited'>()
  const visitPath: PackageId[] = []

  function visit(id: PackageId): void {
    const state = visitState.get(id)
    if (state === 'visited') return
    if (state === 'visiting') {
      const cycleStart = visitPath.indexOf(id)
      throw new CyclicDependencyError([...visitPath.slice(cycleStart), id])
    }

    visitState.set(id, 'visiting')
    visitPath.push(id)
    for (const dep of packages.get(id)?.dependencies ?? []) {
      visit(dep)
    }
    visitPath.pop()
    visitState.set(id, 'visited')
  }

  for (const pkg of [...packages.values()].sort((a, b) => compareIds(a.id, b.id))) {
    visit(pkg.id)
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function toPackageId(value: string, owner: string): PackageId {
  if (!isPackageId(value)) {
    throw new ConfigError(
      `Invalid package id "${value}" in manifest of "${owner}"`,
      'INVALID_PACKAGE_ID',
      'graph'
    )
  }
  return value
}

function toCapability(value: string, owner: string): SkillName {
  if (!isSkillName(value)) {
    throw new ConfigError(
      `Invalid capability "${value}" in manifest of "${owner}" (must be a skill name)`,
      'INVALID_CAPABILITY',
      'graph'
    )
  }
  return value
}

function insertSorted(list: PackageId[], id: PackageId): void {
  let i = 0
  while (i < list.length && (list[i] ?? '') < id) i++
  list.splice(i, 0, id)
}

/**
 * Build a package graph from manifest records.
 *
 * @see PackageGraph.load
 */
export function loadGraph(manifests: readonly PackageManifest[]): PackageGraph {
  return PackageGraph.load(manifests)
}
