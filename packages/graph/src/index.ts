/**
 * @wsk/graph - package dependency graph.
 */

export { PackageGraph, loadGraph } from './graph.js'
