/**
 * Tests for artifact rendering and writing.
 */

import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { type RunSummary, asPackageId, asSkillName } from '@wsk/core'
import { Runner, SkillRegistry, createOutcome, mergeEnvironment, skippedOutcome } from '@wsk/execution'
import { PackageGraph } from '@wsk/graph'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  RUN_SUMMARY_FILE,
  renderArtifacts,
  renderImplementationPlan,
  renderVerificationWalkthrough,
  writeArtifacts,
} from './artifacts.js'
import { type RunPlan, planRun } from './plan.js'
import { summarize } from './summary.js'

const graph = PackageGraph.load([
  { id: 'core', path: 'packages/core', capabilities: ['build'] },
  { id: 'docs' },
  { id: 'tool', path: 'packages/my tool', dependencies: ['core'], capabilities: ['build'] },
])
const registry = SkillRegistry.fromDefinitions([
  { name: 'build', description: 'Compile a package', command: ['make', '-C', '{packageDir}'] },
])
const environment = mergeEnvironment([
  { root: '/opt/tc', vars: { CC: 'clang', TOOL_HOME: '${ROOT}' } },
])

function createPlan(): RunPlan {
  return planRun(graph, registry, new Runner({ workspaceRoot: '/ws' }), 'build', [])
}

function createSummary(): RunSummary {
  const build = asSkillName('build')
  return summarize({
    skill: build,
    order: ['core', 'docs', 'tool'].map(asPackageId),
    outcomes: [
      createOutcome({
        package: asPackageId('core'),
        skill: build,
        kind: 'failure',
        exitCode: 2,
        reason: 'Exited with code 2',
        output: [],
        stdout: '',
        stderr: '',
        durationMs: 40,
        attempts: 1,
      }),
      skippedOutcome(asPackageId('docs'), build, 'skipped-unsupported', 'missing capability: build'),
      skippedOutcome(asPackageId('tool'), build, 'skipped-upstream-failure', 'Upstream dependency failed: core'),
    ],
    startedAt: new Date('2026-01-02T03:04:05.000Z'),
    durationMs: 50,
  })
}

describe('renderImplementationPlan', () => {
  test('lists scope, order and skipped packages', () => {
    expect(renderImplementationPlan(createPlan())).toBe(
      [
        '# Implementation plan: build',
        '',
        '- Skill: `build`',
        '- Description: Compile a package',
        '- Targets: core, docs, tool',
        '- Scope: targets and their dependencies',
        '',
        '## Execution order',
        '',
        '1. core',
        '2. tool',
        '',
        '## Skipped',
        '',
        '- docs: missing capability: build',
        '',
      ].join('\n')
    )
  })

  test('says when nothing runs', () => {
    const plan = planRun(graph, registry, new Runner({ workspaceRoot: '/ws' }), 'build', ['docs'])
    const lines = renderImplementationPlan(plan).split('\n')
    expect(lines).toContain('Nothing to run.')
  })
})

describe('renderVerificationWalkthrough', () => {
  test('gives copy-pasteable commands and the environment', () => {
    expect(renderVerificationWalkthrough(createPlan(), environment)).toBe(
      [
        '# Verification walkthrough: build',
        '',
        '## Environment',
        '',
        'Roots, later ones shadowing earlier ones:',
        '',
        '- /opt/tc',
        '',
        '```sh',
        'export CC=clang',
        'export TOOL_HOME=/opt/tc',
        '```',
        '',
        '## Steps',
        '',
        '### 1. core',
        '',
        '```sh',
        'cd /ws/packages/core',
        'make -C /ws/packages/core',
        '```',
        '',
        '### 2. docs',
        '',
        'Not run: missing capability: build',
        '',
        '### 3. tool',
        '',
        '```sh',
        "cd '/ws/packages/my tool'",
        "make -C '/ws/packages/my tool'",
        '```',
        '',
      ].join('\n')
    )
  })

  test('includes the status and per-package outcomes after a run', () => {
    const lines = renderVerificationWalkthrough(createPlan(), environment, createSummary()).split('\n')
    expect(lines).toContain('Status: **failure**')
    expect(lines).toContain('Outcome: failure (Exited with code 2, 40ms)')
    expect(lines).toContain('Outcome: skipped-upstream-failure (Upstream dependency failed: core)')
  })

  test('notes an ambient-only environment', () => {
    const lines = renderVerificationWalkthrough(createPlan(), mergeEnvironment([])).split('\n')
    expect(lines).toContain('No environment roots; commands inherit the ambient environment.')
  })
})

describe('writeArtifacts', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'wsk-artifacts-'))
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  test('writes both documents and the summary', async () => {
    const summary = createSummary()
    const artifacts = renderArtifacts(createPlan(), environment, summary)
    const dir = join(tmpDir, 'out')

    const paths = await writeArtifacts(dir, artifacts, summary)

    expect(await readFile(paths.implementationPlan, 'utf8')).toBe(artifacts.implementationPlan)
    expect(await readFile(paths.verificationWalkthrough, 'utf8')).toBe(artifacts.verificationWalkthrough)
    expect(paths.runSummary).toBe(join(dir, RUN_SUMMARY_FILE))

    const written: unknown = JSON.parse(await readFile(join(dir, RUN_SUMMARY_FILE), 'utf8'))
    expect(written).toMatchObject({ skill: 'build', status: 'failure', failed: ['core'] })
  })

  test('omits the summary for a plan', async () => {
    const paths = await writeArtifacts(tmpDir, renderArtifacts(createPlan(), environment))

    expect(paths.runSummary).toBeUndefined()
    const files = (await readdir(tmpDir)).filter((name) => !name.startsWith('.'))
    expect(files.sort()).toEqual(['implementation-plan.md', 'verification-walkthrough.md'])
  })
})
