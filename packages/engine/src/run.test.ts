/**
 * End-to-end tests for run and plan against a workspace on disk.
 */

import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { LockError, LockTimeoutError, UnknownSkillError, withArtifactsLock } from '@wsk/core'
import type { RunEvent } from '@wsk/execution'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { plan, run } from './run.js'

// Fails for the package named in FAIL_PACKAGE (set by the toolchain root)
const SCRIPT = 'process.exit(process.argv[1] === process.env.FAIL_PACKAGE ? 1 : 0)'

function manifest(): string {
  return `
schema = 1

[environment]
base = "toolchain"

[packages.core]
capabilities = ["build"]

[packages.tool]
dependencies = ["core"]
capabilities = ["build"]

[packages.docs]

[skills.build]
command = ['${process.execPath}', "-e", '${SCRIPT}', "{package}"]
cwd = "{workspaceRoot}"
`
}

describe('run', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'wsk-run-'))
    await writeFile(join(root, 'wsk.toml'), manifest())
    await mkdir(join(root, 'toolchain'))
    await writeFile(join(root, 'toolchain', 'env.toml'), '[vars]\nFAIL_PACKAGE = "core"\n')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  test('runs a skill, writes artifacts and logs events', async () => {
    const artifactsDir = join(root, 'artifacts')
    const eventsPath = join(root, 'logs', 'events.jsonl')
    const seen: string[] = []

    const result = await run('build', ['tool'], {
      workspaceRoot: root,
      ambient: {},
      concurrency: 1,
      artifactsDir,
      eventsPath,
      onEvent: (event: RunEvent) => seen.push(event.event),
    })

    expect(result.summary.status).toBe('failure')
    expect(result.summary.outcomes.map((o) => `${o.package}:${o.kind}`)).toEqual([
      'core:failure',
      'tool:skipped-upstream-failure',
    ])
    expect(seen).toEqual([
      'run_started',
      'package_started',
      'package_completed',
      'package_skipped',
      'run_completed',
    ])

    const log = (await readFile(eventsPath, 'utf8')).trim().split('\n')
    expect(log).toHaveLength(5)

    expect(result.artifactPaths?.runSummary).toBe(join(artifactsDir, 'run-summary.json'))
    expect(await readFile(join(artifactsDir, 'implementation-plan.md'), 'utf8')).toBe(
      result.artifacts.implementationPlan
    )
    const walkthrough = (await readFile(join(artifactsDir, 'verification-walkthrough.md'), 'utf8')).split('\n')
    expect(walkthrough).toContain('export FAIL_PACKAGE=core')
  })

  test('only-affected widens the targets to their dependents', async () => {
    const result = await run('build', ['core'], { workspaceRoot: root, ambient: {}, onlyAffected: true })

    expect(result.plan.order).toEqual(['core', 'tool'])
    expect(result.summary.outcomes).toHaveLength(2)
  })

  test('an unusable artifacts directory fails before anything runs', async () => {
    await writeFile(join(root, 'blocker'), '')
    const seen: string[] = []

    await expect(
      run('build', ['tool'], {
        workspaceRoot: root,
        ambient: {},
        artifactsDir: join(root, 'blocker', 'out'),
        onEvent: (event: RunEvent) => seen.push(event.event),
      })
    ).rejects.toBeInstanceOf(LockError)
    expect(seen).toEqual([])
  })

  test('a locked artifacts directory fails before anything runs', async () => {
    const artifactsDir = join(root, 'artifacts')
    const seen: string[] = []

    await withArtifactsLock(artifactsDir, async () => {
      await expect(
        run('build', ['tool'], {
          workspaceRoot: root,
          ambient: {},
          artifactsDir,
          artifactsLock: { retries: 1 },
          onEvent: (event: RunEvent) => seen.push(event.event),
        })
      ).rejects.toBeInstanceOf(LockTimeoutError)
    })
    expect(seen).toEqual([])
  })

  test('a failed artifact write keeps the summary', async () => {
    const artifactsDir = join(root, 'artifacts')
    // A directory where the plan file should go makes the write fail
    await mkdir(join(artifactsDir, 'implementation-plan.md'), { recursive: true })

    const result = await run('build', ['core'], { workspaceRoot: root, ambient: {}, artifactsDir })

    expect(result.summary.status).toBe('failure')
    expect(result.summary.outcomes.map((o) => o.package)).toEqual(['core'])
    expect(result.artifactPaths).toBeUndefined()
    expect(result.artifactsError).toBeInstanceOf(Error)
  })

  test('an unknown skill is a configuration error', async () => {
    await expect(run('deploy', [], { workspaceRoot: root, ambient: {} })).rejects.toBeInstanceOf(
      UnknownSkillError
    )
  })
})

describe('plan', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'wsk-plan-'))
    await writeFile(join(root, 'wsk.toml'), manifest())
    await mkdir(join(root, 'toolchain'))
    await writeFile(join(root, 'toolchain', 'env.toml'), '[vars]\n')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  test('plans without executing', async () => {
    const artifactsDir = join(root, 'artifacts')
    const result = await plan('build', [], { workspaceRoot: root, ambient: {}, artifactsDir })

    expect(result.plan.order).toEqual(['core', 'docs', 'tool'])
    expect(result.plan.steps.map((step) => `${step.package}:${step.action}`)).toEqual([
      'core:run',
      'docs:skip',
      'tool:run',
    ])
    expect(result.artifactPaths?.runSummary).toBeUndefined()
    await expect(access(join(artifactsDir, 'run-summary.json'))).rejects.toThrow()
  })
})
