import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { runChecks } from './doctor.js'

const MANIFEST = `
schema = 1

[packages.core]
capabilities = ["build", "lint", "test"]

[packages.tool]
dependencies = ["core"]

[skills.build]
command = ['${process.execPath}', "-e", "0"]

[skills.lint]
command = ["wsk-missing-program", "{packageDir}"]

[skills.test]
command = ["{packageDir}/run-tests"]
`

describe('runChecks', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'wsk-doctor-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  test('reports every check for a loadable workspace', async () => {
    await writeFile(join(root, 'wsk.toml'), MANIFEST)
    await mkdir(join(root, 'core'))

    const checks = await runChecks({ workspace: root, env: { PATH: root } })

    expect(checks.map((check) => `${check.name}:${check.status}`)).toEqual([
      'workspace:ok',
      'manifest:ok',
      'environment:ok',
      'packages:warning',
      'skill:build:ok',
      'skill:lint:error',
      'skill:test:ok',
    ])
    expect(checks[1]?.message).toBe('Manifest valid: 2 package(s), 3 skill(s)')
    expect(checks[2]?.message).toBe('No environment roots declared')
    expect(checks[3]?.message).toBe('Missing package directories: tool')
    expect(checks[4]?.message).toBe(`Skill "build": ${process.execPath}`)
    expect(checks[5]?.message).toBe('Skill "lint": program not found: wsk-missing-program')
  })

  test('resolves relative programs against the skill working directory', async () => {
    await writeFile(
      join(root, 'wsk.toml'),
      [
        'schema = 1',
        '',
        '[packages.core]',
        'capabilities = ["build", "gen"]',
        '',
        '[skills.build]',
        'command = ["./gradlew", "build"]',
        '',
        '[skills.gen]',
        'command = ["./gen.sh"]',
        'cwd = "{workspaceRoot}/tools"',
        '',
      ].join('\n')
    )
    await mkdir(join(root, 'core'))
    await mkdir(join(root, 'tools'))
    await writeFile(join(root, 'tools', 'gen.sh'), '#!/bin/sh\n')
    await chmod(join(root, 'tools', 'gen.sh'), 0o755)

    const checks = await runChecks({ workspace: root, env: {} })

    expect(checks.slice(4)).toEqual([
      { name: 'skill:build', status: 'ok', message: 'Skill "build": program resolved per package' },
      { name: 'skill:gen', status: 'ok', message: `Skill "gen": ${join(root, 'tools', 'gen.sh')}` },
    ])
  })

  test('stops when no workspace is found', async () => {
    const checks = await runChecks({ cwd: root, env: {} })

    expect(checks).toHaveLength(1)
    expect(checks[0]?.status).toBe('error')
    expect(checks[0]?.detail).toBe(`No wsk.toml found in ${root} or its parents`)
  })

  test('stops at an unusable environment root', async () => {
    await writeFile(join(root, 'wsk.toml'), 'schema = 1\n\n[environment]\nbase = "toolchain"\n\n[packages.core]\n')

    const checks = await runChecks({ workspace: root, env: {} })

    expect(checks.map((check) => `${check.name}:${check.status}`)).toEqual([
      'workspace:ok',
      'manifest:ok',
      'environment:error',
    ])
  })
})
