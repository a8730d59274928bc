/**
 * CLI package tests.
 */

import { describe, expect, test } from 'vitest'

import { VERSION, createProgram } from './index.js'

describe('createProgram', () => {
  test('registers every command', () => {
    const names = createProgram()
      .commands.map((command) => command.name())
      .sort()
    expect(names).toEqual(['affected', 'doctor', 'graph', 'plan', 'run', 'skills'])
  })

  test('run takes a skill, optional packages and the run flags', () => {
    const run = createProgram().commands.find((command) => command.name() === 'run')
    const flags = run?.options.map((option) => option.long)
    expect(flags).toEqual([
      '--workspace',
      '--concurrency',
      '--timeout',
      '--only-affected',
      '--retries',
      '--artifacts',
      '--events',
      '--verbose',
      '--json',
    ])
    expect(run?.registeredArguments.map((arg) => arg.name())).toEqual(['skill', 'packages'])
  })

  test('reports its version', () => {
    expect(createProgram().version()).toBe(VERSION)
  })
})
