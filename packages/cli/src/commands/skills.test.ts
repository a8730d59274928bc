import { defineSkill } from '@wsk/execution'
import { describe, expect, test } from 'vitest'

import { skillEntry } from './skills.js'

describe('skillEntry', () => {
  test('flattens a compiled skill', () => {
    const skill = defineSkill({
      name: 'build',
      description: 'Compile sources',
      command: ['make', '-C', '{packageDir}', 'all targets'],
      classifiers: [{ pattern: 'error TS\\d+', reason: 'compiler error' }],
      timeoutMs: 5000,
    })

    expect(skillEntry(skill)).toEqual({
      name: 'build',
      description: 'Compile sources',
      command: "make -C '{packageDir}' 'all targets'",
      cwd: '{packageDir}',
      requires: ['build'],
      successExitCodes: [0],
      timeoutMs: 5000,
      classifiers: [{ pattern: 'error TS\\d+', reason: 'compiler error' }],
    })
  })
})
