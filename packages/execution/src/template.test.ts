/**
 * Tests for command templates and shell quoting.
 */

import { describe, expect, test } from 'vitest'

import { formatCommand, renderCommand, renderTemplate, shellQuote, unknownPlaceholders } from './template.js'

const values = { package: 'core', packageDir: '/ws/packages/core', workspaceRoot: '/ws' }

describe('renderTemplate', () => {
  test('substitutes every known placeholder', () => {
    expect(renderTemplate('{workspaceRoot}:{package}@{packageDir}', values)).toBe(
      '/ws:core@/ws/packages/core'
    )
  })

  test('leaves unknown placeholders untouched', () => {
    expect(renderTemplate('{other}', values)).toBe('{other}')
  })

  test('renders each argv element without splitting', () => {
    expect(renderCommand(['make', '-C', '{packageDir}', 'PKG={package} extra'], values)).toEqual([
      'make',
      '-C',
      '/ws/packages/core',
      'PKG=core extra',
    ])
  })
})

describe('unknownPlaceholders', () => {
  test('reports each unknown name once', () => {
    expect(unknownPlaceholders('{pkg} {package} {pkg} {dir}')).toEqual(['pkg', 'dir'])
  })

  test('ignores braces without a name', () => {
    expect(unknownPlaceholders('() => {}')).toEqual([])
  })
})

describe('shellQuote / formatCommand', () => {
  test('leaves safe strings bare', () => {
    expect(shellQuote('--workspace=packages/core')).toBe('--workspace=packages/core')
  })

  test('quotes spaces and embedded single quotes', () => {
    expect(shellQuote('my dir')).toBe("'my dir'")
    expect(shellQuote("it's")).toBe("'it'\\''s'")
    expect(shellQuote('')).toBe("''")
  })

  test('formats a copy-pasteable command', () => {
    expect(formatCommand(['make', '-C', '/work/my pkg', 'all'])).toBe("make -C '/work/my pkg' all")
  })
})
