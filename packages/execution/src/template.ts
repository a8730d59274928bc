/**
 * Skill command templates.
 *
 * Commands are argv arrays run without a shell, so substitution is plain
 * string replacement per element; nothing is re-split or interpreted.
 */

import { SKILL_PLACEHOLDERS, type SkillPlaceholder, type TemplateValues } from '@wsk/core'

const PLACEHOLDER_PATTERN = /\{([A-Za-z]+)\}/g

function isPlaceholder(name: string): name is SkillPlaceholder {
  return SKILL_PLACEHOLDERS.some((placeholder) => placeholder === name)
}

/**
 * Substitute known placeholders in one template string.
 * Unknown `{...}` sequences are left untouched.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) =>
    isPlaceholder(name) ? values[name] : match
  )
}

/**
 * Render every element of an argv template.
 */
export function renderCommand(command: readonly string[], values: TemplateValues): string[] {
  return command.map((part) => renderTemplate(part, values))
}

/**
 * Placeholder names used in a template that are not understood.
 */
export function unknownPlaceholders(template: string): string[] {
  const unknown: string[] = []
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1]
    if (name !== undefined && !isPlaceholder(name) && !unknown.includes(name)) {
      unknown.push(name)
    }
  }
  return unknown
}

/**
 * Quote a string for a POSIX shell if it contains special characters.
 * Uses single quotes, escaping any embedded single quotes.
 */
export function shellQuote(str: string): string {
  if (str === '') {
    return "''"
  }
  if (/^[a-zA-Z0-9_./:=@%+-]+$/.test(str)) {
    return str
  }
  return `'${str.replace(/'/g, "'\\''")}'`
}

/**
 * Format an argv array as a copy-pasteable shell command.
 *
 * @example
 * ```typescript
 * formatCommand(['make', '-C', '/work/my pkg'])
 * // Returns: make -C '/work/my pkg'
 * ```
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ')
}
