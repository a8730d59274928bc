/**
 * Execution outcome constructors.
 */

import type {
  ExecutionOutcome,
  OutputChunk,
  PackageId,
  SkillName,
  SkippedKind,
} from '@wsk/core'

/**
 * Freeze an outcome. Outcomes are never mutated after creation.
 */
export function createOutcome(outcome: ExecutionOutcome): ExecutionOutcome {
  return Object.freeze({ ...outcome, output: Object.freeze([...outcome.output]) })
}

/**
 * Outcome for a scheduled pair that was never attempted.
 */
export function skippedOutcome(
  pkg: PackageId,
  skill: SkillName,
  kind: SkippedKind,
  reason: string
): ExecutionOutcome {
  return createOutcome({
    package: pkg,
    skill,
    kind,
    exitCode: null,
    reason,
    output: [],
    stdout: '',
    stderr: '',
    durationMs: 0,
    attempts: 0,
  })
}

/**
 * Concatenate the chunks of one stream.
 */
export function joinStream(output: readonly OutputChunk[], stream: OutputChunk['stream']): string {
  return output
    .filter((chunk) => chunk.stream === stream)
    .map((chunk) => chunk.text)
    .join('')
}

/**
 * Both streams interleaved in arrival order, for display.
 */
export function interleavedOutput(output: readonly OutputChunk[]): string {
  return output.map((chunk) => chunk.text).join('')
}
