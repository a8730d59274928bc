/**
 * @wsk/execution
 *
 * Environment contexts, the skill registry, the subprocess runner and
 * structured run events.
 */

export {
  type AmbientEnvironment,
  type BuildEnvironmentOptions,
  ROOT_REFERENCE,
  ambientEnvironment,
  buildEnvironment,
  definedVariables,
  mergeEnvironment,
} from './environment.js'

export {
  type BaseEvent,
  type EventEmitterOptions,
  type HeartbeatEvent,
  type PackageCompletedEvent,
  type PackageSkippedEvent,
  type PackageStartedEvent,
  type RunCompletedEvent,
  type RunEvent,
  type RunEventInput,
  type RunEventListener,
  type RunStartedEvent,
  RunEventEmitter,
  createEventEmitter,
} from './events.js'

export { createOutcome, interleavedOutput, joinStream, skippedOutcome } from './outcome.js'

export { DEFAULT_SKILL_CWD, SkillRegistry, appliesTo, defineSkill, missingCapabilities } from './registry.js'

export {
  DEFAULT_KILL_GRACE_MS,
  type ExecuteOptions,
  type PlannedCommand,
  Runner,
  type RunnerOptions,
  classifyOutput,
} from './runner.js'

export {
  formatCommand,
  renderCommand,
  renderTemplate,
  shellQuote,
  unknownPlaceholders,
} from './template.js'
