/**
 * @wsk/engine - runs skills across a workspace.
 *
 * The engine is the primary interface for:
 * - Loading a workspace (wsk.toml or in-memory manifests)
 * - Planning a skill (order, applicability, concrete commands)
 * - Running a skill with bounded concurrency
 * - Rendering and writing run artifacts
 */

// Entry points
export {
  plan,
  run,
  type InvocationOptions,
  type PlanResult,
  type RunOptions,
  type RunResult,
} from './run.js'

// Workspace
export {
  createWorkspace,
  loadWorkspace,
  locateWorkspace,
  workspaceEnvironment,
  type LocateOptions,
  type Workspace,
  type WorkspaceDefinition,
  type WorkspaceEnvironment,
} from './workspace.js'

// Orchestration
export {
  CANCELLED_BEFORE_START,
  Orchestrator,
  type OrchestratorOptions,
  type OrchestratorResult,
  type OrchestratorState,
  type RetryPolicy,
} from './orchestrator.js'
export { planRun, type PlanOptions, type PlanStep, type RunPlan } from './plan.js'
export { aggregateStatus, summarize, type SummarizeInput } from './summary.js'

// Artifacts and reporting
export {
  IMPLEMENTATION_PLAN_FILE,
  RUN_SUMMARY_FILE,
  VERIFICATION_WALKTHROUGH_FILE,
  renderArtifacts,
  renderImplementationPlan,
  renderVerificationWalkthrough,
  writeArtifactFiles,
  writeArtifacts,
  type ArtifactPaths,
  type RunArtifacts,
} from './artifacts.js'
export {
  countOutcomes,
  formatDuration,
  formatJson,
  formatOutcome,
  formatStatusLine,
  formatText,
  summaryToJson,
  type OutcomeCounts,
} from './reporter.js'
