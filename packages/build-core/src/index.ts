export type {
  CommandExecutionOptions,
  CommandResult,
  CommandRunner,
  CommandSpec,
} from './contracts/command.js'
export { formatCommand } from './contracts/command.js'
export type {
  CleanupTask,
  FailedPipelineOutcome,
  NotificationResult,
  NotificationService,
  OrchestratorOptions,
  PipelineObserver,
  PipelineOutcome,
  PipelineRunResult,
  PipelineState,
  PipelineStepId,
} from './contracts/pipeline.js'
export { CommandExecutionError } from './errors.js'

export type { BuildStepRunnerOptions } from './build/buildStepRunner.js'
export { BuildStepRunner } from './build/buildStepRunner.js'
export type { NodeCommandRunnerOptions } from './execution/nodeCommandRunner.js'
export { createNodeCommandRunner } from './execution/nodeCommandRunner.js'
export type { ArtifactRepositoryOptions, CommitResult } from './repository/artifactRepository.js'
export {
  ArtifactRepository,
  DEFAULT_COMMIT_MESSAGE,
  isNothingToCommit,
  NOTHING_TO_COMMIT_MARKERS,
} from './repository/artifactRepository.js'
export { createPipelineOrchestrator, PipelineOrchestrator } from './runner/orchestrator.js'
