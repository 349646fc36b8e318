import type { Logger } from 'pino'

import type { ArtifactRepository } from '../repository/artifactRepository.js'
import type { BuildStepRunner } from '../build/buildStepRunner.js'
import type { CommandExecutionError } from '../errors.js'

/**
 * States visited by one pipeline run.
 */
export type PipelineState = 'idle' | 'pulling' | 'building' | 'pushing' | 'cleaning_up' | 'done'

/**
 * Pipeline steps that may fail a run.
 */
export type PipelineStepId = 'pull' | 'build' | 'push'

/**
 * Final outcome of a pipeline run.
 */
export type PipelineOutcome =
  | { readonly status: 'succeeded' }
  | {
      readonly status: 'failed'
      /** Step whose command failed. */
      readonly step: PipelineStepId
      /** Command failure that ended the run. */
      readonly error: CommandExecutionError
    }

/**
 * Failed variant of the pipeline outcome.
 */
export type FailedPipelineOutcome = Extract<PipelineOutcome, { status: 'failed' }>

/**
 * Result of a notification attempt. Delivery failures are values, not exceptions.
 */
export type NotificationResult =
  | { readonly delivered: true }
  | { readonly delivered: false; readonly error: Error }

/**
 * Sends a report about a failed run.
 */
export interface NotificationService {
  /**
   * Reports a failed run. Must resolve, never reject, on transport failures.
   *
   * @param outcome Failed outcome of the current run.
   * @returns Delivery result.
   */
  notifyFailure(outcome: FailedPipelineOutcome): Promise<NotificationResult>
}

/**
 * Work performed once in the terminal cleanup phase.
 */
export interface CleanupTask {
  /** Name used in log lines. */
  readonly name: string
  /** Releases whatever the task owns. */
  run(): Promise<void> | void
}

/**
 * Final data for one pipeline run.
 */
export interface PipelineRunResult {
  /** Outcome of the pull, build and push steps. */
  readonly outcome: PipelineOutcome
  /** Notification result, present only when the outcome is failed. */
  readonly notification?: NotificationResult
  /** States in the order they were entered. */
  readonly states: readonly PipelineState[]
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total run duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Event hooks for pipeline run reporting.
 */
export interface PipelineObserver {
  /**
   * Called on every state transition.
   *
   * @param from State being left.
   * @param to State being entered.
   */
  onTransition?(from: PipelineState, to: PipelineState): Promise<void> | void

  /**
   * Called once after the run reaches `done`.
   *
   * @param result Pipeline run result.
   */
  onRunComplete?(result: PipelineRunResult): Promise<void> | void
}

/**
 * Runtime options used by the orchestrator.
 */
export interface OrchestratorOptions {
  /** Version-control facade for pull and push. */
  readonly repository: ArtifactRepository
  /** Facade running the build script. */
  readonly buildStep: BuildStepRunner
  /** Receives the failed outcome of a run. */
  readonly notifier: NotificationService
  /** Run logger. */
  readonly logger: Logger
  /** Build script path, relative to the working directory or absolute. */
  readonly buildScriptPath: string
  /** Directory holding the artifacts to commit and push. */
  readonly artifactDirectory: string
  /** Tasks executed once during cleanup. */
  readonly cleanupTasks?: readonly CleanupTask[]
  /** Optional observers for lifecycle hooks. */
  readonly observers?: readonly PipelineObserver[]
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}
