import type {
  CleanupTask,
  FailedPipelineOutcome,
  NotificationResult,
  OrchestratorOptions,
  PipelineObserver,
  PipelineOutcome,
  PipelineRunResult,
  PipelineState,
  PipelineStepId,
} from '../contracts/pipeline.js'
import { CommandExecutionError } from '../errors.js'

interface PipelineStepDefinition {
  readonly id: PipelineStepId
  readonly state: PipelineState
  readonly execute: () => Promise<void>
}

/**
 * Sequences pull, build and push, then cleans up and reports failures.
 *
 * Only `CommandExecutionError` from the three steps turns into a failed
 * outcome. Any other error escapes `run()` without notification or cleanup.
 */
export class PipelineOrchestrator {
  private readonly options: Required<
    Pick<OrchestratorOptions, 'cleanupTasks' | 'observers' | 'now'>
  > &
    Omit<OrchestratorOptions, 'cleanupTasks' | 'observers' | 'now'>

  /**
   * Creates a pipeline orchestrator.
   *
   * @param options Runtime options.
   */
  public constructor(options: OrchestratorOptions) {
    this.options = {
      ...options,
      cleanupTasks: options.cleanupTasks ?? [],
      observers: options.observers ?? [],
      now: options.now ?? Date.now,
    }
  }

  /**
   * Executes one pipeline run.
   *
   * @returns Final run result.
   */
  public async run(): Promise<PipelineRunResult> {
    const startedAt = this.options.now()
    const states: PipelineState[] = ['idle']

    const enter = async (next: PipelineState): Promise<void> => {
      const previous = states[states.length - 1] ?? 'idle'
      states.push(next)
      await this.emitTransition(previous, next)
    }

    const outcome = await this.executeSteps(enter)

    await enter('cleaning_up')

    let notification: NotificationResult | undefined
    if (outcome.status === 'failed') {
      this.logFailure(outcome)
      notification = await this.notify(outcome)
    }

    await this.cleanup()
    await enter('done')

    const finishedAt = this.options.now()
    const result: PipelineRunResult = {
      outcome,
      ...(notification ? { notification } : {}),
      states,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    }

    this.options.logger.info(
      outcome.status === 'succeeded'
        ? 'Automated build completed successfully'
        : `Automated build failed at the ${outcome.step} step`
    )

    await this.emitRunComplete(result)

    return result
  }

  private async executeSteps(
    enter: (next: PipelineState) => Promise<void>
  ): Promise<PipelineOutcome> {
    const { repository, buildStep, buildScriptPath, artifactDirectory } = this.options
    const steps: readonly PipelineStepDefinition[] = [
      { id: 'pull', state: 'pulling', execute: () => repository.pull() },
      { id: 'build', state: 'building', execute: () => buildStep.run(buildScriptPath) },
      {
        id: 'push',
        state: 'pushing',
        execute: () => repository.commitAndPush(artifactDirectory),
      },
    ]

    for (const step of steps) {
      await enter(step.state)

      try {
        await step.execute()
      } catch (error: unknown) {
        if (error instanceof CommandExecutionError) {
          return { status: 'failed', step: step.id, error }
        }

        throw error
      }
    }

    return { status: 'succeeded' }
  }

  private logFailure(outcome: FailedPipelineOutcome): void {
    const { error } = outcome
    this.options.logger.error(
      {
        step: outcome.step,
        command: error.command,
        exitStatus: error.exitStatus,
        stderr: error.stderr,
      },
      `Exception occurred while running automated build: ${error.message}`
    )
  }

  private async notify(outcome: FailedPipelineOutcome): Promise<NotificationResult> {
    const notification = await this.options.notifier.notifyFailure(outcome).catch(
      (error: unknown): NotificationResult => ({
        delivered: false,
        error:
          error instanceof Error
            ? error
            : new Error('Failure notification rejected', { cause: error }),
      })
    )

    if (!notification.delivered) {
      this.options.logger.error(
        { err: notification.error },
        'Failure notification could not be delivered'
      )
    }

    return notification
  }

  private async cleanup(): Promise<void> {
    const tasks = this.options.cleanupTasks
    if (tasks.length === 0) {
      this.options.logger.info('Cleanup: nothing to clean')
      return
    }

    for (const task of tasks) {
      await this.runCleanupTask(task)
    }
  }

  private async runCleanupTask(task: CleanupTask): Promise<void> {
    try {
      await task.run()
      this.options.logger.info(`Cleanup: ${task.name} done`)
    } catch (error: unknown) {
      this.options.logger.error({ err: error }, `Cleanup: ${task.name} failed`)
    }
  }

  private async emitTransition(from: PipelineState, to: PipelineState): Promise<void> {
    for (const observer of this.options.observers) {
      await observer.onTransition?.(from, to)
    }
  }

  private async emitRunComplete(result: PipelineRunResult): Promise<void> {
    for (const observer of this.options.observers) {
      await observer.onRunComplete?.(result)
    }
  }
}

/**
 * Creates a pipeline orchestrator instance.
 *
 * @param options Runtime options.
 * @returns Pipeline orchestrator.
 */
export const createPipelineOrchestrator = (options: OrchestratorOptions): PipelineOrchestrator => {
  return new PipelineOrchestrator(options)
}
