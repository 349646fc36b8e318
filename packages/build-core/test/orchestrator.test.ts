import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import {
  ArtifactRepository,
  BuildStepRunner,
  CommandExecutionError,
  createPipelineOrchestrator,
  type CleanupTask,
  type FailedPipelineOutcome,
  type NotificationResult,
  type NotificationService,
  type PipelineObserver,
  type PipelineRunResult,
  type PipelineState,
} from '../src/index.js'

import { createScriptedRunner, type ScriptedResponse } from './helpers/fakeRunner.js'
import { createCapturingLogger, LOG_LEVEL } from './helpers/logger.js'

const COMMIT = 'git commit -m Add latest build artifacts'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

interface HarnessOptions {
  /** Runner responses; receives the absolute build script path. */
  readonly responses?: (scriptPath: string) => Readonly<Record<string, ScriptedResponse>>
  readonly notificationResult?: NotificationResult
  readonly notificationError?: Error
  readonly extraCleanupTasks?: readonly CleanupTask[]
  readonly omitCleanupTasks?: boolean
}

const createHarness = async (options: HarnessOptions = {}) => {
  const workspace = await mkdtemp(resolve(tmpdir(), 'autobuild-orchestrator-'))
  createdDirectories.push(workspace)
  const scriptPath = resolve(workspace, 'build_script.sh')
  await writeFile(scriptPath, '#!/bin/sh\n', 'utf8')

  const { runner, calls } = createScriptedRunner(options.responses?.(scriptPath) ?? {})
  const { logger, lines } = createCapturingLogger()

  const notifiedOutcomes: FailedPipelineOutcome[] = []
  const notifier: NotificationService = {
    notifyFailure: async (outcome): Promise<NotificationResult> => {
      notifiedOutcomes.push(outcome)
      if (options.notificationError) {
        throw options.notificationError
      }

      return options.notificationResult ?? { delivered: true }
    },
  }

  let cleanupRuns = 0
  const countingTask: CleanupTask = {
    name: 'counter',
    run: (): void => {
      cleanupRuns += 1
    },
  }

  const transitions: string[] = []
  const completedRuns: PipelineRunResult[] = []
  const observer: PipelineObserver = {
    onTransition: (from: PipelineState, to: PipelineState): void => {
      transitions.push(`${from}->${to}`)
    },
    onRunComplete: (result): void => {
      completedRuns.push(result)
    },
  }

  const orchestrator = createPipelineOrchestrator({
    repository: new ArtifactRepository({ runner, logger }),
    buildStep: new BuildStepRunner({
      runner,
      logger,
      cwd: workspace,
      outputLogPath: resolve(workspace, 'build_script.log'),
    }),
    notifier,
    logger,
    buildScriptPath: 'build_script.sh',
    artifactDirectory: 'bin',
    cleanupTasks: options.omitCleanupTasks
      ? undefined
      : [...(options.extraCleanupTasks ?? []), countingTask],
    observers: [observer],
    now: (() => {
      let timestamp = 0
      return (): number => {
        timestamp += 10
        return timestamp
      }
    })(),
  })

  return {
    orchestrator,
    scriptPath,
    commands: (): string[] => calls.map((call) => call.command),
    lines,
    notifiedOutcomes,
    cleanupRuns: (): number => cleanupRuns,
    transitions,
    completedRuns,
  }
}

describe('PipelineOrchestrator', () => {
  it('succeeds without notification when pull, build and push succeed', async () => {
    const harness = await createHarness()

    const result = await harness.orchestrator.run()

    expect(result.outcome).toEqual({ status: 'succeeded' })
    expect(result.notification).toBeUndefined()
    expect(harness.notifiedOutcomes).toEqual([])
    expect(harness.cleanupRuns()).toBe(1)
    expect(harness.commands()).toEqual([
      'git pull',
      harness.scriptPath,
      'git stage bin',
      COMMIT,
      'git push',
    ])
    expect(result.states).toEqual([
      'idle',
      'pulling',
      'building',
      'pushing',
      'cleaning_up',
      'done',
    ])
    expect(result.startedAt).toBe(10)
    expect(result.finishedAt).toBe(20)
    expect(result.durationMs).toBe(10)
  })

  it('stops after a failed pull and notifies once', async () => {
    const harness = await createHarness({
      responses: () => ({
        'git pull': { exitStatus: 1, stderr: 'fatal: could not read from remote repository' },
      }),
    })

    const result = await harness.orchestrator.run()

    expect(harness.commands()).toEqual(['git pull'])
    expect(result.outcome).toMatchObject({
      status: 'failed',
      step: 'pull',
      error: { command: 'git pull', exitStatus: 1 },
    })
    expect(harness.notifiedOutcomes).toHaveLength(1)
    expect(harness.notifiedOutcomes[0]?.step).toBe('pull')
    expect(result.notification).toEqual({ delivered: true })
    expect(harness.cleanupRuns()).toBe(1)
    expect(harness.transitions).toEqual([
      'idle->pulling',
      'pulling->cleaning_up',
      'cleaning_up->done',
    ])
  })

  it('carries the build script stderr in the failed outcome and skips the push', async () => {
    const harness = await createHarness({
      responses: (scriptPath) => ({
        [scriptPath]: { exitStatus: 2, stderr: 'compile error' },
      }),
    })

    const result = await harness.orchestrator.run()

    expect(harness.commands()).toEqual(['git pull', harness.scriptPath])
    expect(result.outcome.status).toBe('failed')
    if (result.outcome.status !== 'failed') {
      return
    }
    expect(result.outcome.step).toBe('build')
    expect(result.outcome.error.stderr).toBe('compile error')
    expect(result.outcome.error.exitStatus).toBe(2)
    expect(harness.notifiedOutcomes).toHaveLength(1)
    expect(harness.cleanupRuns()).toBe(1)
  })

  it('treats an unchanged artifact tree as success and still pushes', async () => {
    const harness = await createHarness({
      responses: () => ({
        [COMMIT]: { exitStatus: 1, stdout: 'nothing added to commit' },
      }),
    })

    const result = await harness.orchestrator.run()

    expect(result.outcome).toEqual({ status: 'succeeded' })
    expect(harness.commands()).toContain('git push')
    expect(harness.notifiedOutcomes).toEqual([])
  })

  it('fails at the push step after a local commit without rolling back', async () => {
    const harness = await createHarness({
      responses: () => ({
        'git push': { exitStatus: 1, stderr: 'rejected: non-fast-forward' },
      }),
    })

    const result = await harness.orchestrator.run()

    expect(harness.commands()).toEqual([
      'git pull',
      harness.scriptPath,
      'git stage bin',
      COMMIT,
      'git push',
    ])
    expect(result.outcome).toMatchObject({
      status: 'failed',
      step: 'push',
      error: { command: 'git push', stderr: 'rejected: non-fast-forward' },
    })
    expect(harness.notifiedOutcomes).toHaveLength(1)
    expect(harness.cleanupRuns()).toBe(1)
  })

  it('fails at the push step when the commit fails for another reason', async () => {
    const harness = await createHarness({
      responses: () => ({
        [COMMIT]: { exitStatus: 128, stderr: 'fatal: empty ident name not allowed' },
      }),
    })

    const result = await harness.orchestrator.run()

    expect(result.outcome).toMatchObject({ status: 'failed', step: 'push' })
    expect(harness.commands()).not.toContain('git push')
  })

  it('logs the failure before notifying', async () => {
    const harness = await createHarness({
      responses: () => ({ 'git pull': { exitStatus: 1, stderr: 'network unreachable' } }),
    })

    await harness.orchestrator.run()

    const failureLine = harness.lines.find(
      (line) => line.level === LOG_LEVEL.error && line.step === 'pull'
    )
    expect(failureLine).toMatchObject({
      command: 'git pull',
      exitStatus: 1,
      stderr: 'network unreachable',
      msg: 'Exception occurred while running automated build: Command "git pull" failed with exit status 1',
    })
  })

  it('keeps the build failure when the notification cannot be delivered', async () => {
    const transportError = new Error('connect ECONNREFUSED')
    const harness = await createHarness({
      responses: () => ({ 'git pull': { exitStatus: 1 } }),
      notificationResult: { delivered: false, error: transportError },
    })

    const result = await harness.orchestrator.run()

    expect(result.outcome).toMatchObject({ status: 'failed', step: 'pull' })
    expect(result.notification).toEqual({ delivered: false, error: transportError })
    expect(harness.cleanupRuns()).toBe(1)
    expect(
      harness.lines.some(
        (line) =>
          line.level === LOG_LEVEL.error && line.msg === 'Failure notification could not be delivered'
      )
    ).toBe(true)
  })

  it('turns a rejecting notifier into an undelivered notification and still cleans up', async () => {
    const notifierError = new Error('smtp handshake refused')
    const harness = await createHarness({
      responses: () => ({ 'git pull': { exitStatus: 1, stderr: 'fatal: no remote' } }),
      notificationError: notifierError,
    })

    const result = await harness.orchestrator.run()

    expect(result.outcome).toMatchObject({ status: 'failed', step: 'pull' })
    expect(result.notification).toEqual({ delivered: false, error: notifierError })
    expect(harness.cleanupRuns()).toBe(1)
    expect(result.states[result.states.length - 1]).toBe('done')
    expect(
      harness.lines.some(
        (line) =>
          line.level === LOG_LEVEL.error && line.msg === 'Failure notification could not be delivered'
      )
    ).toBe(true)
  })

  it('logs that there is nothing to clean when no cleanup task is registered', async () => {
    const harness = await createHarness({ omitCleanupTasks: true })

    await harness.orchestrator.run()

    expect(harness.lines).toContainEqual({ level: LOG_LEVEL.info, msg: 'Cleanup: nothing to clean' })
  })

  it('keeps cleanup infallible when a task throws', async () => {
    const harness = await createHarness({
      extraCleanupTasks: [
        {
          name: 'temporary files',
          run: (): void => {
            throw new Error('EBUSY')
          },
        },
      ],
    })

    const result = await harness.orchestrator.run()

    expect(result.outcome).toEqual({ status: 'succeeded' })
    expect(harness.cleanupRuns()).toBe(1)
    expect(
      harness.lines.some(
        (line) => line.level === LOG_LEVEL.error && line.msg === 'Cleanup: temporary files failed'
      )
    ).toBe(true)
  })

  it('lets errors other than command failures escape without notification or cleanup', async () => {
    class UnreachableRepository extends ArtifactRepository {
      public override async pull(): Promise<void> {
        throw new TypeError('unexpected')
      }
    }

    const { runner } = createScriptedRunner()
    const { logger } = createCapturingLogger()
    let notifications = 0
    let cleanups = 0
    const orchestrator = createPipelineOrchestrator({
      repository: new UnreachableRepository({ runner, logger }),
      buildStep: new BuildStepRunner({
        runner,
        logger,
        cwd: tmpdir(),
        outputLogPath: resolve(tmpdir(), 'autobuild-unused.log'),
      }),
      notifier: {
        notifyFailure: async (): Promise<NotificationResult> => {
          notifications += 1
          return { delivered: true }
        },
      },
      logger,
      buildScriptPath: 'build_script.sh',
      artifactDirectory: 'bin',
      cleanupTasks: [
        {
          name: 'counter',
          run: (): void => {
            cleanups += 1
          },
        },
      ],
    })

    await expect(orchestrator.run()).rejects.toBeInstanceOf(TypeError)
    expect(notifications).toBe(0)
    expect(cleanups).toBe(0)
  })

  it('reports the final result to observers once', async () => {
    const harness = await createHarness()

    const result = await harness.orchestrator.run()

    expect(harness.completedRuns).toEqual([result])
  })

  it('creates a command failure with a readable message', () => {
    const error = new CommandExecutionError({
      command: 'git push',
      stdout: '',
      stderr: 'denied',
      exitStatus: 1,
    })

    expect(error.message).toBe('Command "git push" failed with exit status 1')
    expect(error.name).toBe('CommandExecutionError')
    expect(error.combinedOutput).toBe('\ndenied')
  })
})
