import { mkdir } from 'node:fs/promises'
import { resolve } from 'node:path'

import {
  ArtifactRepository,
  BuildStepRunner,
  createNodeCommandRunner,
  createPipelineOrchestrator,
  type CommandRunner,
  type PipelineRunResult,
} from '@autobuild/core'
import type { DestinationStream, Logger } from 'pino'

import { ConfigurationError } from './config/configurationError.js'
import { loadAutobuildConfig } from './config/loadConfig.js'
import type { AutobuildConfig } from './config/types.js'
import {
  BUILD_SCRIPT_LOG_FILE_NAME,
  createRunLogFileName,
  pruneOldLogFiles,
} from './logging/logFiles.js'
import { createRunLogger } from './logging/runLogger.js'
import {
  createSmtpTransport,
  EmailNotifier,
  type MailTransport,
} from './notification/emailNotifier.js'

/**
 * Runtime options for one build run.
 */
export interface RunBuildOptions {
  /** Absolute working directory for git and the build script. */
  readonly cwd: string
  /** Config file path, relative to `cwd` or absolute. */
  readonly configPath: string
  /** Absolute log directory. */
  readonly logDirectory: string
  /** Command runner override; defaults to spawning real processes. */
  readonly runner?: CommandRunner
  /** Mail transport override; defaults to SMTP from the config. */
  readonly transport?: MailTransport
  /** Console sink override for the run logger. */
  readonly console?: DestinationStream
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Result of one build run.
 */
export interface RunBuildResult {
  /** Process exit code: 1 only for configuration errors. */
  readonly exitCode: 0 | 1
  /** Run log file path. */
  readonly logFilePath: string
  /** Pipeline result, absent when configuration failed to load. */
  readonly run?: PipelineRunResult
}

/**
 * Executes one unattended build run.
 *
 * A failed pipeline step still yields exit code 0 once it has been reported;
 * only configuration errors yield 1. Unexpected errors are logged and rethrown.
 *
 * @param options Run options.
 * @returns Run result.
 */
export const runBuild = async (options: RunBuildOptions): Promise<RunBuildResult> => {
  const now = options.now ?? Date.now

  await mkdir(options.logDirectory, { recursive: true })
  const logFilePath = resolve(options.logDirectory, createRunLogFileName(new Date(now())))
  const logger = createRunLogger(logFilePath, { console: options.console })
  logger.info('Setting up logger complete')

  try {
    await pruneOldLogFiles(options.logDirectory, { logger, now })

    const config = await loadConfigOrReport(options, logger)
    if (!config) {
      return { exitCode: 1, logFilePath }
    }

    const run = await runPipeline(options, config, logger, logFilePath)
    return { exitCode: 0, logFilePath, run }
  } catch (error: unknown) {
    logger.fatal({ err: error }, 'Exception occurred while running build')
    throw error
  }
}

const loadConfigOrReport = async (
  options: RunBuildOptions,
  logger: Logger
): Promise<AutobuildConfig | null> => {
  logger.info(`Loading configurations from file: ${options.configPath}`)

  try {
    const loaded = await loadAutobuildConfig(options.cwd, options.configPath)
    logger.info('Loading configurations complete')
    return loaded.config
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ err: error }, error.message)
      return null
    }

    throw error
  }
}

const runPipeline = async (
  options: RunBuildOptions,
  config: AutobuildConfig,
  logger: Logger,
  logFilePath: string
): Promise<PipelineRunResult> => {
  const runner = options.runner ?? createNodeCommandRunner({ logger, cwd: options.cwd })

  const orchestrator = createPipelineOrchestrator({
    repository: new ArtifactRepository({ runner, logger }),
    buildStep: new BuildStepRunner({
      runner,
      logger,
      cwd: options.cwd,
      outputLogPath: resolve(options.logDirectory, BUILD_SCRIPT_LOG_FILE_NAME),
    }),
    notifier: new EmailNotifier({
      smtp: config.smtp,
      transport: options.transport ?? createSmtpTransport(config.smtp),
      logger,
      logFilePath,
    }),
    logger,
    buildScriptPath: config.build.scriptFile,
    artifactDirectory: config.build.artifactDirectory,
    now: options.now,
  })

  return await orchestrator.run()
}
