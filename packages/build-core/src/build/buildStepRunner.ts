import { chmod, stat } from 'node:fs/promises'
import { resolve } from 'node:path'

import type { Logger } from 'pino'

import type { CommandRunner } from '../contracts/command.js'

/**
 * Owner execute permission bit.
 */
const OWNER_EXECUTE = 0o100

/**
 * Options for the build step runner.
 */
export interface BuildStepRunnerOptions {
  /** Runner used to execute the build script. */
  readonly runner: CommandRunner
  /** Run logger. */
  readonly logger: Logger
  /** Directory relative script paths are resolved against. */
  readonly cwd: string
  /** File receiving the build script's own stdout and stderr. */
  readonly outputLogPath: string
}

/**
 * Runs the externally supplied build script.
 */
export class BuildStepRunner {
  private readonly options: BuildStepRunnerOptions

  /**
   * Creates a build step runner.
   *
   * @param options Runner options.
   */
  public constructor(options: BuildStepRunnerOptions) {
    this.options = options
  }

  /**
   * Makes the script owner-executable and runs it.
   *
   * @param scriptPath Script path, relative to the working directory or absolute.
   * @throws CommandExecutionError when the script exits non-zero.
   */
  public async run(scriptPath: string): Promise<void> {
    const absoluteScriptPath = resolve(this.options.cwd, scriptPath)
    await grantOwnerExecute(absoluteScriptPath)

    this.options.logger.info(`Running build script ${scriptPath}`)
    await this.options.runner(
      { executable: absoluteScriptPath, args: [] },
      { outputRedirectPath: this.options.outputLogPath }
    )
    this.options.logger.info('Build script completed successfully')
  }
}

const grantOwnerExecute = async (filePath: string): Promise<void> => {
  const stats = await stat(filePath)
  await chmod(filePath, (stats.mode & 0o7777) | OWNER_EXECUTE)
}
