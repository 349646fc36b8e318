import type { Logger } from 'pino'

import type { CommandRunner } from '../contracts/command.js'
import { CommandExecutionError } from '../errors.js'

/**
 * Default message for artifact commits.
 */
export const DEFAULT_COMMIT_MESSAGE = 'Add latest build artifacts'

/**
 * Output fragments git prints when a commit has nothing to record. Git exits
 * with the same non-zero status as for real errors, so content is the only signal.
 */
export const NOTHING_TO_COMMIT_MARKERS: readonly string[] = [
  'nothing added to commit',
  'no changes added to commit',
]

/**
 * Structured result of the commit step.
 */
export type CommitResult = 'committed' | 'nothing_to_commit'

/**
 * Options for the artifact repository facade.
 */
export interface ArtifactRepositoryOptions {
  /** Runner used for every git invocation. */
  readonly runner: CommandRunner
  /** Run logger. */
  readonly logger: Logger
  /** Git executable, `git` unless overridden. */
  readonly gitExecutable?: string
  /** Commit message for artifact commits. */
  readonly commitMessage?: string
}

/**
 * Version-control facade for pulling sources and publishing build artifacts.
 */
export class ArtifactRepository {
  private readonly runner: CommandRunner
  private readonly logger: Logger
  private readonly git: string
  private readonly commitMessage: string

  /**
   * Creates an artifact repository facade.
   *
   * @param options Facade options.
   */
  public constructor(options: ArtifactRepositoryOptions) {
    this.runner = options.runner
    this.logger = options.logger
    this.git = options.gitExecutable ?? 'git'
    this.commitMessage = options.commitMessage ?? DEFAULT_COMMIT_MESSAGE
  }

  /**
   * Pulls from the tracked remote. Failures propagate unchanged.
   */
  public async pull(): Promise<void> {
    this.logger.info('Pulling from repository')
    await this.runner({ executable: this.git, args: ['pull'] })
    this.logger.info('Pulling from repository successful')
  }

  /**
   * Stages, commits and pushes the artifact directory.
   *
   * An unchanged artifact tree is not an error: the push still runs.
   *
   * @param artifactDirectory Directory holding build artifacts.
   */
  public async commitAndPush(artifactDirectory: string): Promise<void> {
    await this.stage(artifactDirectory)
    await this.commit()
    await this.push()
  }

  /**
   * Stages a path. Failures propagate unchanged.
   *
   * @param path Path to stage.
   */
  public async stage(path: string): Promise<void> {
    this.logger.info(`Staging build artifacts in ${path}`)
    await this.runner({ executable: this.git, args: ['stage', path] })
    this.logger.info(`Staging build artifacts in ${path} successful`)
  }

  /**
   * Commits staged changes.
   *
   * @returns `nothing_to_commit` when git reported no changes, `committed` otherwise.
   * @throws CommandExecutionError for any other commit failure.
   */
  public async commit(): Promise<CommitResult> {
    this.logger.info('Committing build artifacts')

    try {
      await this.runner({ executable: this.git, args: ['commit', '-m', this.commitMessage] })
    } catch (error: unknown) {
      if (error instanceof CommandExecutionError && isNothingToCommit(error)) {
        this.logger.info('No artifact changes since the last commit')
        return 'nothing_to_commit'
      }

      throw error
    }

    this.logger.info('Committing build artifacts successful')
    return 'committed'
  }

  /**
   * Pushes to the tracked remote. Failures propagate unchanged.
   */
  public async push(): Promise<void> {
    this.logger.info('Pushing build artifacts')
    await this.runner({ executable: this.git, args: ['push'] })
    this.logger.info('Pushing build artifacts successful')
  }
}

/**
 * Checks whether a failed commit only reported an unchanged tree.
 *
 * @param error Commit failure.
 * @returns True when the captured output contains a nothing-to-commit marker.
 */
export const isNothingToCommit = (error: CommandExecutionError): boolean => {
  const output = error.combinedOutput
  return NOTHING_TO_COMMIT_MARKERS.some((marker) => output.includes(marker))
}
