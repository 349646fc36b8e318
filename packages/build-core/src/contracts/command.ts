/**
 * Immutable description of one external command.
 */
export interface CommandSpec {
  /** Executable name or path, spawned without a shell. */
  readonly executable: string
  /** Ordered argument list passed to the executable. */
  readonly args: readonly string[]
}

/**
 * Captured outcome of a command that exited successfully.
 */
export interface CommandResult {
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** Process exit status, always 0 for a returned result. */
  readonly exitStatus: number
}

/**
 * Per-call execution options.
 */
export interface CommandExecutionOptions {
  /** Writes stdout followed by stderr into this file, replacing its content. */
  readonly outputRedirectPath?: string
}

/**
 * Executes one command to completion.
 *
 * Resolves with the captured output on exit status 0 and rejects with
 * `CommandExecutionError` on any other status.
 *
 * @param spec Command to execute.
 * @param options Execution options.
 * @returns Captured command result.
 */
export type CommandRunner = (
  spec: CommandSpec,
  options?: CommandExecutionOptions
) => Promise<CommandResult>

/**
 * Joins a command spec into a single diagnostic string.
 *
 * @param spec Command spec.
 * @returns Executable and arguments separated by spaces.
 */
export const formatCommand = (spec: CommandSpec): string => {
  return [spec.executable, ...spec.args].join(' ')
}
