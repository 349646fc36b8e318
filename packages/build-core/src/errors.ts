/**
 * Raised when an external command exits with a non-zero status.
 */
export class CommandExecutionError extends Error {
  /** Executable and arguments joined by spaces. */
  public readonly command: string
  /** Captured stdout content. */
  public readonly stdout: string
  /** Captured stderr content. */
  public readonly stderr: string
  /** Exit status, or 128 plus the signal number for signal-terminated processes. */
  public readonly exitStatus: number
  /** Terminating signal when the process did not exit on its own. */
  public readonly signal: NodeJS.Signals | null

  public constructor(input: {
    command: string
    stdout: string
    stderr: string
    exitStatus: number
    signal?: NodeJS.Signals | null
  }) {
    super(`Command "${input.command}" failed with exit status ${input.exitStatus}`)
    this.name = 'CommandExecutionError'
    this.command = input.command
    this.stdout = input.stdout
    this.stderr = input.stderr
    this.exitStatus = input.exitStatus
    this.signal = input.signal ?? null
  }

  /**
   * Captured stdout followed by stderr, used for content-based failure checks.
   */
  public get combinedOutput(): string {
    return this.stderr ? `${this.stdout}\n${this.stderr}` : this.stdout
  }
}
