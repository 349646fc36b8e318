import { spawn } from 'node:child_process'
import { writeFile } from 'node:fs/promises'
import { constants } from 'node:os'

import type { Logger } from 'pino'

import type {
  CommandExecutionOptions,
  CommandResult,
  CommandRunner,
  CommandSpec,
} from '../contracts/command.js'
import { formatCommand } from '../contracts/command.js'
import { CommandExecutionError } from '../errors.js'

/**
 * Options for the Node.js command runner.
 */
export interface NodeCommandRunnerOptions {
  /** Logger receiving captured stdout (info) and stderr (error). */
  readonly logger: Logger
  /** Working directory for every spawned process. */
  readonly cwd: string
  /** Environment additions merged over the process environment. */
  readonly env?: NodeJS.ProcessEnv
}

interface CapturedProcess {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number | null
  readonly signal: NodeJS.Signals | null
}

/**
 * Creates a command runner backed by `child_process.spawn`.
 *
 * Commands are spawned without a shell. The returned promise settles once the
 * child has closed both output streams; there is no timeout.
 *
 * @param options Runner options.
 * @returns Command runner implementation.
 */
export const createNodeCommandRunner = (options: NodeCommandRunnerOptions): CommandRunner => {
  return async (
    spec: CommandSpec,
    executionOptions?: CommandExecutionOptions
  ): Promise<CommandResult> => {
    const captured = await spawnAndCapture(spec, options)

    if (captured.stdout) {
      options.logger.info(`\t${captured.stdout}`)
    }
    if (captured.stderr) {
      options.logger.error(`\t${captured.stderr}`)
    }

    if (executionOptions?.outputRedirectPath) {
      await writeFile(
        executionOptions.outputRedirectPath,
        `${captured.stdout}${captured.stderr}`,
        'utf8'
      )
    }

    const exitStatus = resolveExitStatus(captured.exitCode, captured.signal)
    if (exitStatus !== 0) {
      throw new CommandExecutionError({
        command: formatCommand(spec),
        stdout: captured.stdout,
        stderr: captured.stderr,
        exitStatus,
        signal: captured.signal,
      })
    }

    return {
      stdout: captured.stdout,
      stderr: captured.stderr,
      exitStatus,
    }
  }
}

const spawnAndCapture = (
  spec: CommandSpec,
  options: NodeCommandRunnerOptions
): Promise<CapturedProcess> => {
  return new Promise<CapturedProcess>((resolve, reject) => {
    const env: NodeJS.ProcessEnv = { ...process.env, ...options.env }
    const child = spawn(spec.executable, [...spec.args], {
      cwd: options.cwd,
      env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    child.stdout.setEncoding('utf8')
    child.stderr.setEncoding('utf8')

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })

    child.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })

    child.on('error', (spawnError: Error) => {
      if (settled) {
        return
      }

      settled = true
      reject(spawnError)
    })

    child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (settled) {
        return
      }

      settled = true
      resolve({ stdout, stderr, exitCode, signal })
    })
  })
}

const resolveExitStatus = (exitCode: number | null, signal: NodeJS.Signals | null): number => {
  if (exitCode !== null) {
    return exitCode
  }

  const signalEntry = Object.entries(constants.signals).find(([name]) => name === signal)
  return 128 + (signalEntry?.[1] ?? 0)
}
