import { resolve } from 'node:path'

/**
 * Log directory used when `--log-dir` is not given.
 */
export const DEFAULT_LOG_DIRECTORY = 'logs'

/**
 * Options for a pipeline run.
 */
export interface CliRunOptions {
  readonly help: false
  /** Absolute working directory; commands run here. */
  readonly cwd: string
  /** Config file path as given on the command line. */
  readonly configPath: string
  /** Absolute log directory. */
  readonly logDirectory: string
}

/**
 * Parsed CLI runtime options.
 */
export type CliOptions = CliRunOptions | { readonly help: true }

/**
 * Parses process arguments for the autobuild CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid or the config file flag is missing.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let logDirectory = DEFAULT_LOG_DIRECTORY
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      return { help: true }
    }

    const configFlag = matchFlag(argument, ['--config-file', '--config_file'])
    if (configFlag) {
      configPath = readFlagValue(argv, index, configFlag)
      index += configFlag.inline === undefined ? 1 : 0
      continue
    }

    const logDirectoryFlag = matchFlag(argument, ['--log-dir'])
    if (logDirectoryFlag) {
      logDirectory = readFlagValue(argv, index, logDirectoryFlag)
      index += logDirectoryFlag.inline === undefined ? 1 : 0
      continue
    }

    const cwdFlag = matchFlag(argument, ['--cwd'])
    if (cwdFlag) {
      cwd = resolve(baseCwd, readFlagValue(argv, index, cwdFlag))
      index += cwdFlag.inline === undefined ? 1 : 0
      continue
    }

    throw new Error(`Unknown argument: ${argument}`)
  }

  if (!configPath) {
    throw new Error('--config-file is required')
  }

  return {
    help: false,
    cwd,
    configPath,
    logDirectory: resolve(cwd, logDirectory),
  }
}

interface MatchedFlag {
  readonly name: string
  /** Value given with `=` syntax, if any. */
  readonly inline?: string
}

const matchFlag = (argument: string, names: readonly string[]): MatchedFlag | null => {
  for (const name of names) {
    if (argument === name) {
      return { name }
    }

    if (argument.startsWith(`${name}=`)) {
      return { name, inline: argument.slice(name.length + 1) }
    }
  }

  return null
}

const readFlagValue = (argv: readonly string[], index: number, flag: MatchedFlag): string => {
  const value = flag.inline ?? argv[index + 1]
  if (!value) {
    throw new Error(`${flag.name} requires a value`)
  }

  return value
}

/**
 * Returns help text for the autobuild CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: autobuild --config-file <path> [options]',
    '',
    'Pulls the repository, runs the build script, commits and pushes build artifacts,',
    'and emails the run log when a step fails.',
    '',
    'Options:',
    '  --config-file <path>  Configuration file (.ini, .json or .ts), required',
    `  --log-dir <path>      Log directory (default: ${DEFAULT_LOG_DIRECTORY})`,
    '  --cwd <path>          Working directory for git and the build script',
    '  -h, --help            Show this help',
  ].join('\n')
}
