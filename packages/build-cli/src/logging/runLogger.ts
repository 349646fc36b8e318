import pino, { type DestinationStream, type Logger } from 'pino'

/**
 * Options for the per-run logger.
 */
export interface RunLoggerOptions {
  /** Minimum level written to both sinks. */
  readonly level?: pino.Level
  /** Console sink, `process.stdout` unless overridden. */
  readonly console?: DestinationStream
}

/**
 * Creates the logger for one pipeline run.
 *
 * Lines go to the console and to the run log file. The file destination is
 * synchronous so the failure report can read a complete log mid-run.
 *
 * @param logFilePath Run log file path.
 * @param options Logger options.
 * @returns Pino logger.
 */
export const createRunLogger = (logFilePath: string, options: RunLoggerOptions = {}): Logger => {
  const level = options.level ?? 'info'
  const streams = pino.multistream([
    { level, stream: pino.destination({ dest: logFilePath, sync: true, mkdir: true }) },
    { level, stream: options.console ?? process.stdout },
  ])

  return pino(
    {
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    streams
  )
}
