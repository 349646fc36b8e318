import { pino, type Logger } from 'pino'

/**
 * One parsed pino log line.
 */
export interface CapturedLogLine {
  readonly level: number
  readonly msg: string
  readonly [key: string]: unknown
}

/**
 * Creates a pino logger that records every line in memory.
 *
 * @returns Logger and the array it writes into.
 */
export const createCapturingLogger = (): { logger: Logger; lines: CapturedLogLine[] } => {
  const lines: CapturedLogLine[] = []
  const logger = pino(
    { base: null, timestamp: false },
    {
      write: (line: string): void => {
        lines.push(JSON.parse(line))
      },
    }
  )

  return { logger, lines }
}

/**
 * Pino numeric levels used in assertions.
 */
export const LOG_LEVEL = {
  info: 30,
  error: 50,
  fatal: 60,
} as const
