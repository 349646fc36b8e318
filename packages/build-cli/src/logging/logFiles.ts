import { readdir, stat, unlink } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import { resolve } from 'node:path'

import type { Logger } from 'pino'

/**
 * File name of the build script's own output log.
 */
export const BUILD_SCRIPT_LOG_FILE_NAME = 'build_script.log'

/**
 * Age at which log files are removed.
 */
export const LOG_RETENTION_MS = 7 * 24 * 60 * 60 * 1000

/**
 * Builds the run log file name for a start time, in local time.
 *
 * @param startedAt Run start time.
 * @returns File name like `2026-10-18__22-05-09_build.log`.
 */
export const createRunLogFileName = (startedAt: Date): string => {
  const date = [
    startedAt.getFullYear(),
    pad(startedAt.getMonth() + 1),
    pad(startedAt.getDate()),
  ].join('-')
  const time = [
    pad(startedAt.getHours()),
    pad(startedAt.getMinutes()),
    pad(startedAt.getSeconds()),
  ].join('-')

  return `${date}__${time}_build.log`
}

/**
 * Checks whether a log file is old enough to delete. The boundary is inclusive.
 *
 * @param createdAtMs File creation time in Unix milliseconds.
 * @param nowMs Current time in Unix milliseconds.
 * @returns True when the file is at least seven days old.
 */
export const isLogFileExpired = (createdAtMs: number, nowMs: number): boolean => {
  return nowMs - createdAtMs >= LOG_RETENTION_MS
}

/**
 * Creation time of a file, falling back to its change time where the
 * filesystem reports no birth time.
 *
 * @param stats File stats.
 * @returns Creation time in Unix milliseconds.
 */
export const resolveCreationTime = (stats: Pick<Stats, 'birthtimeMs' | 'ctimeMs'>): number => {
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs
}

/**
 * Deletes log files that reached the retention age.
 *
 * @param logDirectory Directory holding run logs.
 * @param options Logger and time source.
 * @returns Absolute paths of removed files.
 */
export const pruneOldLogFiles = async (
  logDirectory: string,
  options: { logger: Logger; now?: () => number }
): Promise<string[]> => {
  const nowMs = (options.now ?? Date.now)()
  const entries = await readdir(logDirectory, { withFileTypes: true })
  const removed: string[] = []

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue
    }

    const filePath = resolve(logDirectory, entry.name)
    const createdAtMs = resolveCreationTime(await stat(filePath))
    if (!isLogFileExpired(createdAtMs, nowMs)) {
      continue
    }

    await unlink(filePath)
    removed.push(filePath)
    options.logger.info(`Removed old log file: ${filePath}`)
  }

  return removed
}

const pad = (value: number): string => {
  return String(value).padStart(2, '0')
}
