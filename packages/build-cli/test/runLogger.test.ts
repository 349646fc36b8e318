import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { createRunLogger } from '../src/logging/runLogger.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

describe('createRunLogger', () => {
  it('writes each line to the run log file and the console', async () => {
    const directory = await mkdtemp(resolve(tmpdir(), 'autobuild-logger-'))
    createdDirectories.push(directory)
    const logFilePath = resolve(directory, 'nested', 'run_build.log')
    const consoleLines: string[] = []

    const logger = createRunLogger(logFilePath, {
      console: {
        write: (line: string): void => {
          consoleLines.push(line)
        },
      },
    })
    logger.info('Pulling from repository')
    logger.debug('hidden below the info level')

    const fileLines = (await readFile(logFilePath, 'utf8')).trim().split('\n')
    expect(fileLines).toHaveLength(1)
    expect(consoleLines).toEqual([`${fileLines[0]}\n`])
    expect(JSON.parse(fileLines[0] ?? '')).toMatchObject({ level: 30, msg: 'Pulling from repository' })
    expect(JSON.parse(fileLines[0] ?? '')).toHaveProperty('time')
  })
})
