import { chmod, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { BuildStepRunner, CommandExecutionError, createNodeCommandRunner } from '../src/index.js'

import { createScriptedRunner } from './helpers/fakeRunner.js'
import { createCapturingLogger } from './helpers/logger.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createWorkspace = async (): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'autobuild-build-step-'))
  createdDirectories.push(directory)
  return directory
}

const writeScript = async (path: string, content: string, mode: number): Promise<void> => {
  await writeFile(path, content, 'utf8')
  await chmod(path, mode)
}

describe('BuildStepRunner', () => {
  it('grants owner execute permission and runs the script with redirected output', async () => {
    const workspace = await createWorkspace()
    const scriptPath = resolve(workspace, 'build_script.sh')
    const outputLogPath = resolve(workspace, 'build_script.log')
    await writeScript(scriptPath, '#!/bin/sh\nexit 0\n', 0o644)

    const { runner, calls } = createScriptedRunner()
    const { logger } = createCapturingLogger()
    const buildStep = new BuildStepRunner({ runner, logger, cwd: workspace, outputLogPath })

    await buildStep.run('build_script.sh')

    const stats = await stat(scriptPath)
    expect(stats.mode & 0o777).toBe(0o744)
    expect(calls).toEqual([{ command: scriptPath, options: { outputRedirectPath: outputLogPath } }])
  })

  it('keeps permissions unchanged when the execute bit is already set', async () => {
    const workspace = await createWorkspace()
    const scriptPath = resolve(workspace, 'build_script.sh')
    await writeScript(scriptPath, '#!/bin/sh\nexit 0\n', 0o755)

    const { runner } = createScriptedRunner()
    const { logger } = createCapturingLogger()
    const buildStep = new BuildStepRunner({
      runner,
      logger,
      cwd: workspace,
      outputLogPath: resolve(workspace, 'build_script.log'),
    })

    await buildStep.run(scriptPath)

    const stats = await stat(scriptPath)
    expect(stats.mode & 0o777).toBe(0o755)
  })

  it('fails with the script stderr and records it in the build log', async () => {
    const workspace = await createWorkspace()
    const outputLogPath = resolve(workspace, 'build_script.log')
    await writeScript(
      resolve(workspace, 'build_script.sh'),
      '#!/bin/sh\necho "compile error" 1>&2\nexit 2\n',
      0o644
    )

    const { logger } = createCapturingLogger()
    const buildStep = new BuildStepRunner({
      runner: createNodeCommandRunner({ logger, cwd: workspace }),
      logger,
      cwd: workspace,
      outputLogPath,
    })

    const error = await buildStep.run('build_script.sh').catch((failure: unknown) => failure)

    expect(error).toBeInstanceOf(CommandExecutionError)
    expect(error).toMatchObject({ exitStatus: 2, stderr: 'compile error\n', stdout: '' })
    expect(await readFile(outputLogPath, 'utf8')).toBe('compile error\n')
  })

  it('does not run the script when it does not exist', async () => {
    const workspace = await createWorkspace()
    const { runner, calls } = createScriptedRunner()
    const { logger } = createCapturingLogger()
    const buildStep = new BuildStepRunner({
      runner,
      logger,
      cwd: workspace,
      outputLogPath: resolve(workspace, 'build_script.log'),
    })

    await expect(buildStep.run('missing.sh')).rejects.toMatchObject({ code: 'ENOENT' })
    expect(calls).toEqual([])
  })
})
