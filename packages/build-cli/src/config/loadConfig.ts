import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, extname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import ini from 'ini'
import ts from 'typescript'

import { ConfigurationError } from './configurationError.js'
import type { AutobuildConfig, BuildConfig, SmtpConfig } from './types.js'

const SMTP_GROUP = 'smtp-conf'
const OTHER_GROUP = 'other-conf'

/**
 * Loads and validates an autobuild config file.
 *
 * `.json` and `.ts` files are read as objects; every other extension is
 * parsed as INI with `[smtp-conf]` and `[other-conf]` sections.
 *
 * @param cwd Base working directory.
 * @param configPath Config file path, relative to `cwd` or absolute.
 * @returns Parsed config with the resolved file path.
 * @throws ConfigurationError when the file is missing or a required key is absent.
 */
export const loadAutobuildConfig = async (
  cwd: string,
  configPath: string
): Promise<{ config: AutobuildConfig; configFilePath: string }> => {
  const configFilePath = resolve(cwd, configPath)
  const source = await readConfigSource(configFilePath)
  const loadedConfig = await parseConfigSource(configFilePath, source)

  return {
    config: parseAutobuildConfig(loadedConfig),
    configFilePath,
  }
}

const readConfigSource = async (configFilePath: string): Promise<string> => {
  try {
    return await readFile(configFilePath, 'utf8')
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`File: ${configFilePath} not found`, { cause: error })
    }

    throw error
  }
}

const parseConfigSource = async (configFilePath: string, source: string): Promise<unknown> => {
  const extension = extname(configFilePath).toLowerCase()

  if (extension === '.json') {
    try {
      return JSON.parse(source) as unknown
    } catch (error: unknown) {
      throw new ConfigurationError(`Invalid JSON in ${configFilePath}`, { cause: error })
    }
  }

  if (extension === '.ts') {
    return await loadTypeScriptConfig(configFilePath, source)
  }

  return parseIniSource(source)
}

/**
 * Parses INI text with `key = value` or `key: value` lines. Comments are
 * whole lines starting with `;` or `#`; values are taken verbatim, so
 * `;`, `#` and `true` inside a value stay part of the string.
 */
const parseIniSource = (source: string): unknown => {
  const quoted = source.split(/\r?\n/u).map(quoteIniLine).join('\n')
  return restoreIniScalars(ini.parse(quoted))
}

const quoteIniLine = (line: string): string => {
  const trimmed = line.trim()
  if (!trimmed || trimmed.startsWith(';') || trimmed.startsWith('#')) {
    return ''
  }

  if (trimmed.startsWith('[')) {
    return trimmed
  }

  const delimiterIndex = trimmed.search(/[=:]/u)
  if (delimiterIndex <= 0) {
    return trimmed
  }

  const key = trimmed.slice(0, delimiterIndex).trim().toLowerCase()
  const value = trimmed.slice(delimiterIndex + 1).trim()
  return `${key} = ${JSON.stringify(value)}`
}

// ini still turns a quoted true, false or null into a literal
const restoreIniScalars = (value: unknown): unknown => {
  if (typeof value === 'boolean' || value === null) {
    return String(value)
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, restoreIniScalars(entry)])
    )
  }

  return value
}

const loadTypeScriptConfig = async (configFilePath: string, source: string): Promise<unknown> => {
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnostics(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new ConfigurationError(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'autobuild-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)

    if (isRecord(loadedModule) && loadedModule.default !== undefined) {
      return loadedModule.default
    }

    if (isRecord(loadedModule) && loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new ConfigurationError(
      `Config module ${configFilePath} must export default or named "config"`
    )
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const parseAutobuildConfig = (value: unknown): AutobuildConfig => {
  if (!isRecord(value)) {
    throw new ConfigurationError('Config must be an object')
  }

  const smtpGroup = parseGroup(value, SMTP_GROUP)
  const otherGroup = parseGroup(value, OTHER_GROUP)

  const smtp: SmtpConfig = {
    host: parseRequiredString(smtpGroup, 'smtp_ssl_host'),
    port: parsePort(smtpGroup, 'smtp_ssl_port'),
    sender: parseRequiredString(smtpGroup, 'sender'),
    password: parseRequiredString(smtpGroup, 'password'),
    receiver: parseRequiredString(smtpGroup, 'receiver'),
  }

  const build: BuildConfig = {
    scriptFile: parseRequiredString(otherGroup, 'build_script_file'),
    artifactDirectory: parseRequiredString(otherGroup, 'binary_directory'),
  }

  return { smtp, build }
}

const parseGroup = (value: Record<string, unknown>, group: string): Record<string, unknown> => {
  const groupValue = value[group]
  if (groupValue === undefined) {
    throw new ConfigurationError(`Configuration not found: ${group}`, { key: group })
  }

  if (!isRecord(groupValue)) {
    throw new ConfigurationError(`${group} must be a group of keys`, { key: group })
  }

  return groupValue
}

const parseRequiredString = (group: Record<string, unknown>, key: string): string => {
  const value = group[key]
  if (value === undefined || value === null) {
    throw new ConfigurationError(`Configuration not found: ${key}`, { key })
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError(`${key} must be a string`, { key })
  }

  const trimmed = value.trim()
  if (!trimmed) {
    throw new ConfigurationError(`Configuration not found: ${key}`, { key })
  }

  return trimmed
}

const parsePort = (group: Record<string, unknown>, key: string): number => {
  const value = group[key]
  if (value === undefined || value === null || value === '') {
    throw new ConfigurationError(`Configuration not found: ${key}`, { key })
  }

  const port = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${key} must be a port number between 1 and 65535`, { key })
  }

  return port
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
  return error instanceof Error && 'code' in error
}
