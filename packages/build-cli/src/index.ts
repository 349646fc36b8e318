export type { CliOptions, CliRunOptions } from './cliOptions.js'
export { DEFAULT_LOG_DIRECTORY, getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  AutobuildConfig,
  AutobuildConfigFile,
  BuildConfig,
  ConfigValue,
  OtherConfigGroup,
  SmtpConfig,
  SmtpConfigGroup,
} from './config/types.js'
export { ConfigurationError } from './config/configurationError.js'
export { loadAutobuildConfig } from './config/loadConfig.js'

export {
  BUILD_SCRIPT_LOG_FILE_NAME,
  createRunLogFileName,
  isLogFileExpired,
  LOG_RETENTION_MS,
  pruneOldLogFiles,
  resolveCreationTime,
} from './logging/logFiles.js'
export type { RunLoggerOptions } from './logging/runLogger.js'
export { createRunLogger } from './logging/runLogger.js'

export type {
  EmailNotifierOptions,
  FailureReport,
  MailTransport,
} from './notification/emailNotifier.js'
export {
  composeFailureEmail,
  createSmtpTransport,
  EmailNotifier,
  FAILURE_SUBJECT,
  NotificationTransportError,
  stripNonAscii,
} from './notification/emailNotifier.js'

export type { RunBuildOptions, RunBuildResult } from './runBuild.js'
export { runBuild } from './runBuild.js'
