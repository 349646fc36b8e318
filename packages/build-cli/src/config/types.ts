/**
 * Value accepted for a configuration key in JSON and TypeScript config files.
 */
export type ConfigValue = string | number

/**
 * SMTP settings group as written in a config file.
 */
export interface SmtpConfigGroup {
  readonly smtp_ssl_host: string
  readonly smtp_ssl_port: ConfigValue
  readonly sender: string
  readonly password: string
  readonly receiver: string
}

/**
 * Build settings group as written in a config file.
 */
export interface OtherConfigGroup {
  readonly build_script_file: string
  readonly binary_directory: string
}

/**
 * Config file shape shared by the INI, JSON and TypeScript formats.
 */
export interface AutobuildConfigFile {
  readonly 'smtp-conf': SmtpConfigGroup
  readonly 'other-conf': OtherConfigGroup
}

/**
 * Validated SMTP transport settings.
 */
export interface SmtpConfig {
  /** SMTP server host. */
  readonly host: string
  /** SMTP server port. */
  readonly port: number
  /** Sender address, also used as the login user. */
  readonly sender: string
  /** Sender credential. */
  readonly password: string
  /** Address receiving failure reports. */
  readonly receiver: string
}

/**
 * Validated build settings.
 */
export interface BuildConfig {
  /** Build script path, relative to the working directory or absolute. */
  readonly scriptFile: string
  /** Directory whose content is committed and pushed after a build. */
  readonly artifactDirectory: string
}

/**
 * Validated runtime configuration.
 */
export interface AutobuildConfig {
  readonly smtp: SmtpConfig
  readonly build: BuildConfig
}
