/**
 * Raised when the configuration file is missing, unreadable or incomplete.
 */
export class ConfigurationError extends Error {
  /** Missing or invalid key, when the error concerns one. */
  public readonly key?: string

  public constructor(message: string, options?: { key?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'ConfigurationError'
    this.key = options?.key
  }
}
