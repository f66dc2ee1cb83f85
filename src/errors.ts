/**
 * Error taxonomy.
 *
 * ConfigurationError aborts a run before any processing.
 * RemoteUnavailableError is always caught by the speller stage and degraded.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class RemoteUnavailableError extends Error {
  constructor(
    message: string,
    readonly service: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'RemoteUnavailableError'
  }
}
