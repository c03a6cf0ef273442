export class TaskcheckError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'TaskcheckError'
  }
}

// -- Loading errors ----------------------------------------------------------

/** A task file could not be read, parsed, or mapped onto the task model. */
export class DocumentError extends TaskcheckError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('INVALID_DOCUMENT', `${filePath}: ${message}`, options)
    this.name = 'DocumentError'
  }
}

export class ConfigError extends TaskcheckError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}
