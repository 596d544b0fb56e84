export interface TriageErrorOptions {
  message: string
  statusCode?: number
  details?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error for everything the triage pipeline raises on purpose.
 * `statusCode` is what the dispatcher answers with when the error reaches
 * its outer boundary.
 */
export class TriageError extends Error {
  readonly statusCode: number
  readonly code: string
  readonly details: Record<string, unknown>
  readonly timestamp: string

  constructor(
    code: string,
    { message, statusCode = 500, details = {}, cause }: TriageErrorOptions
  ) {
    super(message)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'TriageError'
    this.code = code
    this.statusCode = statusCode
    this.details = details
    this.timestamp = new Date().toISOString()
  }

  toJSON(): Record<string, unknown> {
    return {
      errorType: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    }
  }
}

/** Malformed inbound payload. Surfaces as 400 with no side effects. */
export class ValidationError extends TriageError {
  constructor(options: Omit<TriageErrorOptions, 'statusCode'>) {
    super('VALIDATION_ERROR', { ...options, statusCode: 400 })
    this.name = 'ValidationError'
  }
}

export class ConfigurationError extends TriageError {
  constructor(options: Omit<TriageErrorOptions, 'statusCode'>) {
    super('CONFIGURATION_ERROR', { ...options, statusCode: 500 })
    this.name = 'ConfigurationError'
  }
}

/** An external collaborator (helpdesk, webhook, store) failed. */
export class CollaboratorError extends TriageError {
  readonly collaborator: string

  constructor(
    collaborator: string,
    options: Omit<TriageErrorOptions, 'statusCode'>
  ) {
    super('COLLABORATOR_ERROR', {
      ...options,
      statusCode: 500,
      details: { collaborator, ...options.details },
    })
    this.name = 'CollaboratorError'
    this.collaborator = collaborator
  }
}

export class LlmBackendError extends TriageError {
  readonly attempts: number

  constructor(attempts: number, options: Omit<TriageErrorOptions, 'statusCode'>) {
    super('LLM_BACKEND_ERROR', {
      ...options,
      statusCode: 500,
      details: { attempts, ...options.details },
    })
    this.name = 'LlmBackendError'
    this.attempts = attempts
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
