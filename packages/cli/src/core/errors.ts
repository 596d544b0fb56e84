import {
  CollaboratorError,
  LlmBackendError,
  TriageError,
} from '@desk-triage/core'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  config: 10,
  network: 11,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  debugMessage?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string
  debugMessage?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    debugMessage,
    cause,
  }: CLIErrorOptions) {
    super(debugMessage ?? userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
    this.debugMessage = debugMessage
  }
}

export class UsageError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.usage })
    this.name = 'UsageError'
  }
}

export class ConfigError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.config })
    this.name = 'ConfigError'
  }
}

export class NetworkError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.network })
    this.name = 'NetworkError'
  }
}

/**
 * Map an error thrown by a command into a CLIError. Configuration problems
 * and unreachable services get their own exit codes.
 */
export function toCLIError(error: unknown, fallbackMessage: string): CLIError {
  if (error instanceof CLIError) return error

  if (error instanceof TriageError && error.code === 'CONFIGURATION_ERROR') {
    return new ConfigError({
      userMessage: error.message,
      suggestion: 'Check the DESK_* and TEAM_* environment variables.',
      cause: error,
    })
  }

  if (error instanceof CollaboratorError || error instanceof LlmBackendError) {
    return new NetworkError({
      userMessage: error.message,
      suggestion: 'Check connectivity and credentials, then retry.',
      cause: error,
    })
  }

  return new CLIError({
    userMessage: fallbackMessage,
    debugMessage: error instanceof Error ? error.message : String(error),
    suggestion: 'Run again with --verbose for details.',
    cause: error,
  })
}

export function formatError(error: unknown): string {
  if (error instanceof CLIError) {
    if (error.suggestion) {
      return `${error.userMessage}\nSuggestion: ${error.suggestion}`
    }

    return error.userMessage
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred.'
  }

  return 'An unexpected error occurred.'
}
