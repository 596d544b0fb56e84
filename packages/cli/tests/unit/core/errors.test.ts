import {
  CollaboratorError,
  ConfigurationError,
  LlmBackendError,
} from '@desk-triage/core'
import { describe, expect, it } from 'vitest'
import {
  CLIError,
  ConfigError,
  EXIT_CODES,
  NetworkError,
  UsageError,
  formatError,
  toCLIError,
} from '../../../src/core/errors'

describe('CLIError', () => {
  it('stores message metadata', () => {
    const error = new CLIError({
      userMessage: 'Something went wrong',
      exitCode: EXIT_CODES.usage,
      suggestion: 'Try again',
      debugMessage: 'Debug details',
    })

    expect(error.name).toBe('CLIError')
    expect(error.userMessage).toBe('Something went wrong')
    expect(error.exitCode).toBe(EXIT_CODES.usage)
    expect(error.suggestion).toBe('Try again')
    expect(error.debugMessage).toBe('Debug details')
    expect(error.message).toBe('Debug details')
  })
})

describe('CLIError subclasses', () => {
  const cases = [
    { label: 'UsageError', ErrorClass: UsageError, exitCode: EXIT_CODES.usage },
    {
      label: 'ConfigError',
      ErrorClass: ConfigError,
      exitCode: EXIT_CODES.config,
    },
    {
      label: 'NetworkError',
      ErrorClass: NetworkError,
      exitCode: EXIT_CODES.network,
    },
  ]

  for (const testCase of cases) {
    it(`sets ${testCase.label} exit code`, () => {
      const error = new testCase.ErrorClass({
        userMessage: 'Failure',
      })

      expect(error.exitCode).toBe(testCase.exitCode)
      expect(error.name).toBe(testCase.label)
    })
  }
})

describe('toCLIError', () => {
  it('passes CLI errors through', () => {
    const error = new UsageError({ userMessage: 'Bad input' })
    expect(toCLIError(error, 'fallback')).toBe(error)
  })

  it('maps configuration errors to the config exit code', () => {
    const error = toCLIError(
      new ConfigurationError({ message: 'DESK_TEAM_IDS must be JSON' }),
      'fallback'
    )

    expect(error).toBeInstanceOf(ConfigError)
    expect(error.userMessage).toBe('DESK_TEAM_IDS must be JSON')
    expect(error.exitCode).toBe(EXIT_CODES.config)
  })

  it('maps collaborator and model failures to the network exit code', () => {
    const helpdesk = toCLIError(
      new CollaboratorError('helpdesk', { message: 'helpdesk assign failed' }),
      'fallback'
    )
    const llm = toCLIError(
      new LlmBackendError(3, { message: 'LLM call failed after 3 attempts' }),
      'fallback'
    )

    expect(helpdesk).toBeInstanceOf(NetworkError)
    expect(helpdesk.userMessage).toBe('helpdesk assign failed')
    expect(llm.exitCode).toBe(EXIT_CODES.network)
  })

  it('wraps anything else with the fallback message', () => {
    const error = toCLIError(new Error('socket hang up'), 'Failed to triage.')

    expect(error.userMessage).toBe('Failed to triage.')
    expect(error.debugMessage).toBe('socket hang up')
    expect(error.exitCode).toBe(EXIT_CODES.error)
  })
})

describe('formatError', () => {
  it('renders user message and suggestion', () => {
    const error = new CLIError({
      userMessage: 'Missing configuration',
      exitCode: EXIT_CODES.config,
      suggestion: 'Set DESK_ORG_ID',
    })

    expect(formatError(error)).toBe(
      'Missing configuration\nSuggestion: Set DESK_ORG_ID'
    )
  })

  it('handles unknown errors', () => {
    expect(formatError(new Error('Boom'))).toBe('Boom')
    expect(formatError('boom')).toBe('An unexpected error occurred.')
  })
})
