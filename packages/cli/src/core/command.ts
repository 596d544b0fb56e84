import type { Command } from 'commander'
import { type CommandContext, createContext } from './context'
import { formatError, toCLIError } from './errors'
import type { OutputFormat } from './output'

interface GlobalOptions {
  format?: OutputFormat
  verbose?: boolean
  quiet?: boolean
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'text'
}

export function buildContext(command: Command): CommandContext {
  const opts: Record<string, unknown> = command.optsWithGlobals()
  const globals: GlobalOptions = {
    format: isOutputFormat(opts.format) ? opts.format : undefined,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  }
  return createContext(globals)
}

/**
 * Report a command failure and set the exit code. Nothing is rethrown:
 * commander has already finished parsing by the time an action fails.
 */
export function handleCommandError(
  ctx: CommandContext,
  error: unknown,
  message: string
): void {
  const cliError = toCLIError(error, message)
  ctx.output.error(formatError(cliError))
  if (ctx.verbose && cliError.debugMessage) {
    ctx.output.error(cliError.debugMessage)
  }
  process.exitCode = cliError.exitCode
}
