import { type TriageConfig, loadTriageConfig } from '@desk-triage/core'
import {
  type OutputFormat,
  type OutputFormatter,
  type OutputStream,
  createOutputFormatter,
  resolveOutputFormat,
} from './output'

export interface CommandContext {
  stdin: NodeJS.ReadableStream
  stdout: OutputStream
  stderr: OutputStream
  signal: AbortSignal
  format: OutputFormat
  output: OutputFormatter
  verbose: boolean
  quiet: boolean
  /** Resolved lazily so commands that need no configuration never fail on it */
  loadConfig: () => TriageConfig
}

export function createContext(
  overrides: Partial<CommandContext> = {}
): CommandContext {
  const signal = overrides.signal ?? new AbortController().signal
  const stdout = overrides.stdout ?? process.stdout
  const stderr = overrides.stderr ?? process.stderr
  const verbose = overrides.verbose ?? false
  const quiet = overrides.quiet ?? false
  const format = resolveOutputFormat(overrides.format, stdout)
  const output =
    overrides.output ??
    createOutputFormatter({
      format,
      stdout,
      stderr,
      verbose,
      quiet,
    })

  let config: TriageConfig | undefined
  const loadConfig =
    overrides.loadConfig ??
    (() => {
      config ??= loadTriageConfig()
      return config
    })

  return {
    stdin: overrides.stdin ?? process.stdin,
    stdout,
    stderr,
    signal,
    format,
    output,
    verbose,
    quiet,
    loadConfig,
  }
}
