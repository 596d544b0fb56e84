import { inspect } from 'node:util'

export type OutputFormat = 'json' | 'text'

/** Anything the formatter can write lines to */
export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean }

export interface OutputFormatter {
  data(value: unknown): void
  message(text: string): void
  success(text: string): void
  warn(text: string): void
  error(text: string): void
  progress(label: string): void
}

export interface OutputFormatterConfig {
  format?: OutputFormat
  stdout: OutputStream
  stderr: OutputStream
  verbose?: boolean
  quiet?: boolean
}

const writeLine = (stream: OutputStream, line: string): void => {
  stream.write(`${line}\n`)
}

const formatHumanReadable = (value: unknown): string => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return inspect(value, { depth: null, colors: false })
}

export const resolveOutputFormat = (
  format: OutputFormat | undefined,
  stdout: OutputStream
): OutputFormat => {
  if (format) return format
  return stdout.isTTY ? 'text' : 'json'
}

export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => {
  const format = resolveOutputFormat(config.format, config.stdout)
  return format === 'json'
    ? new JsonFormatter(config)
    : new TextFormatter(config)
}

class BaseFormatter {
  protected stdout: OutputStream
  protected stderr: OutputStream
  protected verbose: boolean
  protected quiet: boolean

  constructor(config: OutputFormatterConfig) {
    this.stdout = config.stdout
    this.stderr = config.stderr
    this.verbose = config.verbose ?? false
    this.quiet = config.quiet ?? false
  }

  protected writeStdout(line: string): void {
    writeLine(this.stdout, line)
  }

  protected writeStderr(line: string): void {
    writeLine(this.stderr, line)
  }

  protected shouldWriteMessage(): boolean {
    return !this.quiet
  }

  protected shouldWriteProgress(): boolean {
    return this.verbose && !this.quiet
  }
}

export class JsonFormatter extends BaseFormatter implements OutputFormatter {
  data(value: unknown): void {
    this.writeStdout(JSON.stringify(value))
  }

  message(text: string): void {
    if (this.shouldWriteMessage()) {
      this.writeStderr(JSON.stringify({ level: 'info', message: text }))
    }
  }

  success(text: string): void {
    if (this.shouldWriteMessage()) {
      this.writeStderr(JSON.stringify({ level: 'success', message: text }))
    }
  }

  warn(text: string): void {
    if (this.shouldWriteMessage()) {
      this.writeStderr(JSON.stringify({ level: 'warn', message: text }))
    }
  }

  error(text: string): void {
    this.writeStderr(JSON.stringify({ level: 'error', message: text }))
  }

  progress(label: string): void {
    if (this.shouldWriteProgress()) {
      this.writeStderr(JSON.stringify({ level: 'progress', message: label }))
    }
  }
}

export class TextFormatter extends BaseFormatter implements OutputFormatter {
  data(value: unknown): void {
    this.writeStdout(formatHumanReadable(value))
  }

  message(text: string): void {
    if (this.shouldWriteMessage()) this.writeStderr(text)
  }

  success(text: string): void {
    if (this.shouldWriteMessage()) this.writeStderr(`SUCCESS: ${text}`)
  }

  warn(text: string): void {
    if (this.shouldWriteMessage()) this.writeStderr(`WARN: ${text}`)
  }

  error(text: string): void {
    this.writeStderr(`ERROR: ${text}`)
  }

  progress(label: string): void {
    if (this.shouldWriteProgress()) this.writeStderr(label)
  }
}
