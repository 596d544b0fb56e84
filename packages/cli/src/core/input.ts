import { readFile } from 'node:fs/promises'
import type { CommandContext } from './context'
import { UsageError } from './errors'

const STDIN_PATH = '-'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
  }
  return Buffer.concat(chunks).toString('utf8')
}

/**
 * Read a command's input from a file, or from stdin when the path is
 * omitted or `-`.
 */
export async function readInput(
  ctx: CommandContext,
  path?: string
): Promise<string> {
  if (!path || path === STDIN_PATH) return readStream(ctx.stdin)

  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      throw new UsageError({
        userMessage: `Input file not found: ${path}`,
        cause: error,
      })
    }
    throw error
  }
}

export async function readJsonInput(
  ctx: CommandContext,
  path?: string
): Promise<unknown> {
  const raw = await readInput(ctx, path)
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new UsageError({
      userMessage: `Input is not valid JSON: ${path ?? 'stdin'}`,
      suggestion: 'Pass a ticket event object, e.g. {"ticketId": 1, ...}',
      cause: error,
    })
  }
}
