import { randomUUID } from 'node:crypto'
import { appendFile, readFile, writeFile } from 'node:fs/promises'
import {
  type DeadLetterQueue,
  type StoredDeadLetter,
  type VisibilityOptions,
  createVisibilityTracker,
} from './types'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readLines(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf8')
    return content.split('\n').filter((line) => line.trim() !== '')
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }
}

/**
 * Lines carry no ids of their own. Each read is matched in order against the
 * previous snapshot so surviving lines keep their ids across a rewrite, even
 * when several lines are identical; unmatched lines get fresh ids.
 */
function assignIds(
  lines: string[],
  previous: StoredDeadLetter[]
): StoredDeadLetter[] {
  let cursor = 0
  return lines.map((body) => {
    for (let index = cursor; index < previous.length; index++) {
      const candidate = previous[index]
      if (candidate && candidate.body === body) {
        cursor = index + 1
        return candidate
      }
    }
    return { id: randomUUID(), body }
  })
}

/**
 * Dead-letter queue kept as a JSON-lines file, one entry per line.
 */
export function createFileDeadLetterQueue(
  path: string,
  options: VisibilityOptions = {}
): DeadLetterQueue {
  const visibility = createVisibilityTracker(options)
  let snapshot: StoredDeadLetter[] = []

  const read = async (): Promise<StoredDeadLetter[]> => {
    snapshot = assignIds(await readLines(path), snapshot)
    return snapshot
  }

  return {
    async send(entry) {
      await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf8')
    },

    async receive(max) {
      const messages = await read()
      const batch = messages
        .filter((message) => visibility.isVisible(message.id))
        .slice(0, max)
      for (const message of batch) visibility.hide(message.id)
      return batch
    },

    async delete(id) {
      const remaining = (await read()).filter((message) => message.id !== id)
      await writeFile(
        path,
        remaining.map((message) => `${message.body}\n`).join(''),
        'utf8'
      )
      snapshot = remaining
      visibility.forget(id)
    },
  }
}
