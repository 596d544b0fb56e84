import { randomUUID } from 'node:crypto'
import {
  type DeadLetterQueue,
  type StoredDeadLetter,
  type VisibilityOptions,
  createVisibilityTracker,
} from './types'

export interface MemoryDeadLetterQueue extends DeadLetterQueue {
  /** Everything still queued, visible or not */
  readonly messages: readonly StoredDeadLetter[]
}

/**
 * In-process queue. `initialBodies` seeds raw message bodies, including
 * malformed ones.
 */
export function createMemoryDeadLetterQueue(
  options: VisibilityOptions & { initialBodies?: string[] } = {}
): MemoryDeadLetterQueue {
  const visibility = createVisibilityTracker(options)
  let messages: StoredDeadLetter[] = (options.initialBodies ?? []).map(
    (body) => ({ id: randomUUID(), body })
  )

  return {
    get messages() {
      return messages
    },

    async send(entry) {
      messages = [...messages, { id: randomUUID(), body: JSON.stringify(entry) }]
    },

    async receive(max) {
      const batch = messages
        .filter((message) => visibility.isVisible(message.id))
        .slice(0, max)
      for (const message of batch) visibility.hide(message.id)
      return batch
    },

    async delete(id) {
      messages = messages.filter((message) => message.id !== id)
      visibility.forget(id)
    },
  }
}
