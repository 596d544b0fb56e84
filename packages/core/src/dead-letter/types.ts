/**
 * Dead-letter queue contracts
 *
 * Failed triage invocations are parked with their original event so they
 * can be replayed once the failing collaborator recovers.
 */

export interface DeadLetterEntry {
  error: string
  originalEvent: unknown
  failedAt: string
}

/** A received message. `body` is the raw stored text and may be malformed. */
export interface StoredDeadLetter {
  id: string
  body: string
}

/**
 * Queue semantics follow a visibility-timeout model: a received message is
 * hidden from further `receive` calls until the timeout passes or it is
 * deleted.
 */
export interface DeadLetterQueue {
  send(entry: DeadLetterEntry): Promise<void>
  receive(max: number): Promise<StoredDeadLetter[]>
  delete(id: string): Promise<void>
}

export interface VisibilityOptions {
  /** How long a received message stays hidden */
  visibilityTimeoutMs?: number
  now?: () => number
}

export const DEFAULT_VISIBILITY_TIMEOUT_MS = 30_000

/**
 * Tracks which message ids are currently hidden.
 */
export function createVisibilityTracker(options: VisibilityOptions = {}) {
  const timeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS
  const now = options.now ?? Date.now
  const hiddenUntil = new Map<string, number>()

  return {
    isVisible(id: string): boolean {
      const until = hiddenUntil.get(id)
      return until === undefined || until <= now()
    },
    hide(id: string): void {
      hiddenUntil.set(id, now() + timeoutMs)
    },
    forget(id: string): void {
      hiddenUntil.delete(id)
    },
  }
}
