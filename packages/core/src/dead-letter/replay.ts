import { log, traceDeadLetter } from '../observability/axiom'
import type { DeadLetterQueue } from './types'

export type ReplayHandler = (event: unknown) => Promise<{ statusCode: number }>

export interface ReplaySummary {
  replayed: number
  deleted: number
  kept: number
  discarded: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Re-run every queued original event through `handler` until the queue has
 * nothing visible left.
 *
 * - replay answered below 500: deleted
 * - replay answered 500 or threw: kept for the next run
 * - body is not JSON: deleted, it can never succeed
 *
 * The handler must not write failures back into the same queue, or a
 * permanently failing event is received again in the same run.
 */
export async function replayDeadLetters(
  queue: DeadLetterQueue,
  handler: ReplayHandler,
  options: { batchSize?: number } = {}
): Promise<ReplaySummary> {
  const batchSize = options.batchSize ?? 10
  const summary: ReplaySummary = {
    replayed: 0,
    deleted: 0,
    kept: 0,
    discarded: 0,
  }

  for (;;) {
    const batch = await queue.receive(batchSize)
    if (batch.length === 0) break

    for (const message of batch) {
      let payload: unknown
      try {
        payload = JSON.parse(message.body)
      } catch (error) {
        await log('error', 'malformed dead letter discarded', {
          workflow: 'replay',
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        })
        await queue.delete(message.id)
        await traceDeadLetter({ operation: 'discard', success: true })
        summary.discarded++
        continue
      }

      const originalEvent =
        isRecord(payload) && payload.originalEvent
          ? payload.originalEvent
          : payload

      try {
        const outcome = await handler(originalEvent)
        summary.replayed++

        if (outcome.statusCode < 500) {
          await queue.delete(message.id)
          summary.deleted++
          await traceDeadLetter({ operation: 'replay', success: true })
        } else {
          summary.kept++
          await traceDeadLetter({
            operation: 'replay',
            success: false,
            error: `replay answered ${outcome.statusCode}`,
          })
        }
      } catch (error) {
        summary.kept++
        const reason = error instanceof Error ? error.message : String(error)
        await log('error', 'dead letter replay failed', {
          workflow: 'replay',
          messageId: message.id,
          error: reason,
        })
        await traceDeadLetter({
          operation: 'replay',
          success: false,
          error: reason,
        })
      }
    }
  }

  await log('info', 'dead letter replay finished', {
    workflow: 'replay',
    ...summary,
  })
  return summary
}
