import { describe, expect, it, vi } from 'vitest'
import { createMemoryDeadLetterQueue } from './memory'
import { replayDeadLetters } from './replay'

vi.mock('../observability/axiom', () => ({
  log: vi.fn(),
  traceDeadLetter: vi.fn(),
}))

function stored(ticketId: string): string {
  return JSON.stringify({
    error: 'boom',
    originalEvent: { ticketId },
    failedAt: '2026-01-05T10:00:00.000Z',
  })
}

describe('replayDeadLetters', () => {
  it('deletes successes and malformed entries, keeps failures', async () => {
    const queue = createMemoryDeadLetterQueue({
      initialBodies: [
        stored('1'),
        'not json',
        stored('2'),
        JSON.stringify({ ticketId: '3' }),
      ],
    })
    const handler = vi.fn(async (event: unknown) => {
      const ticketId =
        typeof event === 'object' && event !== null && 'ticketId' in event
          ? event.ticketId
          : undefined
      if (ticketId === '3') throw new Error('still down')
      return { statusCode: ticketId === '1' ? 200 : 500 }
    })

    const summary = await replayDeadLetters(queue, handler)

    expect(summary).toEqual({ replayed: 2, deleted: 1, kept: 2, discarded: 1 })
    expect(handler.mock.calls.map(([event]) => event)).toEqual([
      { ticketId: '1' },
      { ticketId: '2' },
      { ticketId: '3' },
    ])
    expect(queue.messages.map((message) => message.body)).toEqual([
      stored('2'),
      JSON.stringify({ ticketId: '3' }),
    ])
  })

  it('deletes entries whose replay is rejected as invalid', async () => {
    const queue = createMemoryDeadLetterQueue({ initialBodies: [stored('9')] })

    await replayDeadLetters(queue, async () => ({ statusCode: 400 }))

    expect(queue.messages).toEqual([])
  })
})
