/**
 * Dispatcher tests against in-process collaborators. Each case follows one
 * ticket through to its HTTP-style outcome.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMemoryDeadLetterQueue } from '../../dead-letter/memory'
import { log, traceRouting } from '../../observability/axiom'
import { LOW_CONFIDENCE_NOTICE, runTriage } from '../index'
import type { TriageCollaborators } from '../types'
import { createFakes } from './fakes'

vi.mock('../../observability/axiom', () => ({
  log: vi.fn(),
  traceClassification: vi.fn(),
  traceRouting: vi.fn(),
  traceDeadLetter: vi.fn(),
  traceStep: vi.fn((_context: unknown, fn: () => Promise<unknown>) => fn()),
}))

const options = {
  operationsTeam: 'Ops',
  now: () => new Date('2026-01-02T03:04:05.000Z'),
}

const ACCOUNT_LINE = 'AWS Account: 123456789012'

function ticketEvent(overrides: Record<string, unknown> = {}) {
  return {
    ticketId: 7,
    ticketSubject: 'ALARM: High CPU on web-1',
    ticketBody: `${ACCOUNT_LINE}\nCPU usage is high on the web server.`,
    fromEmail: '"Jane" <Jane@Customer.example>',
    toEmail: ['support@example.com'],
    ccEmail: null,
    ...overrides,
  }
}

describe('runTriage', () => {
  let fakes: ReturnType<typeof createFakes>
  let collaborators: TriageCollaborators

  beforeEach(() => {
    vi.clearAllMocks()
    fakes = createFakes()
    collaborators = fakes
  })

  describe('validation', () => {
    it('answers 400 without side effects when the body is missing', async () => {
      const outcome = await runTriage(
        ticketEvent({ ticketBody: undefined }),
        collaborators,
        options
      )

      expect(outcome).toEqual({
        statusCode: 400,
        body: {
          status: 'error',
          error: "Missing 'ticketSubject' or 'ticketBody' in input",
        },
        decision: null,
      })
      expect(fakes.events).toEqual([])
      expect(fakes.llm.invoke).not.toHaveBeenCalled()
    })

    it('answers 400 when the ticket id is missing', async () => {
      const outcome = await runTriage(
        ticketEvent({ ticketId: undefined }),
        collaborators,
        options
      )

      expect(outcome.statusCode).toBe(400)
      expect(outcome.body.error).toBe("Missing 'ticketId' in input")
    })
  })

  describe('account restriction', () => {
    it('exits as a client ticket when no account id is present', async () => {
      const outcome = await runTriage(
        ticketEvent({ ticketBody: 'Please restart my server.' }),
        collaborators,
        options
      )

      expect(outcome.statusCode).toBe(200)
      expect(outcome.body.status).toBe('treated-as-client')
      expect(outcome.decision?.earlyExitReason).toBe('unidentified-account')
      expect(fakes.events).toEqual([])
    })

    it('routes unsupported accounts to operations with a 403', async () => {
      fakes.restrictions.isSupported.mockResolvedValue(false)

      const outcome = await runTriage(ticketEvent(), collaborators, options)

      expect(outcome.statusCode).toBe(403)
      expect(outcome.body).toEqual({
        status: 'restricted',
        ticketId: '7',
        message:
          'AccountId 123456789012 is not supported. Ticket has been routed to Ops.',
      })
      expect(fakes.events).toEqual([
        'assign:Ops',
        'status:Assigned',
        'notify:Ops',
      ])
      expect(fakes.llm.invoke).not.toHaveBeenCalled()
    })
  })

  describe('dispatch', () => {
    it('dispatches a confident classification and reports the outcome', async () => {
      fakes.llm.invoke.mockResolvedValue({
        category: 'security',
        confidence: 0.9,
      })

      const outcome = await runTriage(ticketEvent(), collaborators, options)

      expect(outcome).toEqual({
        statusCode: 200,
        body: {
          status: 'success',
          ticketId: '7',
          category: 'security',
          confidence: 0.9,
          language: 'und',
          reply: 'diagnostic reply',
          handler: 'security',
          ticketType: 'alarm',
          customerEmail: 'jane@customer.example',
          fromAddresses: ['jane@customer.example'],
          toAddresses: ['support@example.com'],
          ccAddresses: [],
        },
        decision: {
          ticketId: '7',
          ticketType: 'alarm',
          finalCategory: 'security',
          finalConfidence: 0.9,
          handlerInvoked: 'security',
          earlyExitReason: null,
          language: 'und',
          siteUp: false,
        },
      })
      expect(fakes.events).toEqual([
        'assign:Ops',
        'status:Assigned',
        'notify:Ops',
        'generate:diagnostic',
        'reply',
      ])
      expect(traceRouting).toHaveBeenCalledWith(
        expect.objectContaining({
          ticketId: '7',
          category: 'security',
          handler: 'security',
          statusCode: 200,
        })
      )
    })

    it('classifies subject and cleaned body together', async () => {
      await runTriage(ticketEvent(), collaborators, options)

      const [sessionKey, prompt] = fakes.llm.invoke.mock.calls[0] ?? []
      expect(sessionKey).toBe('7')
      expect(prompt).toContain(
        `"ALARM: High CPU on web-1\n\n${ACCOUNT_LINE}\nCPU usage is high on the web server."`
      )
    })

    it('forces customer-written tickets to custom', async () => {
      fakes.llm.invoke.mockResolvedValue({ category: 'os', confidence: 0.2 })

      const outcome = await runTriage(
        ticketEvent({ ticketSubject: 'Please restart instance i-0abc' }),
        collaborators,
        options
      )

      expect(outcome.body).toMatchObject({
        status: 'success',
        category: 'custom',
        confidence: 1,
        handler: 'custom',
        ticketType: 'client',
      })
    })

    it('classifies the translated text', async () => {
      const translator = {
        detectAndTranslate: vi
          .fn()
          .mockResolvedValue({ languageCode: 'fr', text: 'CPU is high' }),
      }

      const outcome = await runTriage(
        ticketEvent(),
        { ...collaborators, translator },
        options
      )

      expect(translator.detectAndTranslate).toHaveBeenCalledWith(
        `ALARM: High CPU on web-1\n\n${ACCOUNT_LINE}\nCPU usage is high on the web server.`
      )
      expect(fakes.llm.invoke.mock.calls[0]?.[1]).toContain('"CPU is high"')
      expect(outcome.body.language).toBe('fr')
    })

    it('keeps the original text when translation fails', async () => {
      const translator = {
        detectAndTranslate: vi.fn().mockRejectedValue(new Error('quota')),
      }

      const outcome = await runTriage(
        ticketEvent(),
        { ...collaborators, translator },
        options
      )

      expect(outcome.statusCode).toBe(200)
      expect(outcome.body.language).toBe('und')
    })

    it('ignores similarity search failures', async () => {
      const similarity = {
        search: vi.fn().mockRejectedValue(new Error('index offline')),
      }

      const outcome = await runTriage(
        ticketEvent(),
        { ...collaborators, similarity },
        options
      )

      expect(similarity.search).toHaveBeenCalledTimes(1)
      expect(outcome.statusCode).toBe(200)
    })
  })

  describe('site probe', () => {
    it('notes and closes tickets whose site is back up, then continues', async () => {
      const siteProber = {
        probe: vi.fn().mockResolvedValue({
          url: 'https://shop.example.com',
          ok: true,
          statusCode: 200,
          report: '✅ Site is Up and Running.',
        }),
      }

      const outcome = await runTriage(
        ticketEvent({
          ticketSubject: 'Shop is back',
          ticketBody: `${ACCOUNT_LINE}\n[web] [Up] [https://shop.example.com | Shop] is back`,
        }),
        { ...collaborators, siteProber },
        options
      )

      expect(siteProber.probe).toHaveBeenCalledWith('https://shop.example.com')
      expect(fakes.helpdesk.addPrivateComment).toHaveBeenCalledWith(
        '7',
        '✅ Site is Up and Running.'
      )
      expect(fakes.events.slice(0, 2)).toEqual(['comment', 'status:Closed'])
      expect(outcome.decision?.siteUp).toBe(true)
      expect(outcome.body.status).toBe('success')
    })

    it('keeps triaging when closing an up-site ticket fails', async () => {
      const siteProber = {
        probe: vi.fn().mockResolvedValue({
          url: 'https://shop.example.com',
          ok: true,
          statusCode: 200,
          report: '✅ Site is Up and Running.',
        }),
      }
      fakes.helpdesk.addPrivateComment.mockRejectedValue(
        new Error('helpdesk down')
      )
      fakes.llm.invoke.mockResolvedValue({
        category: 'security',
        confidence: 0.9,
      })

      const outcome = await runTriage(
        ticketEvent({
          ticketBody: `${ACCOUNT_LINE}\n[web] [Up] [https://shop.example.com | Shop] is back`,
        }),
        { ...collaborators, siteProber },
        options
      )

      expect(outcome.statusCode).toBe(200)
      expect(outcome.body).toMatchObject({
        status: 'success',
        category: 'security',
      })
      expect(outcome.decision?.siteUp).toBe(true)
      expect(log).toHaveBeenCalledWith(
        'warn',
        'closing probed ticket failed',
        expect.objectContaining({ ticketId: '7', error: 'helpdesk down' })
      )
    })

    it('logs a rejected close without failing the run', async () => {
      const siteProber = {
        probe: vi.fn().mockResolvedValue({
          url: 'https://shop.example.com',
          ok: true,
          statusCode: 200,
          report: '✅ Site is Up and Running.',
        }),
      }
      fakes.helpdesk.updateStatus.mockResolvedValueOnce({
        statusCode: 422,
        body: { errorCode: 'INVALID_DATA' },
      })
      fakes.llm.invoke.mockResolvedValue({
        category: 'security',
        confidence: 0.9,
      })

      const outcome = await runTriage(
        ticketEvent({
          ticketBody: `${ACCOUNT_LINE}\n[web] [Up] [https://shop.example.com | Shop] is back`,
        }),
        { ...collaborators, siteProber },
        options
      )

      expect(outcome.statusCode).toBe(200)
      expect(outcome.decision?.siteUp).toBe(true)
      expect(log).toHaveBeenCalledWith(
        'warn',
        'helpdesk status rejected',
        expect.objectContaining({
          ticketId: '7',
          statusCode: 422,
          body: { errorCode: 'INVALID_DATA' },
        })
      )
    })

    it('leaves tickets open when the site is still down', async () => {
      const siteProber = {
        probe: vi.fn().mockResolvedValue({
          url: 'https://shop.example.com',
          ok: false,
          statusCode: 503,
          report: '❌ Site returned an HTTP error.',
        }),
      }

      const outcome = await runTriage(
        ticketEvent({
          ticketBody: `${ACCOUNT_LINE}\n[web] [Down] [https://shop.example.com | Shop]`,
        }),
        { ...collaborators, siteProber },
        options
      )

      expect(fakes.helpdesk.addPrivateComment).not.toHaveBeenCalled()
      expect(outcome.decision?.siteUp).toBe(false)
    })
  })

  describe('low confidence', () => {
    it('asks operations for manual review', async () => {
      fakes.llm.invoke.mockResolvedValue({ category: 'os', confidence: 0.4 })

      const outcome = await runTriage(ticketEvent(), collaborators, options)

      expect(outcome.statusCode).toBe(200)
      expect(outcome.body).toEqual({
        status: 'fallback',
        ticketId: '7',
        message: 'Low confidence score. Manual review needed.',
        category: 'os',
        confidence: 0.4,
        ticketType: 'alarm',
      })
      expect(outcome.decision?.earlyExitReason).toBe('low-confidence')
      expect(fakes.notifier.notifyTeam).toHaveBeenCalledWith(
        expect.objectContaining({ teamName: 'Ops', body: LOW_CONFIDENCE_NOTICE })
      )
      expect(fakes.helpdesk.sendReply).not.toHaveBeenCalled()
    })

    it('still answers when the review notification fails', async () => {
      fakes.llm.invoke.mockResolvedValue({ category: 'os', confidence: 0.4 })
      fakes.notifier.notifyTeam.mockRejectedValue(new Error('webhook down'))

      const outcome = await runTriage(ticketEvent(), collaborators, options)

      expect(outcome.statusCode).toBe(200)
      expect(outcome.body.status).toBe('fallback')
    })
  })

  describe('failures', () => {
    it('parks the original event and answers 500', async () => {
      const deadLetters = createMemoryDeadLetterQueue()
      fakes.helpdesk.assignToTeam.mockRejectedValue(new Error('desk down'))
      const event = ticketEvent()

      const outcome = await runTriage(
        event,
        { ...collaborators, deadLetters },
        options
      )

      expect(outcome).toEqual({
        statusCode: 500,
        body: { status: 'error', ticketId: '7', error: 'desk down' },
        decision: null,
      })
      expect(deadLetters.messages).toHaveLength(1)
      expect(JSON.parse(deadLetters.messages[0]?.body ?? '')).toEqual({
        error: 'desk down',
        originalEvent: event,
        failedAt: '2026-01-02T03:04:05.000Z',
      })
    })

    it('does not throw when the dead-letter queue is unavailable', async () => {
      fakes.helpdesk.assignToTeam.mockRejectedValue(new Error('desk down'))
      const deadLetters = {
        send: vi.fn().mockRejectedValue(new Error('queue down')),
        receive: vi.fn(),
        delete: vi.fn(),
      }

      const outcome = await runTriage(
        ticketEvent(),
        { ...collaborators, deadLetters },
        options
      )

      expect(outcome.statusCode).toBe(500)
      expect(deadLetters.send).toHaveBeenCalledTimes(1)
    })
  })
})
