import { beforeEach, describe, expect, it, vi } from 'vitest'
import { CollaboratorError } from '../errors'
import { buildMessageCard, createWebhookNotifier } from './webhook'

vi.mock('../observability/axiom', () => ({ log: vi.fn() }))

const notification = {
  teamName: 'Uptime Team',
  subject: 'Disk full',
  ticketId: '501',
  body: 'We are checking the volume.',
  addresses: {
    from: ['customer@example.com'],
    to: ['support@example.com'],
    cc: [],
  },
}

describe('buildMessageCard', () => {
  it('links the ticket and lists addresses', () => {
    const card = buildMessageCard(
      notification,
      'https://desk.example.com/agent/tickets/'
    )

    expect(card.title).toBe('🛠️ Support Ticket: Disk full')
    expect(card.sections).toEqual([
      {
        activityTitle: '👀 Attention Uptime Team',
        text: 'A new ticket has been created for **Uptime Team**.\n\n[🔗 View Ticket #501](https://desk.example.com/agent/tickets/501)',
      },
      { activityTitle: '💬 Agent Reply', text: 'We are checking the volume.' },
      {
        activityTitle: '📧 Addresses',
        facts: [
          { name: 'From', value: 'customer@example.com' },
          { name: 'To', value: 'support@example.com' },
          { name: 'Cc', value: '-' },
        ],
      },
    ])
  })

  it('omits the reply section for an empty body', () => {
    const card = buildMessageCard(
      { ...notification, body: '', addresses: undefined },
      'https://desk.example.com/t'
    )

    expect(card.sections).toHaveLength(1)
  })
})

describe('createWebhookNotifier', () => {
  const fetchMock = vi.fn()

  beforeEach(() => {
    fetchMock.mockReset()
  })

  function notifier() {
    return createWebhookNotifier({
      webhooks: { 'Uptime Team': 'https://hooks.example.com/uptime' },
      ticketUrl: 'https://desk.example.com/t',
      fetch: fetchMock,
    })
  }

  it('posts the card to the team webhook', async () => {
    fetchMock.mockResolvedValue(new Response('1', { status: 200 }))

    expect(await notifier().notifyTeam(notification)).toEqual({ ok: true })
    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.example.com/uptime',
      expect.objectContaining({ method: 'POST' })
    )
  })

  it('reports teams without a webhook as not sent', async () => {
    expect(
      await notifier().notifyTeam({ ...notification, teamName: 'Nobody' })
    ).toEqual({ ok: false })
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('throws a CollaboratorError on a failing webhook', async () => {
    fetchMock.mockResolvedValue(new Response('no', { status: 502 }))

    await expect(notifier().notifyTeam(notification)).rejects.toBeInstanceOf(
      CollaboratorError
    )
  })
})
