/**
 * Team chat notifications
 *
 * Posts a MessageCard to the incoming-webhook URL configured for each team.
 */

import { CollaboratorError } from '../errors'
import { log } from '../observability/axiom'
import type { TeamNotification, TeamNotifier } from '../pipeline/types'

interface MessageCardSection {
  activityTitle: string
  text?: string
  facts?: { name: string; value: string }[]
}

export interface MessageCard {
  '@type': 'MessageCard'
  '@context': 'http://schema.org/extensions'
  summary: string
  themeColor: string
  title: string
  sections: MessageCardSection[]
}

export interface WebhookNotifierOptions {
  /** Team name → incoming webhook URL */
  webhooks: Record<string, string>
  /** Agent UI base URL; the ticket id is appended */
  ticketUrl: string
  fetch?: typeof fetch
}

/**
 * Build the MessageCard payload for a notification
 */
export function buildMessageCard(
  notification: TeamNotification,
  ticketUrl: string
): MessageCard {
  const { teamName, subject, ticketId, body, addresses } = notification
  const link = `[🔗 View Ticket #${ticketId}](${ticketUrl.replace(/\/$/, '')}/${ticketId})`

  const sections: MessageCardSection[] = [
    {
      activityTitle: `👀 Attention ${teamName}`,
      text: `A new ticket has been created for **${teamName}**.\n\n${link}`,
    },
  ]

  if (body) {
    sections.push({ activityTitle: '💬 Agent Reply', text: body })
  }

  if (addresses) {
    sections.push({
      activityTitle: '📧 Addresses',
      facts: [
        { name: 'From', value: addresses.from.join(', ') || '-' },
        { name: 'To', value: addresses.to.join(', ') || '-' },
        { name: 'Cc', value: addresses.cc.join(', ') || '-' },
      ],
    })
  }

  return {
    '@type': 'MessageCard',
    '@context': 'http://schema.org/extensions',
    summary: subject,
    themeColor: '0076D7',
    title: `🛠️ Support Ticket: ${subject}`,
    sections,
  }
}

/**
 * TeamNotifier over chat incoming webhooks. A team without a webhook is
 * logged and reported as not sent; a failing webhook throws.
 */
export function createWebhookNotifier(
  options: WebhookNotifierOptions
): TeamNotifier {
  return {
    async notifyTeam(notification) {
      const url = options.webhooks[notification.teamName]
      if (!url) {
        await log('error', 'no webhook configured for team', {
          workflow: 'triage',
          step: 'notify',
          ticketId: notification.ticketId,
          teamName: notification.teamName,
        })
        return { ok: false }
      }

      const doFetch = options.fetch ?? fetch
      let response: Response
      try {
        response = await doFetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(buildMessageCard(notification, options.ticketUrl)),
        })
      } catch (error) {
        throw new CollaboratorError('team-webhook', {
          message: `Webhook request for ${notification.teamName} failed`,
          cause: error,
        })
      }

      if (!response.ok) {
        throw new CollaboratorError('team-webhook', {
          message: `Webhook for ${notification.teamName} answered ${response.status}`,
          details: { status: response.status },
        })
      }

      await log('info', 'team notified', {
        workflow: 'triage',
        step: 'notify',
        ticketId: notification.ticketId,
        teamName: notification.teamName,
      })
      return { ok: true }
    },
  }
}
