/**
 * HelpdeskClient over the desk-sdk
 *
 * Team names resolve to helpdesk team ids through configuration. API
 * rejections come back as results so the dispatcher can log them and carry
 * on; transport failures throw.
 */

import {
  DeskApiError,
  type DeskClient,
  createDeskClient,
  createTokenProvider,
} from '@desk-triage/desk-sdk'
import type { TriageConfig } from '../config'
import { CollaboratorError, ConfigurationError, errorMessage } from '../errors'
import { log } from '../observability/axiom'
import type { HelpdeskClient, HelpdeskResult } from '../pipeline/types'

export interface DeskHelpdeskOptions {
  client: DeskClient
  /** Team name → helpdesk team id */
  teamIds: Record<string, string>
  /** Mailbox replies are sent from */
  fromAddress: string
}

async function call(
  action: string,
  ticketId: string,
  fn: () => Promise<unknown>
): Promise<HelpdeskResult> {
  const startTime = Date.now()
  try {
    const body = await fn()
    await log('info', `helpdesk ${action}`, {
      workflow: 'triage',
      step: 'helpdesk',
      ticketId,
      statusCode: 200,
      durationMs: Date.now() - startTime,
    })
    return { statusCode: 200, body }
  } catch (error) {
    if (error instanceof DeskApiError) {
      return {
        statusCode: error.status,
        body: { errorCode: error.errorCode, message: error.message },
      }
    }
    throw new CollaboratorError('helpdesk', {
      message: `helpdesk ${action} failed: ${errorMessage(error)}`,
      details: { ticketId },
      cause: error,
    })
  }
}

export function createDeskHelpdesk(
  options: DeskHelpdeskOptions
): HelpdeskClient {
  const { client, teamIds, fromAddress } = options

  return {
    async assignToTeam(ticketId, teamName) {
      const teamId = teamIds[teamName]
      if (!teamId) {
        throw new ConfigurationError({
          message: `No helpdesk team id configured for '${teamName}'`,
          details: { teamName },
        })
      }
      return call('assign', ticketId, () =>
        client.tickets.assignTeam(ticketId, teamId)
      )
    },

    updateStatus(ticketId, status) {
      return call('status', ticketId, () =>
        client.tickets.updateStatus(ticketId, status)
      )
    },

    async sendReply(input) {
      const to = input.fromAddresses[0] ?? input.toAddresses[0]
      if (!to) {
        return {
          statusCode: 400,
          body: { message: 'Ticket has no address to reply to' },
        }
      }

      const cc = input.ccAddresses.join(',')
      return call('reply', input.ticketId, () =>
        client.tickets.sendReply(input.ticketId, {
          channel: 'EMAIL',
          fromEmailAddress: fromAddress,
          to,
          ...(cc ? { cc } : {}),
          contentType: 'html',
          content: input.htmlBody,
        })
      )
    },

    addPrivateComment(ticketId, content) {
      return call('comment', ticketId, () =>
        client.tickets.addComment(ticketId, {
          isPublic: false,
          contentType: 'plainText',
          content,
        })
      )
    },
  }
}

/**
 * Build the helpdesk collaborator from configuration. Every OAuth setting
 * and the reply mailbox are required.
 */
export function createDeskHelpdeskFromConfig(
  config: TriageConfig
): HelpdeskClient {
  const { desk } = config
  const { orgId, clientId, clientSecret, refreshToken, fromAddress } = desk

  if (!orgId || !clientId || !clientSecret || !refreshToken || !fromAddress) {
    const missing = Object.entries({
      DESK_ORG_ID: orgId,
      DESK_CLIENT_ID: clientId,
      DESK_CLIENT_SECRET: clientSecret,
      DESK_REFRESH_TOKEN: refreshToken,
      DESK_FROM_ADDRESS: fromAddress,
    })
      .filter(([, value]) => !value)
      .map(([name]) => name)
    throw new ConfigurationError({
      message: `Missing helpdesk configuration: ${missing.join(', ')}`,
      details: { missing },
    })
  }

  const client = createDeskClient({
    orgId,
    baseUrl: desk.apiBase,
    tokens: createTokenProvider({
      accountsUrl: desk.accountsUrl,
      clientId,
      clientSecret,
      refreshToken,
    }),
  })

  return createDeskHelpdesk({ client, teamIds: desk.teamIds, fromAddress })
}
