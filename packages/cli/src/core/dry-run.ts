import type {
  HelpdeskClient,
  HelpdeskResult,
  TeamNotifier,
} from '@desk-triage/core'

export interface DryRunAction {
  target: 'helpdesk' | 'notifier'
  action: string
  ticketId: string
  detail?: Record<string, unknown>
}

const ACCEPTED: HelpdeskResult = { statusCode: 200, body: { dryRun: true } }

/**
 * Helpdesk that records what it would have done and accepts everything.
 */
export function createRecordingHelpdesk(
  actions: DryRunAction[]
): HelpdeskClient {
  const record = (
    action: string,
    ticketId: string,
    detail?: Record<string, unknown>
  ): HelpdeskResult => {
    actions.push({ target: 'helpdesk', action, ticketId, detail })
    return ACCEPTED
  }

  return {
    async assignToTeam(ticketId, teamName) {
      return record('assign', ticketId, { team: teamName })
    },
    async updateStatus(ticketId, status) {
      return record('status', ticketId, { status })
    },
    async sendReply(input) {
      return record('reply', input.ticketId, {
        to: input.fromAddresses[0] ?? input.toAddresses[0] ?? null,
        cc: input.ccAddresses,
      })
    },
    async addPrivateComment(ticketId, content) {
      return record('comment', ticketId, { content })
    },
  }
}

export function createRecordingNotifier(actions: DryRunAction[]): TeamNotifier {
  return {
    async notifyTeam(notification) {
      actions.push({
        target: 'notifier',
        action: 'notify',
        ticketId: notification.ticketId,
        detail: { team: notification.teamName },
      })
      return { ok: true }
    },
  }
}
