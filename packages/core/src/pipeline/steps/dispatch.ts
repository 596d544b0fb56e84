/**
 * Step 4: DISPATCH
 *
 * One handler per category. The table is keyed by every category, so a new
 * category without a handler does not compile.
 */

import { log } from '../../observability/axiom'
import type {
  HelpdeskResult,
  ReplyKind,
  Ticket,
  TicketCategory,
  TriageCollaborators,
} from '../types'
import { formatReplyEmail } from './reply'

/** Status set on every ticket a handler takes */
export const ASSIGNED_STATUS = 'Assigned'

/** Remediation outcomes that count as "the automation did something" */
const REMEDIATION_SUCCESS_CODES = new Set([200, 202])

export interface DispatchContext {
  ticket: Ticket
  /** Translated text the replies are generated from */
  text: string
  customerEmail: string | null
  operationsTeam: string
  collaborators: TriageCollaborators
}

export interface DispatchResult {
  handler: string
  team: string
  reply: string
}

type CategoryHandler = (context: DispatchContext) => Promise<DispatchResult>

// ============================================================================
// Shared actions
// ============================================================================

/**
 * Helpdesk rejections are logged and processing continues; thrown errors
 * still propagate.
 */
async function checkHelpdesk(
  action: string,
  ticketId: string,
  result: HelpdeskResult
): Promise<void> {
  if (result.statusCode >= 200 && result.statusCode < 300) return

  await log('warn', `helpdesk ${action} rejected`, {
    workflow: 'triage',
    step: 'dispatch',
    ticketId,
    statusCode: result.statusCode,
    body: result.body,
  })
}

async function assignAndMark(
  context: DispatchContext,
  team: string
): Promise<void> {
  const { ticket, collaborators } = context
  await checkHelpdesk(
    'assign',
    ticket.id,
    await collaborators.helpdesk.assignToTeam(ticket.id, team)
  )
  await checkHelpdesk(
    'status',
    ticket.id,
    await collaborators.helpdesk.updateStatus(ticket.id, ASSIGNED_STATUS)
  )
}

async function notify(
  context: DispatchContext,
  team: string,
  body: string
): Promise<void> {
  const { ticket } = context
  await context.collaborators.notifier.notifyTeam({
    teamName: team,
    subject: ticket.subject,
    ticketId: ticket.id,
    body,
    addresses: {
      from: ticket.fromAddresses,
      to: ticket.toAddresses,
      cc: ticket.ccAddresses,
    },
  })
}

async function replyWith(
  context: DispatchContext,
  kind: ReplyKind,
  details: string
): Promise<string> {
  const { ticket, collaborators } = context
  const reply = await collaborators.replies.generate(kind, ticket.id, details)

  await checkHelpdesk(
    'reply',
    ticket.id,
    await collaborators.helpdesk.sendReply({
      ticketId: ticket.id,
      fromAddresses: ticket.fromAddresses,
      toAddresses: ticket.toAddresses,
      ccAddresses: ticket.ccAddresses,
      htmlBody: formatReplyEmail(reply),
    })
  )
  return reply
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Operations-owned tickets: hand over first, then answer the customer.
 */
function operationsHandler(name: string, kind: ReplyKind): CategoryHandler {
  return async (context) => {
    const team = context.operationsTeam
    await assignAndMark(context, team)
    await notify(context, team, '')
    const reply = await replyWith(context, kind, context.text)
    return { handler: name, team, reply }
  }
}

/**
 * Collect the messages of remediations that went through, labelled by
 * remediator.
 */
export async function runRemediators(
  context: DispatchContext
): Promise<string[]> {
  const { ticket, collaborators } = context
  const sections: string[] = []

  for (const remediator of collaborators.remediators ?? []) {
    const result = await remediator.remediate({
      ticketId: ticket.id,
      text: ticket.rawBody,
      fromAddresses: ticket.fromAddresses,
    })

    await log('info', 'remediation finished', {
      workflow: 'triage',
      step: 'dispatch',
      ticketId: ticket.id,
      remediator: remediator.name,
      statusCode: result.statusCode,
    })

    if (REMEDIATION_SUCCESS_CODES.has(result.statusCode) && result.message) {
      sections.push(`${remediator.name} Response:\n${result.message}`)
    }
  }

  return sections
}

async function resolveCustomerTeam(context: DispatchContext): Promise<string> {
  const { ticket, collaborators, customerEmail, operationsTeam } = context
  if (!collaborators.teamDirectory) return operationsTeam

  const team = await collaborators.teamDirectory.resolveTeam({
    customerEmail,
    toAddresses: ticket.toAddresses,
    deskAccountId: ticket.deskAccountId,
  })
  return team ?? operationsTeam
}

/**
 * Customer requests: try the automations, answer from their output when
 * any succeeded, then hand the ticket to the customer's team.
 */
const customHandler: CategoryHandler = async (context) => {
  const sections = await runRemediators(context)

  const reply =
    sections.length > 0
      ? await replyWith(
          context,
          'remediation',
          [context.text, ...sections].join('\n\n')
        )
      : await replyWith(context, 'general', context.text)

  const team = await resolveCustomerTeam(context)
  await notify(context, team, reply)

  const { ticket, collaborators } = context
  await checkHelpdesk(
    'status',
    ticket.id,
    await collaborators.helpdesk.updateStatus(ticket.id, ASSIGNED_STATUS)
  )
  await checkHelpdesk(
    'assign',
    ticket.id,
    await collaborators.helpdesk.assignToTeam(ticket.id, team)
  )

  return {
    handler: sections.length > 0 ? 'custom:remediation' : 'custom',
    team,
    reply,
  }
}

export const CATEGORY_HANDLERS: Record<TicketCategory, CategoryHandler> = {
  alarm: operationsHandler('alarm', 'diagnostic'),
  security: operationsHandler('security', 'diagnostic'),
  cost_optimization: operationsHandler('cost_optimization', 'diagnostic'),
  custom: customHandler,
  // Server and OS requests have no automation yet; handled as a general request
  os: operationsHandler('os', 'general'),
}

export async function dispatch(
  category: TicketCategory,
  context: DispatchContext
): Promise<DispatchResult> {
  const result = await CATEGORY_HANDLERS[category](context)

  await log('info', 'ticket dispatched', {
    workflow: 'triage',
    step: 'dispatch',
    ticketId: context.ticket.id,
    category,
    handler: result.handler,
    team: result.team,
  })

  return result
}
