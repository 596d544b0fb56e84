/**
 * Triage dispatcher
 *
 * Runs parse → normalize → restrict → probe → translate → classify →
 * resolve → dispatch for one inbound ticket event and turns the result into
 * an HTTP-style outcome. Every failure that escapes a step is caught once
 * here, parked in the dead-letter queue and answered with a 500.
 */

import { errorMessage, ValidationError } from '../errors'
import {
  log,
  traceDeadLetter,
  traceRouting,
  traceStep,
} from '../observability/axiom'
import { classify } from './steps/classify'
import { ASSIGNED_STATUS, dispatch } from './steps/dispatch'
import { findCustomerEmail, parseTicketEvent } from './steps/event'
import { extractMessage } from './steps/normalize'
import { resolvePriority } from './steps/resolve'
import { checkAccountRestriction } from './steps/restrict'
import { inferTypeFromSubject } from './steps/signals'
import { extractSiteUrl } from './steps/site-probe'
import type {
  HelpdeskResult,
  RoutingDecision,
  SiteProbeResult,
  Ticket,
  TicketType,
  TranslationResult,
  TriageCollaborators,
  TriageOptions,
  TriageOutcome,
} from './types'

// Re-export types and steps
export * from './types'
export * from './thresholds'
export {
  EMPTY_BODY_PLACEHOLDER,
  NO_MEANINGFUL_CONTENT_PLACEHOLDER,
  NO_READABLE_TEXT_PLACEHOLDER,
  extractMessage,
  normalize,
} from './steps/normalize'
export {
  ALARM_INDICATORS,
  countAlarmIndicators,
  inferTypeFromSubject,
  isAlarmTicket,
  type AlarmFingerprintOptions,
} from './steps/signals'
export {
  classify,
  extractJsonFromText,
  isConversationalReply,
  validateClassification,
  type ClassifyOptions,
} from './steps/classify'
export { KEYWORD_STRATEGIES, fallbackClassify } from './steps/fallback'
export {
  TicketEventSchema,
  findCustomerEmail,
  normalizeAddresses,
  parseTicketEvent,
  type TicketEvent,
} from './steps/event'
export {
  checkAccountRestriction,
  extractAccountId,
  type RestrictionVerdict,
} from './steps/restrict'
export {
  DEFAULT_PROBE_TIMEOUT_MS,
  createHttpSiteProber,
  extractSiteUrl,
  type HttpSiteProberOptions,
} from './steps/site-probe'
export { resolvePriority, type Resolution } from './steps/resolve'
export {
  ASSIGNED_STATUS,
  CATEGORY_HANDLERS,
  dispatch,
  type DispatchContext,
  type DispatchResult,
} from './steps/dispatch'
export {
  DEFAULT_REPLY,
  createLlmReplyGenerator,
  extractReplyText,
  formatReplyEmail,
} from './steps/reply'

export const CLOSED_STATUS = 'Closed'
export const UNDETERMINED_LANGUAGE = 'und'
export const LOW_CONFIDENCE_NOTICE =
  'Low confidence classification. Manual review required.'

// ============================================================================
// Early-exit steps
// ============================================================================

function notifyOperations(
  ticket: Ticket,
  collaborators: TriageCollaborators,
  operationsTeam: string,
  body: string
) {
  return collaborators.notifier.notifyTeam({
    teamName: operationsTeam,
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

async function logSimilarTickets(
  ticket: Ticket,
  text: string,
  collaborators: TriageCollaborators
): Promise<void> {
  if (!collaborators.similarity) return

  try {
    const found = await collaborators.similarity.search(text)
    if (found.status === 'error') {
      await log('warn', 'similar ticket search failed', {
        workflow: 'triage',
        step: 'similarity',
        ticketId: ticket.id,
        error: found.message,
      })
      return
    }
    await log('info', 'similar tickets', {
      workflow: 'triage',
      step: 'similarity',
      ticketId: ticket.id,
      matches: found.results,
    })
  } catch (error) {
    await log('warn', 'similar ticket search failed', {
      workflow: 'triage',
      step: 'similarity',
      ticketId: ticket.id,
      error: errorMessage(error),
    })
  }
}

/**
 * Probe the monitored site a ticket links to. A site that answers 2xx gets
 * the report as a private note and the ticket is closed; triage continues
 * either way.
 */
async function probeLinkedSite(
  ticket: Ticket,
  text: string,
  collaborators: TriageCollaborators
): Promise<boolean> {
  const url = extractSiteUrl(text) ?? extractSiteUrl(ticket.rawBody)
  if (!url || !collaborators.siteProber) return false

  let probe: SiteProbeResult
  try {
    probe = await collaborators.siteProber.probe(url)
  } catch (error) {
    await log('warn', 'site probe failed', {
      workflow: 'triage',
      step: 'site-probe',
      ticketId: ticket.id,
      url,
      error: errorMessage(error),
    })
    return false
  }

  const isUp =
    probe.statusCode !== null &&
    probe.statusCode >= 200 &&
    probe.statusCode < 300
  await log('info', 'site probed', {
    workflow: 'triage',
    step: 'site-probe',
    ticketId: ticket.id,
    url,
    statusCode: probe.statusCode,
  })
  if (!isUp) return false

  try {
    const comment = await collaborators.helpdesk.addPrivateComment(
      ticket.id,
      probe.report
    )
    await logRejectedResult(ticket, 'comment', comment)
    const status = await collaborators.helpdesk.updateStatus(
      ticket.id,
      CLOSED_STATUS
    )
    await logRejectedResult(ticket, 'status', status)
  } catch (error) {
    await log('warn', 'closing probed ticket failed', {
      workflow: 'triage',
      step: 'site-probe',
      ticketId: ticket.id,
      url,
      error: errorMessage(error),
    })
  }
  return true
}

async function logRejectedResult(
  ticket: Ticket,
  action: string,
  result: HelpdeskResult
): Promise<void> {
  if (result.statusCode >= 200 && result.statusCode < 300) return

  await log('warn', `helpdesk ${action} rejected`, {
    workflow: 'triage',
    step: 'site-probe',
    ticketId: ticket.id,
    statusCode: result.statusCode,
    body: result.body,
  })
}

async function translate(
  ticket: Ticket,
  text: string,
  collaborators: TriageCollaborators
): Promise<TranslationResult> {
  if (!collaborators.translator) {
    return { languageCode: UNDETERMINED_LANGUAGE, text }
  }

  try {
    return await collaborators.translator.detectAndTranslate(text)
  } catch (error) {
    await log('warn', 'translation failed, keeping original text', {
      workflow: 'triage',
      step: 'translate',
      ticketId: ticket.id,
      error: errorMessage(error),
    })
    return { languageCode: UNDETERMINED_LANGUAGE, text }
  }
}

// ============================================================================
// Main dispatcher
// ============================================================================

function emptyDecision(
  ticketId: string,
  ticketType: TicketType
): RoutingDecision {
  return {
    ticketId,
    ticketType,
    finalCategory: null,
    finalConfidence: 0,
    handlerInvoked: null,
    earlyExitReason: null,
    language: null,
    siteUp: false,
  }
}

async function triageTicket(
  ticket: Ticket,
  collaborators: TriageCollaborators,
  options: TriageOptions
): Promise<TriageOutcome> {
  const { operationsTeam } = options
  const ticketType = inferTypeFromSubject(ticket.subject)
  const decision = emptyDecision(ticket.id, ticketType)
  const customerEmail = findCustomerEmail(ticket)

  const message = await traceStep(
    { step: 'normalize', ticketId: ticket.id },
    async () => extractMessage(ticket.subject, ticket.rawBody)
  )
  await log('debug', 'ticket normalized', {
    workflow: 'triage',
    step: 'normalize',
    ticketId: ticket.id,
    extractionPath: message.extractionPath,
    ticketType,
  })

  // -------------------------------------------------------------------------
  // Account restriction
  // -------------------------------------------------------------------------
  const verdict = await traceStep(
    { step: 'restrict', ticketId: ticket.id },
    () =>
      checkAccountRestriction(
        ticket.id,
        [message.cleanText, ticket.rawBody],
        collaborators.restrictions
      )
  )

  if (verdict.status === 'unidentified') {
    await log('warn', 'no AWS account id in ticket, treated as client', {
      workflow: 'triage',
      step: 'restrict',
      ticketId: ticket.id,
    })
    return {
      statusCode: 200,
      body: {
        status: 'treated-as-client',
        ticketId: ticket.id,
        message: 'No valid AWS account id found',
      },
      decision: { ...decision, earlyExitReason: 'unidentified-account' },
    }
  }

  if (verdict.status === 'unsupported') {
    await collaborators.helpdesk.assignToTeam(ticket.id, operationsTeam)
    await collaborators.helpdesk.updateStatus(ticket.id, ASSIGNED_STATUS)
    await notifyOperations(ticket, collaborators, operationsTeam, '')
    return {
      statusCode: 403,
      body: {
        status: 'restricted',
        ticketId: ticket.id,
        message: `AccountId ${verdict.accountId} is not supported. Ticket has been routed to ${operationsTeam}.`,
      },
      decision: { ...decision, earlyExitReason: 'restricted-account' },
    }
  }

  // -------------------------------------------------------------------------
  // Best-effort context
  // -------------------------------------------------------------------------
  await logSimilarTickets(ticket, message.cleanText, collaborators)
  decision.siteUp = await probeLinkedSite(
    ticket,
    message.cleanText,
    collaborators
  )

  const translation = await translate(
    ticket,
    `${ticket.subject}\n\n${message.cleanText}`,
    collaborators
  )
  decision.language = translation.languageCode

  // -------------------------------------------------------------------------
  // Classify + resolve
  // -------------------------------------------------------------------------
  const classification = await classify(ticket.id, translation.text, {
    llm: collaborators.llm,
    senderFingerprint: options.alarmSenderFingerprint,
  })
  const resolution = resolvePriority({ ticketType, classification })
  decision.finalCategory = resolution.category
  decision.finalConfidence = resolution.confidence

  if (resolution.action === 'manual_review') {
    try {
      await notifyOperations(
        ticket,
        collaborators,
        operationsTeam,
        LOW_CONFIDENCE_NOTICE
      )
    } catch (error) {
      await log('error', 'manual review notification failed', {
        workflow: 'triage',
        step: 'resolve',
        ticketId: ticket.id,
        error: errorMessage(error),
      })
    }
    return {
      statusCode: 200,
      body: {
        status: 'fallback',
        ticketId: ticket.id,
        message: 'Low confidence score. Manual review needed.',
        category: resolution.category,
        confidence: resolution.confidence,
        ticketType,
      },
      decision: { ...decision, earlyExitReason: 'low-confidence' },
    }
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------
  const dispatched = await traceStep(
    { step: 'dispatch', ticketId: ticket.id },
    () =>
      dispatch(resolution.category, {
        ticket,
        text: translation.text,
        customerEmail,
        operationsTeam,
        collaborators,
      })
  )
  decision.handlerInvoked = dispatched.handler

  return {
    statusCode: 200,
    body: {
      status: 'success',
      ticketId: ticket.id,
      category: resolution.category,
      confidence: resolution.confidence,
      language: translation.languageCode,
      reply: dispatched.reply,
      handler: dispatched.handler,
      ticketType,
      customerEmail,
      fromAddresses: ticket.fromAddresses,
      toAddresses: ticket.toAddresses,
      ccAddresses: ticket.ccAddresses,
    },
    decision,
  }
}

/**
 * Park a failed event. Queue failures are logged, never rethrown.
 */
async function parkFailedEvent(
  event: unknown,
  error: unknown,
  collaborators: TriageCollaborators,
  now: () => Date
): Promise<void> {
  if (!collaborators.deadLetters) return

  try {
    await collaborators.deadLetters.send({
      error: errorMessage(error),
      originalEvent: event,
      failedAt: now().toISOString(),
    })
    await traceDeadLetter({ operation: 'enqueue', success: true })
  } catch (queueError) {
    await log('error', 'failed to send event to dead-letter queue', {
      workflow: 'triage',
      step: 'dead-letter',
      error: errorMessage(queueError),
    })
    await traceDeadLetter({
      operation: 'enqueue',
      success: false,
      error: errorMessage(queueError),
    })
  }
}

export async function runTriage(
  event: unknown,
  collaborators: TriageCollaborators,
  options: TriageOptions
): Promise<TriageOutcome> {
  const startTime = Date.now()
  const now = options.now ?? (() => new Date())

  let ticket: Ticket
  try {
    ticket = parseTicketEvent(event)
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error
    await log('warn', 'rejected ticket event', {
      workflow: 'triage',
      step: 'parse',
      error: error.message,
    })
    return {
      statusCode: 400,
      body: { status: 'error', error: error.message },
      decision: null,
    }
  }

  let outcome: TriageOutcome
  try {
    outcome = await triageTicket(ticket, collaborators, options)
  } catch (error) {
    await log('error', 'triage failed', {
      workflow: 'triage',
      ticketId: ticket.id,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    })
    await parkFailedEvent(event, error, collaborators, now)
    outcome = {
      statusCode: 500,
      body: {
        status: 'error',
        ticketId: ticket.id,
        error: errorMessage(error),
      },
      decision: null,
    }
  }

  await traceRouting({
    ticketId: ticket.id,
    ticketType:
      outcome.decision?.ticketType ?? inferTypeFromSubject(ticket.subject),
    category: outcome.decision?.finalCategory ?? null,
    confidence: outcome.decision?.finalConfidence ?? 0,
    handler: outcome.decision?.handlerInvoked ?? null,
    earlyExitReason: outcome.decision?.earlyExitReason ?? null,
    statusCode: outcome.statusCode,
    totalDurationMs: Date.now() - startTime,
  })

  return outcome
}
