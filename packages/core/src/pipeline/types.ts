/**
 * Triage type definitions
 *
 * Shared interfaces for the normalize → classify → route → dispatch steps
 * and the collaborator contracts the dispatcher calls.
 */

import type { DeadLetterQueue } from '../dead-letter/types'

// ============================================================================
// Categories
// ============================================================================

export const TICKET_CATEGORIES = [
  'alarm', // CloudWatch alarms, monitoring alerts, system alerts
  'security', // Access issues, compliance, security concerns
  'cost_optimization', // Billing, cost and resource optimization
  'custom', // Customer requests and application-specific issues
  'os', // Operating system and server configuration
] as const

export type TicketCategory = (typeof TICKET_CATEGORIES)[number]

/** What the subject line says about who wrote the ticket */
export type TicketType = 'alarm' | 'client'

export type ClassificationSource =
  | 'fast-path' // alarm indicator count
  | 'llm' // validated backend output
  | 'keyword-fallback' // backend failed or was unusable
  | 'error' // backend returned nothing usable and no fallback applies

// ============================================================================
// Ticket
// ============================================================================

export interface Ticket {
  id: string
  subject: string
  rawBody: string
  fromAddresses: string[]
  toAddresses: string[]
  ccAddresses: string[]
  /** Helpdesk-side account id, when the webhook carries one */
  deskAccountId?: string
}

// ============================================================================
// Step 1: Normalize
// ============================================================================

export type ExtractionPath =
  | 'empty'
  | 'no-readable-text'
  | 'json-block'
  | 'cloudwatch-alarm'
  | 'status-summary'
  | 'greeting-window'
  | 'raw'
  | 'no-meaningful-content'

export interface NormalizedMessage {
  cleanText: string
  extractionPath: ExtractionPath
}

// ============================================================================
// Step 2: Classify
// ============================================================================

export interface ClassificationResult {
  category: TicketCategory
  confidence: number // 0-1
  source: ClassificationSource
}

// ============================================================================
// Step 3: Route / dispatch
// ============================================================================

export type EarlyExitReason =
  | 'unidentified-account'
  | 'restricted-account'
  | 'low-confidence'

export interface RoutingDecision {
  ticketId: string
  ticketType: TicketType
  finalCategory: TicketCategory | null
  finalConfidence: number
  handlerInvoked: string | null
  earlyExitReason: EarlyExitReason | null
  language: string | null
  siteUp: boolean
}

export interface TriageResponseBody {
  status: 'success' | 'fallback' | 'treated-as-client' | 'restricted' | 'error'
  ticketId?: string
  category?: TicketCategory | null
  confidence?: number
  language?: string | null
  reply?: string
  message?: string
  error?: string
  [key: string]: unknown
}

export interface TriageOutcome {
  statusCode: 200 | 400 | 403 | 404 | 500
  body: TriageResponseBody
  decision: RoutingDecision | null
}

// ============================================================================
// Collaborator contracts
// ============================================================================

export interface HelpdeskReplyInput {
  ticketId: string
  fromAddresses: string[]
  toAddresses: string[]
  ccAddresses: string[]
  htmlBody: string
}

export interface HelpdeskResult {
  statusCode: number
  body?: unknown
}

export interface HelpdeskClient {
  assignToTeam(ticketId: string, teamName: string): Promise<HelpdeskResult>
  updateStatus(ticketId: string, status: string): Promise<HelpdeskResult>
  sendReply(input: HelpdeskReplyInput): Promise<HelpdeskResult>
  addPrivateComment(ticketId: string, content: string): Promise<HelpdeskResult>
}

export interface TeamNotification {
  teamName: string
  subject: string
  ticketId: string
  body: string
  addresses?: {
    from: string[]
    to: string[]
    cc: string[]
  }
}

export interface TeamNotifier {
  notifyTeam(notification: TeamNotification): Promise<{ ok: boolean }>
}

export interface AccountRestrictionStore {
  isSupported(accountId: string): Promise<boolean>
}

/**
 * Pluggable text backend. Output is untrusted: it may be a structured
 * object, a `{ raw_response }` wrapper, a bare string, prose with JSON in a
 * code fence, or a clarifying question instead of an answer.
 *
 * `sessionKey` is derived from the ticket id (with the reply kind appended
 * for replies). Backends pass it to the provider so calls for one ticket
 * can be correlated there, and log it on failure.
 */
export interface LlmBackend {
  invoke(sessionKey: string, prompt: string): Promise<unknown>
}

export interface TranslationResult {
  languageCode: string
  text: string
}

export interface Translator {
  detectAndTranslate(text: string): Promise<TranslationResult>
}

export interface SimilarTicket {
  ticketId: string
  similarity: number
}

export interface SimilaritySearchResult {
  status: 'success' | 'error'
  results: SimilarTicket[]
  message?: string
}

export interface SimilarityStore {
  search(text: string): Promise<SimilaritySearchResult>
}

export interface SiteProbeResult {
  url: string
  ok: boolean
  statusCode: number | null
  report: string
}

export interface SiteProber {
  probe(url: string): Promise<SiteProbeResult>
}

export interface RemediationInput {
  ticketId: string
  text: string
  fromAddresses: string[]
}

export interface RemediationResult {
  statusCode: number
  message?: string
}

export interface Remediator {
  name: string
  remediate(input: RemediationInput): Promise<RemediationResult>
}

export type ReplyKind = 'general' | 'diagnostic' | 'remediation'

export interface ReplyGenerator {
  generate(kind: ReplyKind, ticketId: string, prompt: string): Promise<string>
}

export interface TeamLookup {
  customerEmail: string | null
  toAddresses: string[]
  deskAccountId?: string
}

/** Finds the team that owns a customer's tickets */
export interface TeamDirectory {
  resolveTeam(lookup: TeamLookup): Promise<string | null>
}

// ============================================================================
// Dispatcher wiring
// ============================================================================

/**
 * Everything `runTriage` talks to. Optional collaborators are skipped when
 * absent: no similarity log, no site probe, no translation, no remediation,
 * every custom ticket goes to the operations team, and failures are not
 * parked.
 */
export interface TriageCollaborators {
  helpdesk: HelpdeskClient
  notifier: TeamNotifier
  restrictions: AccountRestrictionStore
  llm: LlmBackend
  replies: ReplyGenerator
  translator?: Translator
  similarity?: SimilarityStore
  siteProber?: SiteProber
  remediators?: Remediator[]
  teamDirectory?: TeamDirectory
  deadLetters?: DeadLetterQueue
}

export interface TriageOptions {
  /** Team that owns alarms, restricted accounts and manual review */
  operationsTeam: string
  alarmSenderFingerprint?: string
  now?: () => Date
}
