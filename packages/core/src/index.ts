/**
 * @desk-triage/core
 *
 * Core exports for the ticket triage engine. Prefer package.json exports
 * for narrower imports: import { runTriage } from '@desk-triage/core/pipeline'
 */

/** Package version */
export const VERSION = '0.0.0'

// Dispatcher and steps
export * from './pipeline'

// Collaborators
export {
  createAllowListRestrictionStore,
  createConfiguredTeamDirectory,
  createDefaultCollaborators,
  createPassthroughTranslator,
} from './collaborators'
export { createDeskHelpdesk, createDeskHelpdeskFromConfig } from './desk'
export { createAiBackend, type AiBackendOptions } from './llm/ai-backend'
export {
  buildMessageCard,
  createWebhookNotifier,
  type MessageCard,
  type WebhookNotifierOptions,
} from './notifications/webhook'

// Dead-letter queue
export * from './dead-letter'

// Configuration and errors
export {
  DEFAULT_ALARM_SENDER,
  DEFAULT_MODEL,
  DEFAULT_OPERATIONS_TEAM,
  loadTriageConfig,
  type TriageConfig,
  type TriageEnv,
} from './config'
export * from './errors'

// Observability
export {
  flushAxiom,
  initializeAxiom,
  log,
  type LogLevel,
  withTracing,
} from './observability/axiom'
