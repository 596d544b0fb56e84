/**
 * Default collaborator wiring from configuration
 */

import type { TriageConfig } from '../config'
import { createDeskHelpdeskFromConfig } from '../desk'
import { createAiBackend } from '../llm/ai-backend'
import { createWebhookNotifier } from '../notifications/webhook'
import { createLlmReplyGenerator } from '../pipeline/steps/reply'
import { createHttpSiteProber } from '../pipeline/steps/site-probe'
import type { TriageCollaborators } from '../pipeline/types'
import {
  createAllowListRestrictionStore,
  createConfiguredTeamDirectory,
  createPassthroughTranslator,
} from './static'

export {
  createAllowListRestrictionStore,
  createConfiguredTeamDirectory,
  createPassthroughTranslator,
} from './static'

/**
 * Everything `runTriage` needs, built from configuration. Pass `overrides`
 * to swap single collaborators, e.g. a recording helpdesk for dry runs.
 */
export function createDefaultCollaborators(
  config: TriageConfig,
  overrides: Partial<TriageCollaborators> = {}
): TriageCollaborators {
  const llm =
    overrides.llm ??
    createAiBackend({ model: config.model, maxAttempts: config.llmMaxAttempts })

  return {
    helpdesk: overrides.helpdesk ?? createDeskHelpdeskFromConfig(config),
    notifier:
      overrides.notifier ??
      createWebhookNotifier({
        webhooks: config.teamWebhooks,
        ticketUrl: config.desk.ticketUrl,
      }),
    restrictions:
      overrides.restrictions ??
      createAllowListRestrictionStore(config.allowedAccountIds),
    llm,
    replies: overrides.replies ?? createLlmReplyGenerator(llm),
    translator: overrides.translator ?? createPassthroughTranslator(),
    siteProber: overrides.siteProber ?? createHttpSiteProber(),
    teamDirectory:
      overrides.teamDirectory ??
      createConfiguredTeamDirectory(config.customerTeams),
    similarity: overrides.similarity,
    remediators: overrides.remediators,
    deadLetters: overrides.deadLetters,
  }
}
