/**
 * Configuration-backed collaborators
 *
 * Stand-ins for the account, translation and team services that read
 * everything from the environment.
 */

import type {
  AccountRestrictionStore,
  TeamDirectory,
  Translator,
} from '../pipeline/types'

export function createAllowListRestrictionStore(
  accountIds: Iterable<string>
): AccountRestrictionStore {
  const allowed = new Set(accountIds)
  return {
    async isSupported(accountId) {
      return allowed.has(accountId)
    },
  }
}

/** No detection: language `und`, text unchanged */
export function createPassthroughTranslator(): Translator {
  return {
    async detectAndTranslate(text) {
      return { languageCode: 'und', text }
    },
  }
}

/**
 * Team lookup by desk account id, then customer email, then the customer's
 * email domain, then the support mailbox the ticket was sent to. Keys are
 * matched case-insensitively.
 */
export function createConfiguredTeamDirectory(
  teams: Record<string, string>
): TeamDirectory {
  const byKey = new Map(
    Object.entries(teams).map(([key, team]) => [key.toLowerCase(), team])
  )

  return {
    async resolveTeam({ customerEmail, toAddresses, deskAccountId }) {
      const email = customerEmail?.toLowerCase()
      const candidates = [
        deskAccountId?.toLowerCase(),
        email,
        email?.split('@')[1],
        ...toAddresses.map((address) => address.toLowerCase()),
      ]

      for (const key of candidates) {
        const team = key ? byKey.get(key) : undefined
        if (team) return team
      }
      return null
    },
  }
}
