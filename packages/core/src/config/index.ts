import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { env } from './env'

export interface TriageConfig {
  model: string
  llmMaxAttempts: number
  operationsTeam: string
  alarmSenderFingerprint: string
  desk: {
    apiBase: string
    accountsUrl: string
    orgId?: string
    clientId?: string
    clientSecret?: string
    refreshToken?: string
    fromAddress?: string
    ticketUrl: string
    teamIds: Record<string, string>
  }
  teamWebhooks: Record<string, string>
  allowedAccountIds: string[]
  /** Desk account id, customer email or email domain → owning team */
  customerTeams: Record<string, string>
}

export type TriageEnv = Partial<Record<keyof typeof env, string | undefined>>

const StringMapSchema = z.record(z.string(), z.string())

export const DEFAULT_MODEL = 'anthropic/claude-haiku-4-5'
export const DEFAULT_OPERATIONS_TEAM = 'Uptime Team'
export const DEFAULT_ALARM_SENDER = 'alerts@example.com'

function parseStringMap(
  name: string,
  raw: string | undefined
): Record<string, string> {
  if (!raw) return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationError({
      message: `${name} must be a JSON object of strings`,
      cause: error,
    })
  }

  const result = StringMapSchema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigurationError({
      message: `${name} must be a JSON object of strings`,
      details: { issues: result.error.issues.map((i) => i.message) },
    })
  }
  return result.data
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return []
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

/**
 * Resolve runtime configuration from the environment, applying defaults.
 */
export function loadTriageConfig(source: TriageEnv = env): TriageConfig {
  const maxAttempts = source.TRIAGE_LLM_MAX_ATTEMPTS
    ? Number.parseInt(source.TRIAGE_LLM_MAX_ATTEMPTS, 10)
    : 3

  return {
    model: source.TRIAGE_MODEL || DEFAULT_MODEL,
    llmMaxAttempts:
      Number.isFinite(maxAttempts) && maxAttempts > 0 ? maxAttempts : 3,
    operationsTeam: source.OPERATIONS_TEAM || DEFAULT_OPERATIONS_TEAM,
    alarmSenderFingerprint:
      source.ALARM_SENDER_FINGERPRINT || DEFAULT_ALARM_SENDER,
    desk: {
      apiBase: source.DESK_API_BASE || 'https://desk.zoho.com/api/v1',
      accountsUrl:
        source.DESK_ACCOUNTS_URL || 'https://accounts.zoho.com/oauth/v2/token',
      orgId: source.DESK_ORG_ID,
      clientId: source.DESK_CLIENT_ID,
      clientSecret: source.DESK_CLIENT_SECRET,
      refreshToken: source.DESK_REFRESH_TOKEN,
      fromAddress: source.DESK_FROM_ADDRESS,
      ticketUrl:
        source.DESK_TICKET_URL || 'https://desk.example.com/agent/tickets',
      teamIds: parseStringMap('DESK_TEAM_IDS', source.DESK_TEAM_IDS),
    },
    teamWebhooks: parseStringMap('TEAM_WEBHOOKS', source.TEAM_WEBHOOKS),
    allowedAccountIds: parseList(source.ALLOWED_ACCOUNT_IDS),
    customerTeams: parseStringMap('CUSTOMER_TEAMS', source.CUSTOMER_TEAMS),
  }
}
