import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'

/**
 * Skip validation under tests, in CI and when explicitly asked to.
 * Every variable is optional; `loadTriageConfig()` applies the defaults.
 */
const shouldSkipValidation =
  typeof process !== 'undefined' &&
  (!!process.env.VITEST ||
    process.env.NODE_ENV === 'test' ||
    !!process.env.CI ||
    !!process.env.SKIP_ENV_VALIDATION)

export const env = createEnv({
  server: {
    AXIOM_TOKEN: z.string().optional(),
    AXIOM_DATASET: z.string().optional(),
    TRIAGE_MODEL: z.string().optional(),
    TRIAGE_LLM_MAX_ATTEMPTS: z.string().regex(/^\d+$/).optional(),
    OPERATIONS_TEAM: z.string().optional(),
    ALARM_SENDER_FINGERPRINT: z.string().optional(),
    DESK_API_BASE: z.string().url().optional(),
    DESK_ACCOUNTS_URL: z.string().url().optional(),
    DESK_ORG_ID: z.string().optional(),
    DESK_CLIENT_ID: z.string().optional(),
    DESK_CLIENT_SECRET: z.string().optional(),
    DESK_REFRESH_TOKEN: z.string().optional(),
    DESK_TEAM_IDS: z.string().optional(),
    DESK_FROM_ADDRESS: z.string().optional(),
    DESK_TICKET_URL: z.string().url().optional(),
    TEAM_WEBHOOKS: z.string().optional(),
    ALLOWED_ACCOUNT_IDS: z.string().optional(),
    CUSTOMER_TEAMS: z.string().optional(),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
  skipValidation: shouldSkipValidation,
})
