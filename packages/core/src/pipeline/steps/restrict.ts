/**
 * Account restriction gate
 *
 * Tickets that name an AWS account are only handled automatically when the
 * account is on the support allow-list. Anything else goes to operations.
 */

import { log } from '../../observability/axiom'
import type { AccountRestrictionStore } from '../types'

const ACCOUNT_LINE_PATTERN = /AWS\s+Account\s*:\s*(\d{12})/i
const ACCOUNT_ID_PATTERN = /^\d{12}$/

/**
 * Twelve-digit AWS account id from an `AWS Account: ...` line, or from the
 * `accountId` field when the whole text is a JSON object.
 */
export function extractAccountId(text: string): string | null {
  const match = ACCOUNT_LINE_PATTERN.exec(text)
  if (match?.[1]) return match[1]

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'accountId' in parsed &&
    typeof parsed.accountId === 'string' &&
    ACCOUNT_ID_PATTERN.test(parsed.accountId)
  ) {
    return parsed.accountId
  }
  return null
}

export type RestrictionVerdict =
  | { status: 'unidentified' }
  | { status: 'supported'; accountId: string }
  | { status: 'unsupported'; accountId: string }

/**
 * The account id comes from the first text that carries one. A store
 * failure counts as "not supported": the ticket is routed to a human rather
 * than acted on.
 */
export async function checkAccountRestriction(
  ticketId: string,
  text: string | string[],
  store: AccountRestrictionStore
): Promise<RestrictionVerdict> {
  const candidates = typeof text === 'string' ? [text] : text
  const accountId =
    candidates.map(extractAccountId).find((id) => id !== null) ?? null
  if (!accountId) return { status: 'unidentified' }

  let supported: boolean
  try {
    supported = await store.isSupported(accountId)
  } catch (error) {
    await log('error', 'restriction store lookup failed', {
      workflow: 'triage',
      step: 'restrict',
      ticketId,
      accountId,
      error: error instanceof Error ? error.message : String(error),
    })
    supported = false
  }

  return supported
    ? { status: 'supported', accountId }
    : { status: 'unsupported', accountId }
}
