/**
 * Inbound webhook event parsing
 *
 * The helpdesk posts either the ticket fields directly or an HTTP envelope
 * whose `body` is the JSON-encoded ticket. Address fields arrive as a
 * string, a list, or a one-element list holding a comma-joined string.
 */

import { z } from 'zod'
import { ValidationError } from '../../errors'
import type { Ticket } from '../types'

const AddressFieldSchema = z
  .union([z.string(), z.array(z.string())])
  .nullish()

const IdSchema = z.union([z.string(), z.number()]).nullish()

export const TicketEventSchema = z.object({
  ticketId: IdSchema,
  ticketSubject: z.string().nullish(),
  ticketBody: z.string().nullish(),
  fromEmail: AddressFieldSchema,
  toEmail: AddressFieldSchema,
  ccEmail: AddressFieldSchema,
  zohoAccountId: IdSchema,
})

export type TicketEvent = z.infer<typeof TicketEventSchema>

const ADDRESS_PATTERN = /[\w.!#$%&'*+\/=?^`{|}~-]+@[\w.-]+/
const ANGLE_ADDRESS_PATTERN = /<([^<>]+)>/

/**
 * The `<...>` part when present, otherwise the first thing that looks like
 * an address, otherwise the trimmed item.
 */
export function cleanAddress(address: string): string {
  const angle = ANGLE_ADDRESS_PATTERN.exec(address)
  if (angle?.[1]?.trim()) return angle[1].trim().toLowerCase()

  const match = ADDRESS_PATTERN.exec(address)
  return (match ? match[0] : address.trim()).toLowerCase()
}

/** Split on commas outside quoted display names and `<...>` */
export function splitAddressList(list: string): string[] {
  const items: string[] = []
  let current = ''
  let quoted = false
  let angled = false

  for (const char of list) {
    if (char === '"' && !angled) quoted = !quoted
    else if (char === '<' && !quoted) angled = true
    else if (char === '>' && !quoted) angled = false

    if (char === ',' && !quoted && !angled) {
      items.push(current)
      current = ''
    } else {
      current += char
    }
  }
  items.push(current)
  return items
}

/**
 * Flatten an address field into a list of bare, lower-cased addresses.
 * Display names (`"Jane" <jane@example.com>`) are dropped.
 */
export function normalizeAddresses(
  field: string | string[] | null | undefined
): string[] {
  if (!field) return []

  let items = typeof field === 'string' ? [field] : field
  const [only] = items
  if (items.length === 1 && only?.includes(',')) {
    items = splitAddressList(only)
  }

  return items
    .map((item) => item.trim())
    .filter(Boolean)
    .map(cleanAddress)
}

/**
 * The customer is the last address that looks like an email across
 * cc, to and from, in that order.
 */
export function findCustomerEmail(ticket: Ticket): string | null {
  const all = [
    ...ticket.ccAddresses,
    ...ticket.toAddresses,
    ...ticket.fromAddresses,
  ].filter((address) => ADDRESS_PATTERN.test(address))
  return all.at(-1) ?? null
}

function unwrapEnvelope(event: unknown): unknown {
  if (
    typeof event === 'object' &&
    event !== null &&
    'body' in event &&
    typeof event.body === 'string'
  ) {
    try {
      return JSON.parse(event.body)
    } catch (error) {
      throw new ValidationError({
        message: 'Request body is not valid JSON',
        cause: error,
      })
    }
  }
  return event
}

/**
 * Parse a webhook event into a Ticket. Throws ValidationError (400) on a
 * malformed payload or a missing subject, body or ticket id.
 */
export function parseTicketEvent(event: unknown): Ticket {
  const result = TicketEventSchema.safeParse(unwrapEnvelope(event))
  if (!result.success) {
    throw new ValidationError({
      message: 'Invalid ticket event',
      details: {
        issues: result.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`
        ),
      },
    })
  }

  const data = result.data
  if (!data.ticketSubject || !data.ticketBody) {
    throw new ValidationError({
      message: "Missing 'ticketSubject' or 'ticketBody' in input",
    })
  }
  if (
    data.ticketId === null ||
    data.ticketId === undefined ||
    data.ticketId === ''
  ) {
    throw new ValidationError({ message: "Missing 'ticketId' in input" })
  }

  return {
    id: String(data.ticketId),
    subject: data.ticketSubject,
    rawBody: data.ticketBody,
    fromAddresses: normalizeAddresses(data.fromEmail),
    toAddresses: normalizeAddresses(data.toEmail),
    ccAddresses: normalizeAddresses(data.ccEmail),
    deskAccountId:
      data.zohoAccountId === null || data.zohoAccountId === undefined
        ? undefined
        : String(data.zohoAccountId),
  }
}
