/**
 * Step 1: NORMALIZE
 *
 * Turns a raw helpdesk ticket body (quoted-printable, HTML, forwarded
 * threads, CloudWatch alarm dumps) into the text a human actually typed, or
 * the structured block an alarm email carries.
 *
 * Pure and synchronous. Always returns non-empty text: placeholders stand in
 * for bodies that have nothing left after cleaning.
 */

import * as cheerio from 'cheerio'
import { type AnyNode, hasChildren, isText } from 'domhandler'
import { decodeHTML } from 'entities'
import quotedPrintable from 'quoted-printable'
import ALARM_SECTION_ENDS from '../data/alarm-section-ends.json'
import type { ExtractionPath, NormalizedMessage } from '../types'

export const EMPTY_BODY_PLACEHOLDER = 'Ticket body is empty.'
export const NO_READABLE_TEXT_PLACEHOLDER =
  'Ticket body contained no readable text.'
export const NO_MEANINGFUL_CONTENT_PLACEHOLDER =
  'No meaningful content found in the ticket body.'

// ============================================================================
// Patterns
// ============================================================================

const HEADER_PATTERN =
  /^(?:Delivered-To|Received|Authentication-Results|ARC|Return-Path|DKIM-Signature|Message-ID|Content-Type|Content-Transfer-Encoding|MIME-Version|X-[\w-]+|Thread-[\w-]+|Received-SPF|SPF|DKIM|DMARC|ARC-Seal|ARC-Message-Signature|ARC-Authentication-Results):.*(?:\n\s+.*)*/gim

export const CLOUDWATCH_PREAMBLE =
  'You are receiving this email because your Amazon CloudWatch Alarm'

const SECTION_END_PATTERNS: RegExp[] = ALARM_SECTION_ENDS.map(
  (source) => new RegExp(`^(?:${source})`, 'im')
)

const STATUS_TOKEN = String.raw`\[[^\]]+\]\s*\[\s*(?:🔴|🟢|⚠️|✅|Down|Up|Critical|OK|Info)[^\]]*\].*`
const STATUS_LINE_PATTERN = new RegExp(`^${STATUS_TOKEN}`, 'iu')
const STATUS_ANYWHERE_PATTERN = new RegExp(STATUS_TOKEN, 'iu')
const TIME_LINE_PATTERN = /^Time \(UTC\):/

const GREETING = String.raw`Hi|Hello|Hey|Hii|Dear|Greetings|Good\s+(?:morning|afternoon|evening)|Hi\s+Team|Hello\s+Team|Hi\s+All|Hello\s+All`
const CLOSING = String.raw`Regards|Thanks|Thank you|Sincerely|Cheers|Best\s+Regards|Warm\s+Regards|Kind\s+Regards|Looking forward to your (?:support|response|insights|reply)|With\s+gratitude|Faithfully|Yours\s+(?:truly|faithfully)`
/** Greeting, then at most 5000 characters, then a closing. */
const GREETING_WINDOW_PATTERN = new RegExp(
  String.raw`\b(?:${GREETING})\b[\s\S]{0,5000}?(?=\n*(?:${CLOSING})\b)`,
  'i'
)

const QUOTED_HISTORY_PATTERN =
  /From: .*|On .* wrote:|Sent from my .*|-----Original Message-----|Begin forwarded message:/i

const SIGNATURE_PATTERNS = [
  /^--\s*$/,
  /^__\s*$/,
  /^Sent from my .*/i,
  /^Sent with .*/i,
  /^Get Outlook for .*/i,
  /^Thanks.*/i,
  /^Regards.*/i,
  /^Cheers.*/i,
]

// ============================================================================
// Transport decoding
// ============================================================================

/**
 * Decode quoted-printable. Text that already carries non-ASCII characters
 * was never QP-encoded and comes back untouched.
 */
export function decodeQuotedPrintable(body: string): string {
  // eslint-disable-next-line no-control-regex
  if (/[^\x00-\x7F]/.test(body)) return body

  const bytes = quotedPrintable.decode(body)
  return Buffer.from(bytes, 'latin1').toString('utf8').replace(/\uFFFD/g, '')
}

/**
 * Visible text of an HTML document, one text node per line.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html)
  $('script, style, noscript').remove()

  const parts: string[] = []
  const visit = (nodes: AnyNode[]): void => {
    for (const node of nodes) {
      if (isText(node)) {
        parts.push(node.data)
      } else if (hasChildren(node)) {
        visit(node.children)
      }
    }
  }
  visit($.root().toArray())

  return decodeHTML(parts.join('\n'))
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r/g, '')
    .replace(/\n+/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .trim()
}

export function stripTransportHeaders(text: string): string {
  return text.replace(HEADER_PATTERN, '').trim()
}

// ============================================================================
// Structured extraction
// ============================================================================

/**
 * Scan for brace-balanced spans and return the first one that parses as
 * JSON, pretty-printed.
 */
export function extractJsonBlock(text: string): string | null {
  let depth = 0
  let start = -1

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (char === '{') {
      if (depth === 0) start = i
      depth++
    } else if (char === '}' && depth > 0) {
      depth--
      if (depth === 0 && start !== -1) {
        const candidate = text.slice(start, i + 1)
        start = -1
        try {
          return JSON.stringify(JSON.parse(candidate), null, 2)
        } catch {
          // not JSON; keep scanning
        }
      }
    }
  }

  return null
}

/**
 * From the CloudWatch preamble to the earliest section-end marker.
 */
export function extractCloudWatchBlock(text: string): string | null {
  const start = text.indexOf(CLOUDWATCH_PREAMBLE)
  if (start === -1) return null

  const content = text.slice(start)
  let end = content.length
  for (const pattern of SECTION_END_PATTERNS) {
    const match = pattern.exec(content)
    if (match && match.index < end) end = match.index
  }

  return content.slice(0, end).trim()
}

/**
 * Uptime-monitor style status lines (`[Service][🔴 Down] ...`) and their
 * `Time (UTC):` lines. Falls back to the subject when the body has none.
 */
export function extractStatusSummary(
  subject: string,
  text: string
): string | null {
  const lines: string[] = []
  for (const raw of text.split('\n')) {
    const line = raw.trim()
    if (!line) continue
    if (STATUS_LINE_PATTERN.test(line) || TIME_LINE_PATTERN.test(line)) {
      lines.push(line)
    }
  }
  if (lines.length > 0) return lines.join('\n')

  const subjectLines = subject
    .split('\n')
    .filter((line) => STATUS_ANYWHERE_PATTERN.test(line))
    .map((line) => line.trim())
  return subjectLines.length > 0 ? subjectLines.join('\n') : null
}

export function extractGreetingWindow(text: string): string | null {
  const match = GREETING_WINDOW_PATTERN.exec(text)
  return match ? match[0].trim() : null
}

// ============================================================================
// Reply-chain cleanup
// ============================================================================

export function stripQuotedHistory(text: string): string {
  const match = QUOTED_HISTORY_PATTERN.exec(text)
  return (match ? text.slice(0, match.index) : text).trim()
}

export function stripSignature(text: string): string {
  const kept: string[] = []
  for (const raw of text.trim().split('\n')) {
    const line = raw.trim()
    if (SIGNATURE_PATTERNS.some((pattern) => pattern.test(line))) break
    kept.push(line)
  }
  return kept.join('\n').trim()
}

// ============================================================================
// Main normalize function
// ============================================================================

function result(
  cleanText: string,
  extractionPath: ExtractionPath
): NormalizedMessage {
  return { cleanText, extractionPath }
}

export function extractMessage(
  subject: string,
  rawBody: string
): NormalizedMessage {
  if (!rawBody.trim()) return result(EMPTY_BODY_PLACEHOLDER, 'empty')

  const decoded = decodeQuotedPrintable(rawBody)
  const visible = collapseWhitespace(htmlToText(decoded))
  if (!visible) {
    return result(NO_READABLE_TEXT_PLACEHOLDER, 'no-readable-text')
  }

  let text = stripTransportHeaders(visible)

  const json = extractJsonBlock(text)
  if (json) return result(json, 'json-block')

  const alarm = extractCloudWatchBlock(text)
  if (alarm) return result(alarm, 'cloudwatch-alarm')

  const summary = extractStatusSummary(subject, text)
  if (summary) return result(summary, 'status-summary')

  let path: ExtractionPath = 'raw'
  const window = extractGreetingWindow(text)
  if (window) {
    text = window
    path = 'greeting-window'
  }

  const cleaned = stripSignature(stripQuotedHistory(text))
  return cleaned
    ? result(cleaned, path)
    : result(NO_MEANINGFUL_CONTENT_PLACEHOLDER, 'no-meaningful-content')
}

export function normalize(subject: string, rawBody: string): string {
  return extractMessage(subject, rawBody).cleanText
}
