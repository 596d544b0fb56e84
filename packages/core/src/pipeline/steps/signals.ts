/**
 * Deterministic ticket signals
 *
 * Cheap checks that run before (or instead of) the LLM: the CloudWatch
 * alarm fingerprint and the subject-line heuristic that tells automated
 * alerts from customer-written tickets.
 */

import { DEFAULT_ALARM_SENDER } from '../../config'
import { ALARM_INDICATOR_MINIMUM } from '../thresholds'
import type { TicketType } from '../types'

// ============================================================================
// Alarm fingerprint
// ============================================================================

/** Case-sensitive substrings found in CloudWatch alarm notifications */
export const ALARM_INDICATORS = [
  'Subject: ALARM:',
  'MetricNamespace:',
  'MetricName:',
  'Dimensions:',
  'Threshold:',
  'ALARM state',
  'GreaterThanOrEqualToThreshold',
  'Feedback-ID: ::1.ap-south-1', // SES relay that forwards the alarms
] as const

export interface AlarmFingerprintOptions {
  /** Mailbox the alarm notifications arrive from */
  senderFingerprint?: string
}

/**
 * Number of distinct alarm indicators present in the text.
 */
export function countAlarmIndicators(
  description: string,
  options: AlarmFingerprintOptions = {}
): number {
  const indicators = [
    ...ALARM_INDICATORS,
    options.senderFingerprint ?? DEFAULT_ALARM_SENDER,
  ]
  return indicators.filter((indicator) => description.includes(indicator))
    .length
}

export function isAlarmTicket(
  description: string,
  options: AlarmFingerprintOptions = {}
): boolean {
  return countAlarmIndicators(description, options) >= ALARM_INDICATOR_MINIMUM
}

// ============================================================================
// Subject heuristic
// ============================================================================

const ALARM_SUBJECT_PREFIXES = [
  /^\[?alarm[:\]]/,
  /^alarm[:\s]/,
  /^health event[:\s\]]?/,
  /^incident[:\s\]]?/,
  /^\[?alert[:\s\]]?/,
  /^\[alert\]/,
  /^\[alert\]\s*\[firing\]/,
  /^\[action required\]/,
  /^\[firing[:\s\]]?/,
  /^\[resolved[:\s\]]?/,
]

const ALARM_SUBJECT_INDICATORS = [
  // uptime monitors
  /\bdown\b/,
  /\bup\b.*\b200\s*-\s*ok\b/,
  /status code\s*5\d\d/,
  /\b(request|connection)\s*failed\b/,
  /\bserver error\b/,
  /request failed with status code\s*5\d\d/,
  /\bpodrestart\b/,
  // billing notifications
  /cost anomaly detected/,
  /aws cost management/,
  /aws budgets?.*exceed(ed|ing)?/,
  /\bmonthly[_\s-]?budget\b/,
  /exceeded.*alert threshold/,
  /\baction may be required\b/,
  // release bots
  /docker v\d+\.\d+\.\d+/,
]

/**
 * `alarm` when the subject looks machine-generated, `client` otherwise.
 */
export function inferTypeFromSubject(subject: string): TicketType {
  const normalized = subject.toLowerCase().trim()

  if (ALARM_SUBJECT_PREFIXES.some((pattern) => pattern.test(normalized))) {
    return 'alarm'
  }
  if (ALARM_SUBJECT_INDICATORS.some((pattern) => pattern.test(normalized))) {
    return 'alarm'
  }
  return 'client'
}
