import type { TicketCategory } from './types'

/** Below this, no handler acts on its own; the ticket goes to manual review. */
export const CONFIDENCE_FLOOR = 0.7

/** Alarm indicators that must co-occur before the fast path bypasses the LLM. */
export const ALARM_INDICATOR_MINIMUM = 4

export const FAST_PATH_CONFIDENCE = 0.95

/** Confidence forced onto tickets whose subject reads as human-written. */
export const CLIENT_OVERRIDE_CONFIDENCE = 1.0

/** Used when a classifier returns a label outside the taxonomy. */
export const INVALID_CATEGORY_CONFIDENCE = 0.5

export const KEYWORD_CONFIDENCE: Record<TicketCategory, number> = {
  alarm: 0.8,
  cost_optimization: 0.7,
  security: 0.7,
  os: 0.7,
  custom: 0.5,
}

export function meetsConfidenceFloor(confidence: number): boolean {
  return confidence >= CONFIDENCE_FLOOR
}
