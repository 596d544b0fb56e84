/**
 * Step 3: RESOLVE
 *
 * Decides whether the classification is acted on, overridden, or sent to
 * manual review. Pure logic - no LLM, no external calls.
 */

import { CLIENT_OVERRIDE_CONFIDENCE, meetsConfidenceFloor } from '../thresholds'
import type { ClassificationResult, TicketCategory, TicketType } from '../types'

export interface ResolveInput {
  ticketType: TicketType
  classification: ClassificationResult
}

type ResolutionOutcome =
  | { action: 'dispatch'; category: TicketCategory; confidence: number }
  | {
      action: 'manual_review'
      category: TicketCategory | null
      confidence: number
    }

export type Resolution = ResolutionOutcome & { rule: string; reason: string }

interface ResolutionRule {
  name: string
  condition: (input: ResolveInput) => boolean
  resolve: (input: ResolveInput) => ResolutionOutcome
  reason: string
}

// ============================================================================
// Resolution rules
// ============================================================================

const RESOLUTION_RULES: ResolutionRule[] = [
  // Human-written subject wins over whatever the model said
  {
    name: 'client_override',
    condition: ({ ticketType }) => ticketType === 'client',
    resolve: () => ({
      action: 'dispatch',
      category: 'custom',
      confidence: CLIENT_OVERRIDE_CONFIDENCE,
    }),
    reason: 'Subject reads as a customer request',
  },

  {
    name: 'low_confidence_review',
    condition: ({ classification }) =>
      !classification.category ||
      !meetsConfidenceFloor(classification.confidence),
    resolve: ({ classification }) => ({
      action: 'manual_review',
      category: classification.category || null,
      confidence: classification.confidence,
    }),
    reason: 'Classification below the confidence floor',
  },
]

const DISPATCH_RULE: ResolutionRule = {
  name: 'dispatch_classified',
  condition: () => true,
  resolve: ({ classification }) => ({
    action: 'dispatch',
    category: classification.category,
    confidence: classification.confidence,
  }),
  reason: 'Confident classification',
}

export function resolvePriority(input: ResolveInput): Resolution {
  const rule =
    RESOLUTION_RULES.find((candidate) => candidate.condition(input)) ??
    DISPATCH_RULE

  return { ...rule.resolve(input), rule: rule.name, reason: rule.reason }
}
