/**
 * Keyword fallback classifier
 *
 * Used whenever the LLM path fails or returns something unusable.
 * Pure logic - no LLM, no external calls.
 */

import { FAST_PATH_CONFIDENCE, KEYWORD_CONFIDENCE } from '../thresholds'
import type { ClassificationResult, TicketCategory } from '../types'
import { type AlarmFingerprintOptions, isAlarmTicket } from './signals'

// ============================================================================
// Keyword strategies
// ============================================================================

interface KeywordStrategy {
  category: Exclude<TicketCategory, 'custom'>
  /** Lower-case substrings; any hit selects the category */
  keywords: readonly string[]
}

/**
 * Evaluated top to bottom; the first strategy with a hit wins.
 */
export const KEYWORD_STRATEGIES: readonly KeywordStrategy[] = [
  {
    category: 'alarm',
    keywords: [
      'alarm',
      'alert',
      'cloudwatch',
      'metric',
      'threshold',
      'monitoring',
      'cpu',
      'memory',
      'disk',
      'warning',
      'critical',
      'metricnamespace',
      'metricname',
      'dimensions',
      'statistic',
      'period',
      'greaterthanorequaltothreshold',
    ],
  },
  {
    category: 'cost_optimization',
    keywords: [
      'cost',
      'billing',
      'expensive',
      'optimize',
      'budget',
      'spend',
      'charge',
    ],
  },
  {
    category: 'security',
    keywords: [
      'security',
      'access',
      'permission',
      'unauthorized',
      'breach',
      'credential',
      'authentication',
      'iam',
      'policy',
    ],
  },
  {
    category: 'os',
    keywords: [
      'operating system',
      'windows',
      'linux',
      'server',
      'boot',
      'registry',
      'service',
      'process',
      'configuration',
    ],
  },
]

export function fallbackClassify(
  description: string,
  options: AlarmFingerprintOptions = {}
): ClassificationResult {
  if (isAlarmTicket(description, options)) {
    return {
      category: 'alarm',
      confidence: FAST_PATH_CONFIDENCE,
      source: 'fast-path',
    }
  }

  const text = description.toLowerCase()
  const match = KEYWORD_STRATEGIES.find(({ keywords }) =>
    keywords.some((keyword) => text.includes(keyword))
  )
  const category = match?.category ?? 'custom'

  return {
    category,
    confidence: KEYWORD_CONFIDENCE[category],
    source: 'keyword-fallback',
  }
}
