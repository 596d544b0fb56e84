/**
 * Step 2: CLASSIFY
 *
 * Puts a normalized ticket into one of the five categories.
 *
 * Order of attempts:
 * 1. Alarm fingerprint (no LLM)
 * 2. LLM backend, with JSON recovered from whatever shape it answers in
 * 3. Keyword fallback when the backend throws, stalls with a question, or
 *    returns text without JSON
 *
 * Never throws. Every path ends in a ClassificationResult.
 */

import { log, traceClassification } from '../../observability/axiom'
import { FAST_PATH_CONFIDENCE, INVALID_CATEGORY_CONFIDENCE } from '../thresholds'
import {
  type ClassificationResult,
  type LlmBackend,
  TICKET_CATEGORIES,
  type TicketCategory,
} from '../types'
import { fallbackClassify } from './fallback'
import { type AlarmFingerprintOptions, isAlarmTicket } from './signals'

export interface ClassifyOptions extends AlarmFingerprintOptions {
  llm: LlmBackend
}

const UNUSABLE: ClassificationResult = {
  category: 'custom',
  confidence: 0,
  source: 'error',
}

// ============================================================================
// Prompt
// ============================================================================

export function buildClassificationPrompt(text: string): string {
  return `You are a support ticket classifier. Read the customer issue below and respond ONLY with a JSON object containing exactly two fields, "category" and "confidence".

Required JSON format:
{"category": "alarm", "confidence": 0.95}

Categories:
- "cost_optimization": AWS costs, billing, or resource optimization
- "security": Security concerns, access issues, or compliance
- "alarm": CloudWatch alarms, monitoring alerts, system alerts
- "custom": Application-specific issues or business logic problems
- "os": Operating system issues, server configuration problems

Customer ticket:
"${text}"

Respond with ONLY the JSON object, no additional text or explanation.`
}

// ============================================================================
// Response parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isEmptyResponse(response: unknown): boolean {
  if (!response) return true
  return isRecord(response) && Object.keys(response).length === 0
}

const CONVERSATIONAL_PHRASES = [
  'i need to clarify',
  'should i:',
  'which format',
  'want to confirm',
]

/**
 * The backend asked a question instead of answering.
 */
export function isConversationalReply(text: string): boolean {
  const lower = text.toLowerCase()
  return CONVERSATIONAL_PHRASES.some((phrase) => lower.includes(phrase))
}

const JSON_RECOVERY_PATTERNS = [
  /```json\s*(\{[\s\S]*?\})\s*```/,
  /```\s*(\{[\s\S]*?\})\s*```/,
  // first object with up to three levels of nesting
  /\{(?:[^{}]|\{(?:[^{}]|\{[^{}]*\})*\})*\}/,
]

export function extractJsonFromText(
  text: string
): Record<string, unknown> | null {
  for (const pattern of JSON_RECOVERY_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue

    try {
      const parsed: unknown = JSON.parse(match[1] ?? match[0])
      if (isRecord(parsed)) return parsed
    } catch {
      // fall through to the next, looser pattern
    }
  }
  return null
}

function parseConfidence(value: unknown): number | null {
  if (typeof value === 'number') return Number.isNaN(value) ? null : value
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isNaN(parsed) ? null : parsed
  }
  return null
}

function toCategory(value: string): TicketCategory | undefined {
  return TICKET_CATEGORIES.find((category) => category === value)
}

/**
 * Coerce a parsed `{ category, confidence }` object into a result.
 * Unknown labels become `custom` at 0.5; confidence is clamped to [0, 1].
 */
export async function validateClassification(
  parsed: Record<string, unknown>
): Promise<ClassificationResult> {
  const confidence = parseConfidence(parsed.confidence ?? 0)
  // Only an absent category reads as empty; null or any other non-string
  // value makes the response unusable.
  const rawCategory = parsed.category === undefined ? '' : parsed.category

  if (confidence === null || typeof rawCategory !== 'string') {
    await log('error', 'unusable classification fields', {
      workflow: 'triage',
      step: 'classify',
      category: String(rawCategory),
      confidence: String(parsed.confidence),
    })
    return UNUSABLE
  }

  const category = toCategory(rawCategory.toLowerCase().trim())
  if (!category) {
    await log('warn', 'invalid category, defaulting to custom', {
      workflow: 'triage',
      step: 'classify',
      category: rawCategory,
    })
    return {
      category: 'custom',
      confidence: INVALID_CATEGORY_CONFIDENCE,
      source: 'llm',
    }
  }

  if (confidence < 0 || confidence > 1) {
    await log('warn', 'confidence out of range, clamping', {
      workflow: 'triage',
      step: 'classify',
      confidence,
    })
  }

  return {
    category,
    confidence: Math.max(0, Math.min(1, confidence)),
    source: 'llm',
  }
}

async function interpretResponse(
  response: unknown,
  text: string,
  options: ClassifyOptions
): Promise<ClassificationResult> {
  if (isEmptyResponse(response)) {
    await log('error', 'empty classifier response', {
      workflow: 'triage',
      step: 'classify',
    })
    return UNUSABLE
  }

  let raw: string
  if (isRecord(response)) {
    if (typeof response.raw_response === 'string') {
      raw = response.raw_response
    } else if ('category' in response && 'confidence' in response) {
      return validateClassification(response)
    } else {
      raw = JSON.stringify(response)
    }
  } else if (typeof response === 'string') {
    raw = response
  } else {
    await log('error', 'unexpected classifier response type', {
      workflow: 'triage',
      step: 'classify',
      responseType: Array.isArray(response) ? 'array' : typeof response,
    })
    return UNUSABLE
  }

  if (isConversationalReply(raw)) {
    await log('warn', 'classifier answered with a question, using keywords', {
      workflow: 'triage',
      step: 'classify',
    })
    return fallbackClassify(text, options)
  }

  const parsed = extractJsonFromText(raw)
  if (!parsed) {
    await log('warn', 'no JSON in classifier response, using keywords', {
      workflow: 'triage',
      step: 'classify',
      responseLength: raw.length,
    })
    return fallbackClassify(text, options)
  }

  return validateClassification(parsed)
}

// ============================================================================
// Main classify function
// ============================================================================

async function runClassification(
  ticketId: string,
  text: string,
  options: ClassifyOptions
): Promise<ClassificationResult> {
  if (isAlarmTicket(text, options)) {
    return {
      category: 'alarm',
      confidence: FAST_PATH_CONFIDENCE,
      source: 'fast-path',
    }
  }

  let response: unknown
  try {
    response = await options.llm.invoke(
      ticketId,
      buildClassificationPrompt(text)
    )
  } catch (error) {
    await log('warn', 'classifier backend failed, using keywords', {
      workflow: 'triage',
      step: 'classify',
      ticketId,
      error: error instanceof Error ? error.message : String(error),
    })
    return fallbackClassify(text, options)
  }

  return interpretResponse(response, text, options)
}

export async function classify(
  ticketId: string,
  text: string,
  options: ClassifyOptions
): Promise<ClassificationResult> {
  const startTime = Date.now()
  const result = await runClassification(ticketId, text, options)

  await traceClassification({
    ticketId,
    category: result.category,
    confidence: result.confidence,
    source: result.source,
    textLength: text.length,
    durationMs: Date.now() - startTime,
  })

  return result
}
