/**
 * Axiom tracing instrumentation for observability
 *
 * Wraps triage steps, collaborator calls and the dead-letter path with
 * structured traces. Tracks ticketId, step and category.
 */

import { Axiom } from '@axiomhq/js'
import { env } from '../config/env'
import type { TraceAttributes } from './types'

const DEFAULT_DATASET = 'triage-traces'

let axiomClient: Axiom | null = null
let dataset = DEFAULT_DATASET

/**
 * Initialize Axiom client (call once at process startup)
 */
export function initializeAxiom(
  config: { token?: string; dataset?: string } = {}
): void {
  const token = config.token ?? env.AXIOM_TOKEN
  dataset = config.dataset ?? env.AXIOM_DATASET ?? DEFAULT_DATASET

  if (!token) {
    console.warn('[Axiom] AXIOM_TOKEN not set, tracing disabled')
    axiomClient = null
    return
  }

  axiomClient = new Axiom({ token })
}

/**
 * Flush buffered events. Short-lived processes (CLI runs) call this before exit.
 */
export async function flushAxiom(): Promise<void> {
  if (!axiomClient) return
  try {
    await axiomClient.flush()
  } catch (error) {
    console.error('[Axiom] Failed to flush traces:', error)
  }
}

/**
 * Wrap a function execution with tracing
 */
export async function withTracing<T>(
  name: string,
  fn: () => Promise<T>,
  attributes?: TraceAttributes
): Promise<T> {
  const startTime = Date.now()

  try {
    const result = await fn()

    await sendTrace({
      name,
      status: 'success',
      durationMs: Date.now() - startTime,
      ...attributes,
    })

    return result
  } catch (error) {
    await sendTrace({
      name,
      status: 'error',
      durationMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
      errorStack: error instanceof Error ? error.stack : undefined,
      ...attributes,
    })

    throw error
  }
}

/**
 * Send trace data to Axiom
 */
async function sendTrace(trace: Record<string, unknown>): Promise<void> {
  if (!axiomClient) {
    // Not initialized (no AXIOM_TOKEN): skip
    return
  }

  try {
    await axiomClient.ingest(dataset, {
      _time: new Date().toISOString(),
      ...trace,
    })
  } catch (error) {
    // Observability failures never fail a ticket
    console.error('[Axiom] Failed to send trace:', error)
  }
}

// ============================================================================
// Generic logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Log a message to Axiom with optional metadata.
 *
 * Levels map to success/status for error-rate calculations:
 * - debug/info/warn => success=true, status='success'
 * - error           => success=false, status='error'
 */
export async function log(
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>
): Promise<void> {
  const isError = level === 'error'
  const reservedFields = {
    name: 'log',
    type: 'log',
    status: isError ? 'error' : 'success',
    success: !isError,
    level,
    message,
  }

  await sendTrace({
    ...metadata,
    ...reservedFields,
  })
}

// ============================================================================
// Rich trace functions
// ============================================================================

/**
 * Trace a classification result
 */
export async function traceClassification(data: {
  ticketId: string
  category: string
  confidence: number
  source: string
  textLength: number
  durationMs: number
}): Promise<void> {
  await sendTrace({
    name: 'classifier.run',
    type: 'classification',
    ...data,
  })
}

/**
 * Trace a routing decision
 */
export async function traceRouting(data: {
  ticketId: string
  ticketType: string
  category: string | null
  confidence: number
  handler: string | null
  earlyExitReason: string | null
  statusCode: number
  totalDurationMs: number
}): Promise<void> {
  await sendTrace({
    name: 'router.decision',
    type: 'routing',
    ...data,
  })
}

/**
 * Trace a dead-letter write or replay
 */
export async function traceDeadLetter(data: {
  ticketId?: string
  operation: 'enqueue' | 'replay' | 'discard'
  success: boolean
  error?: string
}): Promise<void> {
  await sendTrace({
    name: `dlq.${data.operation}`,
    type: 'dead-letter',
    ...data,
  })
}

/**
 * Run one triage step with start/end logging. Errors are re-thrown after
 * logging so the dispatcher's outer boundary still sees them.
 */
export async function traceStep<T>(
  context: { step: string; ticketId: string },
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now()

  await log('debug', `${context.step} step started`, {
    workflow: 'triage',
    ...context,
  })

  try {
    const result = await fn()

    await sendTrace({
      name: `workflow.step.${context.step}`,
      type: 'workflow-step',
      workflow: 'triage',
      ...context,
      durationMs: Date.now() - startTime,
      success: true,
    })

    return result
  } catch (error) {
    await log('error', `${context.step} step failed`, {
      workflow: 'triage',
      ...context,
      durationMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
    })

    throw error
  }
}
