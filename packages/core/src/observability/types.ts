/**
 * Observability types for Axiom tracing
 */

export interface TraceAttributes {
  ticketId?: string
  step?: string
  category?: string
  [key: string]: string | number | boolean | undefined
}
