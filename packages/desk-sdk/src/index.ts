/**
 * Typed helpdesk API SDK with Zod validation
 */

export {
  ErrorResponseSchema,
  TokenResponseSchema,
  type ErrorResponse,
  type TokenResponse,
} from './schemas/common'

export {
  TicketStatusSchema,
  TicketSchema,
  UpdateTicketSchema,
  SendReplySchema,
  ThreadSchema,
  CreateCommentSchema,
  CommentSchema,
  type Ticket,
  type UpdateTicket,
  type SendReply,
  type Thread,
  type CreateComment,
  type Comment,
} from './schemas/ticket'

export {
  DEFAULT_REFRESH_BUFFER_SECONDS,
  DEFAULT_TOKEN_VALIDITY_SECONDS,
  DeskAuthError,
  createMemoryTokenStore,
  createTokenProvider,
  type CachedToken,
  type TokenProvider,
  type TokenProviderConfig,
  type TokenStore,
} from './auth/token'

export {
  DESK_API_BASE,
  DeskApiError,
  createBaseClient,
  type BaseClient,
  type DeskClientConfig,
} from './client/base'
export { createTicketsClient, type TicketsClient } from './client/tickets'

import { type DeskClientConfig, createBaseClient } from './client/base'
import { createTicketsClient } from './client/tickets'

/**
 * Create a helpdesk client with every resource client attached
 *
 * @example
 * ```ts
 * const desk = createDeskClient({
 *   orgId: process.env.DESK_ORG_ID,
 *   tokens: createTokenProvider({ ... }),
 * })
 * await desk.tickets.assignTeam('123', 'team-1')
 * ```
 */
export function createDeskClient(config: DeskClientConfig) {
  const base = createBaseClient(config)
  return {
    tickets: createTicketsClient(base),
  }
}

export type DeskClient = ReturnType<typeof createDeskClient>
