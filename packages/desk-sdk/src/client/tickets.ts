import {
  CommentSchema,
  type CreateComment,
  type SendReply,
  ThreadSchema,
  TicketSchema,
  UpdateTicketSchema,
} from '../schemas/ticket'
import type { BaseClient } from './base'

/**
 * Create a tickets client for routing and answering tickets
 */
export function createTicketsClient(client: BaseClient) {
  return {
    /**
     * Move the ticket to a team and clear the assignee so the team queue
     * picks it up
     */
    assignTeam: (id: string, teamId: string) =>
      client.patch(
        `/tickets/${id}`,
        UpdateTicketSchema.parse({ teamId, assigneeId: '' }),
        TicketSchema
      ),

    updateStatus: (id: string, status: string) =>
      client.patch(
        `/tickets/${id}`,
        UpdateTicketSchema.parse({ status }),
        TicketSchema
      ),

    /**
     * Email reply on the ticket thread
     */
    sendReply: (id: string, data: SendReply) =>
      client.post(`/tickets/${id}/sendReply`, data, ThreadSchema),

    /**
     * Add a comment; private unless `isPublic` is set
     */
    addComment: (id: string, data: CreateComment) =>
      client.post(`/tickets/${id}/comments`, data, CommentSchema),
  }
}

export type TicketsClient = ReturnType<typeof createTicketsClient>
