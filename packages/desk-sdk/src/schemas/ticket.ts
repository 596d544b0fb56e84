import { z } from 'zod/v4'

export const TicketStatusSchema = z.string()

/**
 * Ticket resource. Only the fields this client reads are declared; the rest
 * pass through untouched.
 */
export const TicketSchema = z.looseObject({
  id: z.string(),
  ticketNumber: z.string().optional(),
  subject: z.string().nullish(),
  status: TicketStatusSchema.nullish(),
  teamId: z.string().nullish(),
  assigneeId: z.string().nullish(),
})

export type Ticket = z.infer<typeof TicketSchema>

export const UpdateTicketSchema = z.object({
  teamId: z.string().optional(),
  /** Empty string clears the assignee so the team queue picks it up */
  assigneeId: z.string().optional(),
  status: TicketStatusSchema.optional(),
})

export type UpdateTicket = z.infer<typeof UpdateTicketSchema>

export const SendReplySchema = z.object({
  channel: z.literal('EMAIL'),
  fromEmailAddress: z.string(),
  to: z.string(),
  cc: z.string().optional(),
  contentType: z.enum(['html', 'plainText']),
  content: z.string(),
})

export type SendReply = z.infer<typeof SendReplySchema>

export const ThreadSchema = z.looseObject({
  id: z.string(),
  channel: z.string().optional(),
  direction: z.string().optional(),
})

export type Thread = z.infer<typeof ThreadSchema>

export const CreateCommentSchema = z.object({
  isPublic: z.boolean(),
  contentType: z.enum(['html', 'plainText']),
  content: z.string(),
})

export type CreateComment = z.infer<typeof CreateCommentSchema>

export const CommentSchema = z.looseObject({
  id: z.string(),
  isPublic: z.boolean().optional(),
  content: z.string().optional(),
})

export type Comment = z.infer<typeof CommentSchema>
