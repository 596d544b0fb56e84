import { z } from 'zod/v4'

/**
 * Error body returned by the helpdesk API on 4xx/5xx responses
 */
export const ErrorResponseSchema = z.object({
  errorCode: z.string(),
  message: z.string(),
})

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

/**
 * OAuth token endpoint response. A refused refresh still answers 200 with
 * an `error` field.
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().optional(),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  error: z.string().optional(),
})

export type TokenResponse = z.infer<typeof TokenResponseSchema>
