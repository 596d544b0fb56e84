import type { z } from 'zod/v4'
import type { TokenProvider } from '../auth/token'
import { ErrorResponseSchema } from '../schemas/common'

export const DESK_API_BASE = 'https://desk.zoho.com/api/v1'

/**
 * Configuration for the helpdesk API client
 */
export interface DeskClientConfig {
  /** Organization the tickets belong to, sent as the `orgId` header */
  orgId: string
  /** Supplies a fresh OAuth access token per request */
  tokens: TokenProvider
  /** Optional base URL override (defaults to the US data center) */
  baseUrl?: string
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
}

/**
 * Custom error class for helpdesk API errors
 */
export class DeskApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message)
    this.name = 'DeskApiError'
  }
}

/**
 * Uses Retry-After header if present, otherwise exponential backoff
 */
function rateLimitDelay(response: Response, attempt: number): number {
  const retryAfter = response.headers.get('Retry-After')
  return retryAfter
    ? parseInt(retryAfter, 10) * 1000
    : Math.min(1000 * Math.pow(2, attempt), 30000)
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Create a base HTTP client with authentication and error handling.
 * Retries 429s, and retries once with a new token after a 401.
 */
export function createBaseClient(config: DeskClientConfig) {
  const baseUrl = config.baseUrl ?? DESK_API_BASE
  const sleep = config.sleep ?? defaultSleep

  async function send(
    method: string,
    path: string,
    body?: unknown,
    maxRetries = 3
  ): Promise<Response> {
    const doFetch = config.fetch ?? fetch
    const url = path.startsWith('http') ? path : `${baseUrl}${path}`
    let refreshed = false

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const token = await config.tokens.getValidToken()
      const response = await doFetch(url, {
        method,
        headers: {
          Authorization: `Zoho-oauthtoken ${token}`,
          orgId: config.orgId,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      })

      if (response.status === 429) {
        await sleep(rateLimitDelay(response, attempt))
        continue
      }

      if (response.status === 401 && !refreshed) {
        refreshed = true
        await config.tokens.invalidate()
        continue
      }

      if (!response.ok) {
        const errorData: unknown = await response.json().catch(() => ({}))
        const parsed = ErrorResponseSchema.safeParse(errorData)
        if (parsed.success) {
          throw new DeskApiError(
            response.status,
            parsed.data.errorCode,
            parsed.data.message
          )
        }
        throw new DeskApiError(
          response.status,
          'UNKNOWN_ERROR',
          response.statusText
        )
      }

      return response
    }

    throw new DeskApiError(429, 'RATE_LIMITED', 'Max retries exceeded')
  }

  /**
   * Request whose response body is validated against `schema`
   */
  async function request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<T> {
    const response = await send(method, path, body)
    const data: unknown =
      response.status === 204 ? undefined : await response.json()
    return schema.parse(data)
  }

  return {
    post: <T>(path: string, body: unknown, schema: z.ZodType<T>) =>
      request('POST', path, schema, body),

    patch: <T>(path: string, body: unknown, schema: z.ZodType<T>) =>
      request('PATCH', path, schema, body),
  }
}

/**
 * Type for the base client instance
 */
export type BaseClient = ReturnType<typeof createBaseClient>
