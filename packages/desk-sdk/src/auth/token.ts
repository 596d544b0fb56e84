import { TokenResponseSchema } from '../schemas/common'

export const DEFAULT_TOKEN_VALIDITY_SECONDS = 3600
export const DEFAULT_REFRESH_BUFFER_SECONDS = 300

export interface CachedToken {
  accessToken: string
  /** Epoch milliseconds */
  expiresAt: number
}

/**
 * Where the current access token lives between calls
 */
export interface TokenStore {
  get(): Promise<CachedToken | null>
  set(token: CachedToken): Promise<void>
  clear(): Promise<void>
}

export function createMemoryTokenStore(): TokenStore {
  let current: CachedToken | null = null
  return {
    async get() {
      return current
    },
    async set(token) {
      current = token
    },
    async clear() {
      current = null
    },
  }
}

/**
 * Raised when the OAuth refresh is refused or unreachable
 */
export class DeskAuthError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message)
    this.name = 'DeskAuthError'
  }
}

export interface TokenProviderConfig {
  accountsUrl: string
  clientId: string
  clientSecret: string
  refreshToken: string
  store?: TokenStore
  now?: () => number
  fetch?: typeof fetch
  validitySeconds?: number
  /** Refresh this long before the token actually expires */
  refreshBufferSeconds?: number
}

export interface TokenProvider {
  getValidToken(): Promise<string>
  invalidate(): Promise<void>
}

/**
 * Refresh-token OAuth flow with a cached access token. Concurrent callers
 * share a single in-flight refresh.
 */
export function createTokenProvider(config: TokenProviderConfig): TokenProvider {
  const store = config.store ?? createMemoryTokenStore()
  const now = config.now ?? Date.now
  const validitySeconds =
    config.validitySeconds ?? DEFAULT_TOKEN_VALIDITY_SECONDS
  const bufferMs =
    (config.refreshBufferSeconds ?? DEFAULT_REFRESH_BUFFER_SECONDS) * 1000

  let inFlight: Promise<string> | null = null

  async function refresh(): Promise<string> {
    const doFetch = config.fetch ?? fetch
    const response = await doFetch(config.accountsUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        refresh_token: config.refreshToken,
        client_id: config.clientId,
        client_secret: config.clientSecret,
        grant_type: 'refresh_token',
      }).toString(),
    })

    if (!response.ok) {
      throw new DeskAuthError(
        `Token refresh failed: ${response.status} ${response.statusText}`,
        response.status
      )
    }

    const parsed = TokenResponseSchema.safeParse(await response.json())
    if (!parsed.success || !parsed.data.access_token) {
      const reason = parsed.success ? parsed.data.error : undefined
      throw new DeskAuthError(
        `Token refresh returned no access token${reason ? `: ${reason}` : ''}`
      )
    }

    const expiresIn = parsed.data.expires_in ?? validitySeconds
    await store.set({
      accessToken: parsed.data.access_token,
      expiresAt: now() + expiresIn * 1000,
    })
    return parsed.data.access_token
  }

  return {
    async getValidToken() {
      const cached = await store.get()
      if (cached && now() < cached.expiresAt - bufferMs) {
        return cached.accessToken
      }

      if (!inFlight) {
        inFlight = refresh().finally(() => {
          inFlight = null
        })
      }
      return inFlight
    },

    async invalidate() {
      await store.clear()
    },
  }
}
