import { z } from 'zod'
import { DEFAULT_TOKEN_LIFETIME_SECONDS, TOKEN_REFRESH_MARGIN_MS } from '../constants.js'
import type { Logger } from '../logger.js'
import { AuthenticationError, FetchError } from './errors.js'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface ClientCredentials {
  clientId: string
  clientSecret: string
}

export interface TokenManagerOptions {
  baseUrl: string
  credentials: ClientCredentials
  fetch: FetchLike
  now: () => Date
  logger: Logger
  refreshMarginMs?: number
}

interface CachedToken {
  accessToken: string
  expiresAt: number
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional()
})

/**
 * OAuth2 client-credentials token cache.
 * One instance per fetcher; nothing is shared between instances.
 */
export class TokenManager {
  private token: CachedToken | null = null
  private readonly refreshMarginMs: number

  constructor(private readonly options: TokenManagerOptions) {
    this.refreshMarginMs = options.refreshMarginMs ?? TOKEN_REFRESH_MARGIN_MS
  }

  /**
   * Return a bearer token, exchanging credentials first when none is cached
   * or the cached one expires within the refresh margin.
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    if (!this.token || this.isExpiring(this.token)) {
      this.token = await this.requestToken(signal)
    }
    return this.token.accessToken
  }

  /** Drop the cached token so the next `getToken` exchanges credentials again. */
  invalidate(): void {
    this.token = null
  }

  private isExpiring(token: CachedToken): boolean {
    return this.options.now().getTime() >= token.expiresAt - this.refreshMarginMs
  }

  private async requestToken(signal?: AbortSignal): Promise<CachedToken> {
    const { baseUrl, credentials, logger } = this.options
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret
    })

    let response: Response
    try {
      response = await this.options.fetch(`${baseUrl}/oauth/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal
      })
    } catch (error) {
      if (signal?.aborted) {
        throw new FetchError('Token request aborted', { aborted: true, cause: error })
      }
      throw new FetchError('Token request failed', { cause: error })
    }

    if (!response.ok) {
      throw new AuthenticationError(`Token exchange failed with status ${response.status}`)
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new AuthenticationError('Token endpoint returned invalid JSON', { cause: error })
    }

    const parsed = tokenResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new AuthenticationError('Token endpoint returned an unexpected payload', { cause: parsed.error })
    }

    const lifetimeSeconds = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS
    logger.debug({ expiresIn: lifetimeSeconds }, 'obtained access token')

    return {
      accessToken: parsed.data.access_token,
      expiresAt: this.options.now().getTime() + lifetimeSeconds * 1000
    }
  }
}
