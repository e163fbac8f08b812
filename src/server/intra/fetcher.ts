import { setTimeout as delay } from 'node:timers/promises'
import {
  DEFAULT_API_URL,
  MAX_PAGES,
  MAX_RATE_LIMIT_RETRIES,
  PAGE_SIZE,
  RATE_LIMIT_FALLBACK_DELAY_MS,
  REQUEST_INTERVAL_MS
} from '../constants.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type { FetchResult, RawSession } from '../types.js'
import { TokenManager, type ClientCredentials, type FetchLike } from './auth.js'
import { FetchError, InvalidParametersError, RateLimitExceededError, AuthenticationError } from './errors.js'
import { parseLocationRecord } from './records.js'

export interface LocationFetcherOptions {
  credentials: ClientCredentials
  baseUrl?: string
  pageSize?: number
  maxPages?: number
  maxRateLimitRetries?: number
  rateLimitFallbackDelayMs?: number
  requestIntervalMs?: number
  fetch?: FetchLike
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  now?: () => Date
  logger?: Logger
}

export interface FetchOptions {
  signal?: AbortSignal
  logger?: Logger
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal })
}

// Unread bodies keep the connection busy until they are collected
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel()
}

function abortedError(page: number, cause?: unknown): FetchError {
  return new FetchError(`Fetch aborted before page ${page} completed`, { aborted: true, page, cause })
}

/**
 * Parse a Retry-After header, given either in seconds or as an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: Date): number | null {
  if (!header) return null

  const seconds = Number(header)
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000
  }

  const date = Date.parse(header)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - now.getTime())
}

function validateRequest(campusId: number, since: Date, until: Date, credentials: ClientCredentials): void {
  if (!Number.isInteger(campusId) || campusId <= 0) {
    throw new InvalidParametersError('campusId must be a positive integer', { campusId })
  }
  if (Number.isNaN(since.getTime()) || Number.isNaN(until.getTime())) {
    throw new InvalidParametersError('since and until must be valid dates')
  }
  if (since.getTime() > until.getTime()) {
    throw new InvalidParametersError('since must not be after until', {
      since: since.toISOString(),
      until: until.toISOString()
    })
  }
  if (!credentials.clientId || !credentials.clientSecret) {
    throw new InvalidParametersError('client id and secret are required')
  }
}

/**
 * Pages through a campus' location logs.
 * Pages are requested strictly one after another; the length of page N
 * decides whether page N+1 is requested at all.
 */
export class LocationFetcher {
  private readonly tokens: TokenManager
  private readonly baseUrl: string
  private readonly pageSize: number
  private readonly maxPages: number
  private readonly maxRateLimitRetries: number
  private readonly rateLimitFallbackDelayMs: number
  private readonly requestIntervalMs: number
  private readonly fetchImpl: FetchLike
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly now: () => Date
  private readonly logger: Logger

  constructor(private readonly options: LocationFetcherOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '')
    this.pageSize = options.pageSize ?? PAGE_SIZE
    this.maxPages = options.maxPages ?? MAX_PAGES
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? MAX_RATE_LIMIT_RETRIES
    this.rateLimitFallbackDelayMs = options.rateLimitFallbackDelayMs ?? RATE_LIMIT_FALLBACK_DELAY_MS
    this.requestIntervalMs = options.requestIntervalMs ?? REQUEST_INTERVAL_MS
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? defaultLogger
    this.tokens = new TokenManager({
      baseUrl: this.baseUrl,
      credentials: options.credentials,
      fetch: this.fetchImpl,
      now: this.now,
      logger: this.logger
    })
  }

  /**
   * Fetch every location log of a campus that began within [since, until].
   * Either the whole range is returned or an error is thrown; partial
   * sequences never escape.
   */
  async fetch(campusId: number, since: Date, until: Date, options: FetchOptions = {}): Promise<FetchResult> {
    validateRequest(campusId, since, until, this.options.credentials)

    const { signal } = options
    const log = options.logger ?? this.logger
    const sessions: RawSession[] = []
    let dropped = 0
    let pages = 0

    for (let page = 1; page <= this.maxPages; page++) {
      if (signal?.aborted) throw abortedError(page, signal.reason)

      if (page > 1 && this.requestIntervalMs > 0) {
        await this.pause(this.requestIntervalMs, page, signal)
      }

      const elements = await this.fetchPage(campusId, since, until, page, signal, log)
      pages++

      for (const element of elements) {
        const parsed = parseLocationRecord(element)
        if (parsed.ok) {
          sessions.push(parsed.session)
        } else {
          dropped++
          log.warn({ page, reason: parsed.reason }, 'dropping malformed location record')
        }
      }

      log.debug({ page, records: elements.length }, 'fetched locations page')

      if (elements.length < this.pageSize) break
    }

    log.info({ campusId, pages, sessions: sessions.length, dropped }, 'fetched campus locations')

    return { sessions, fetchCutoff: this.now(), pages, dropped }
  }

  private buildPageUrl(campusId: number, since: Date, until: Date, page: number): string {
    const url = new URL(`${this.baseUrl}/v2/campus/${campusId}/locations`)
    url.searchParams.set('page[size]', String(this.pageSize))
    url.searchParams.set('page[number]', String(page))
    url.searchParams.set('range[begin_at]', `${since.toISOString()},${until.toISOString()}`)
    url.searchParams.set('sort', 'begin_at')
    return url.toString()
  }

  /**
   * Request one page, handling token expiry and rate limiting for that page only.
   */
  private async fetchPage(
    campusId: number,
    since: Date,
    until: Date,
    page: number,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<unknown[]> {
    const url = this.buildPageUrl(campusId, since, until, page)
    let rateLimitRetries = 0
    let refreshed = false

    for (;;) {
      if (signal?.aborted) throw abortedError(page, signal.reason)

      const token = await this.tokens.getToken(signal)
      const response = await this.request(url, token, page, signal)

      if (response.status === 401) {
        await discardBody(response)
        if (refreshed) {
          throw new AuthenticationError(`Access token rejected again on page ${page} after refreshing`)
        }
        refreshed = true
        log.info({ page }, 'access token expired, refreshing')
        this.tokens.invalidate()
        continue
      }

      if (response.status === 429) {
        await discardBody(response)
        if (rateLimitRetries >= this.maxRateLimitRetries) {
          throw new RateLimitExceededError(page, rateLimitRetries + 1)
        }
        rateLimitRetries++
        const waitMs =
          parseRetryAfter(response.headers.get('retry-after'), this.now()) ?? this.rateLimitFallbackDelayMs
        log.warn({ page, waitMs, retry: rateLimitRetries }, 'rate limited, backing off')
        await this.pause(waitMs, page, signal)
        continue
      }

      // Past the last page the API answers 404 rather than an empty list
      if (response.status === 404) {
        await discardBody(response)
        return []
      }

      if (!response.ok) {
        await discardBody(response)
        throw new FetchError(`Locations request for page ${page} failed with status ${response.status}`, {
          status: response.status,
          page
        })
      }

      let body: unknown
      try {
        body = await response.json()
      } catch (error) {
        throw new FetchError(`Page ${page} returned invalid JSON`, { status: response.status, page, cause: error })
      }

      if (!Array.isArray(body)) {
        throw new FetchError(`Page ${page} did not contain a list of locations`, { status: response.status, page })
      }
      return body
    }
  }

  private async request(url: string, token: string, page: number, signal?: AbortSignal): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${token}` },
        signal
      })
    } catch (error) {
      if (signal?.aborted) throw abortedError(page, error)
      throw new FetchError(`Locations request for page ${page} failed`, { page, cause: error })
    }
  }

  private async pause(ms: number, page: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal)
    } catch (error) {
      if (signal?.aborted) throw abortedError(page, error)
      throw error
    }
  }
}
