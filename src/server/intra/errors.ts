/**
 * Error kinds surfaced by the fetch pipeline.
 * Each carries a stable `code` so callers can decide whether to retry,
 * shrink the date range or give up.
 */
export class UsageStatsError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidParametersError extends UsageStatsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_PARAMETERS', message, details)
  }
}

export class AuthenticationError extends UsageStatsError {
  constructor(message: string, options?: ErrorOptions) {
    super('AUTHENTICATION_FAILED', message, undefined, options)
  }
}

export class RateLimitExceededError extends UsageStatsError {
  constructor(
    public readonly page: number,
    public readonly attempts: number
  ) {
    super('RATE_LIMIT_EXCEEDED', `Rate limit still exceeded on page ${page} after ${attempts} attempts`, {
      page,
      attempts
    })
  }
}

export interface FetchErrorOptions {
  status?: number
  page?: number
  aborted?: boolean
  cause?: unknown
}

export class FetchError extends UsageStatsError {
  public readonly status?: number
  public readonly aborted: boolean

  constructor(message: string, options: FetchErrorOptions = {}) {
    super(
      options.aborted ? 'FETCH_ABORTED' : 'FETCH_FAILED',
      message,
      { status: options.status, page: options.page },
      { cause: options.cause }
    )
    this.status = options.status
    this.aborted = options.aborted ?? false
  }
}
