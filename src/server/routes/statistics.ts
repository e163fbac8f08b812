import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { subDays } from 'date-fns'
import { z } from 'zod'
import type { AppConfig } from '../config.js'
import { MAX_DAYS } from '../constants.js'
import {
  AuthenticationError,
  FetchError,
  InvalidParametersError,
  RateLimitExceededError,
  UsageStatsError
} from '../intra/errors.js'
import type { LocationFetcher } from '../intra/fetcher.js'
import { formatSummaryReport } from '../statistics/report.js'
import { getCampusStatistics } from '../statistics/service.js'
import type { UsageStatistics } from '../types.js'

export interface StatisticsRouteOptions {
  config: AppConfig
  fetcher: LocationFetcher
  now?: () => Date
}

const statisticsQuerySchema = z.object({
  campus: z.coerce.number().int().positive().optional(),
  days: z.coerce.number().int().min(1).max(MAX_DAYS).optional(),
  weighting: z.enum(['occurrence', 'duration']).optional()
})

function statusForError(error: unknown): number {
  if (error instanceof InvalidParametersError) return 400
  if (error instanceof RateLimitExceededError) return 429
  if (error instanceof AuthenticationError) return 502
  if (error instanceof FetchError) return error.aborted ? 504 : 502
  return 500
}

function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  const status = statusForError(error)

  if (status === 500 || !(error instanceof UsageStatsError)) {
    request.log.error({ err: error }, 'Error calculating usage statistics')
    return reply.code(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' })
  }

  request.log.warn({ err: error }, 'usage statistics request failed')
  return reply.code(status).send({
    error: error.message,
    code: error.code,
    ...(error instanceof RateLimitExceededError ? { page: error.page } : {})
  })
}

/**
 * Statistics routes
 */
export async function registerStatisticsRoutes(server: FastifyInstance, options: StatisticsRouteOptions) {
  const { config, fetcher } = options
  const now = options.now ?? (() => new Date())

  async function computeStatistics(request: FastifyRequest): Promise<UsageStatistics> {
    const parsed = statisticsQuerySchema.safeParse(request.query)
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      throw new InvalidParametersError(`Invalid query (${problems.join('; ')})`, { problems })
    }

    const campusId = parsed.data.campus ?? config.campusId
    const days = parsed.data.days ?? config.days
    const until = now()
    const since = subDays(until, days)

    return getCampusStatistics(fetcher, {
      campusId,
      since,
      until,
      weighting: parsed.data.weighting ?? config.weighting,
      signal: AbortSignal.timeout(config.fetchTimeoutMs),
      logger: request.log
    })
  }

  server.get('/api/health', async () => ({ status: 'ok' }))

  server.get('/api/statistics', async (request, reply) => {
    try {
      return await computeStatistics(request)
    } catch (error) {
      return sendError(request, reply, error)
    }
  })

  server.get('/api/statistics/report', async (request, reply) => {
    try {
      const statistics = await computeStatistics(request)
      return reply.type('text/plain; charset=utf-8').send(formatSummaryReport(statistics))
    } catch (error) {
      return sendError(request, reply, error)
    }
  })
}
