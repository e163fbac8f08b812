import { z } from 'zod'
import {
  DEFAULT_API_URL,
  DEFAULT_CAMPUS_ID,
  DEFAULT_DAYS,
  DEFAULT_FETCH_TIMEOUT_MS,
  MAX_DAYS
} from './constants.js'
import { InvalidParametersError } from './intra/errors.js'
import type { UsageWeighting } from './types.js'

export interface AppConfig {
  intra: {
    baseUrl: string
    clientId: string
    clientSecret: string
  }
  campusId: number
  days: number
  port?: number
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'
  fetchTimeoutMs: number
  weighting: UsageWeighting
}

const envSchema = z.object({
  INTRA_CLIENT_ID: z.string().min(1),
  INTRA_CLIENT_SECRET: z.string().min(1),
  INTRA_API_URL: z.string().url().default(DEFAULT_API_URL),
  CAMPUS_ID: z.coerce.number().int().positive().default(DEFAULT_CAMPUS_ID),
  DAYS: z.coerce.number().int().min(1).max(MAX_DAYS).default(DEFAULT_DAYS),
  PORT: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  USAGE_WEIGHTING: z.enum(['occurrence', 'duration']).default('occurrence')
})

/**
 * Read the server configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new InvalidParametersError(`Invalid configuration (${problems.join('; ')})`, { problems })
  }

  const values = parsed.data
  return {
    intra: {
      baseUrl: values.INTRA_API_URL,
      clientId: values.INTRA_CLIENT_ID,
      clientSecret: values.INTRA_CLIENT_SECRET
    },
    campusId: values.CAMPUS_ID,
    days: values.DAYS,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    weighting: values.USAGE_WEIGHTING
  }
}
