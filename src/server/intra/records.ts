import { isValid, parseISO } from 'date-fns'
import { z } from 'zod'
import type { RawSession } from '../types.js'

// Timestamps arrive as ISO strings, or epoch milliseconds from some mirrors
const timestampSchema = z.union([z.string().min(1), z.number()]).transform((value, ctx) => {
  const date = typeof value === 'number' ? new Date(value) : parseISO(value)
  if (!isValid(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' })
    return z.NEVER
  }
  return date
})

const identifierSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim())

const locationSchema = z.object({
  host: z.string().trim().min(1),
  begin_at: timestampSchema,
  end_at: timestampSchema.nullish(),
  user_id: identifierSchema.optional(),
  user: z
    .object({
      id: identifierSchema.optional(),
      login: z.string().optional()
    })
    .nullish()
})

export type ParsedLocation =
  | { ok: true; session: RawSession }
  | { ok: false; reason: string }

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    .join('; ')
}

/**
 * Map one element of a locations page to a RawSession.
 * Never throws: anything unusable comes back as `{ ok: false }` with a reason.
 */
export function parseLocationRecord(element: unknown): ParsedLocation {
  const parsed = locationSchema.safeParse(element)
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) }
  }

  const { host, begin_at, end_at, user, user_id } = parsed.data
  const userId = user?.id || user?.login || user_id
  if (!userId) {
    return { ok: false, reason: 'user: missing identifier' }
  }

  // An end at the epoch means the session was never closed
  const endAt = end_at && end_at.getTime() !== 0 ? end_at : null

  return {
    ok: true,
    session: { userId, host, beginAt: begin_at, endAt }
  }
}
