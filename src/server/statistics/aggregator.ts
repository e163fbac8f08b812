import { format, getISOWeek, getISOWeekYear } from 'date-fns'
import { DAYS_PER_WEEK, HOURS_PER_DAY, SLOTS_PER_DAY, TOP_HOSTS } from '../constants.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type { AggregateState, NormalizedInterval, RawSession, TimeWindow, UsageWeighting } from '../types.js'
import { buildClusterLayout } from './cluster.js'
import { decomposeInterval, overlappedSlots, type HourSlice } from './decompose.js'

const MS_PER_MINUTE = 60_000

export interface AggregateOptions {
  // 'occurrence' counts one per bucket touched; 'duration' adds the minutes spent in it
  weighting?: UsageWeighting
  topHosts?: number
  // Utilisation is measured against this window; defaults to first session start .. fetchCutoff
  window?: TimeWindow
  logger?: Logger
}

export type NormalizeResult =
  | { ok: true; interval: NormalizedInterval }
  | { ok: false; reason: 'future' | 'inverted' }

function createHourRow(): number[] {
  return new Array<number>(HOURS_PER_DAY).fill(0)
}

function createWeekRow(): number[] {
  return new Array<number>(DAYS_PER_WEEK).fill(0)
}

/**
 * Create empty aggregate state
 */
export function createEmptyAggregateState(weighting: UsageWeighting = 'occurrence'): AggregateState {
  return {
    weighting,
    hourly: createHourRow(),
    daily: createWeekRow(),
    dayHourMatrix: Array.from({ length: DAYS_PER_WEEK }, () => createHourRow()),
    hostHourMatrix: new Map(),
    hostOccurrences: new Map(),
    hostDurationSeconds: new Map(),
    hostSessionCount: new Map(),
    totalSessions: 0,
    uniqueUsers: new Set(),
    uniqueHosts: new Set(),
    totalDurationSeconds: 0,
    weekly: new Map(),
    monthly: new Map(),
    window: null,
    hostUtilisation: new Map(),
    weekdaySessions: createWeekRow(),
    weekdayDurationSeconds: createWeekRow(),
    slotOccupancy: Array.from({ length: DAYS_PER_WEEK }, () => new Array<number>(SLOTS_PER_DAY).fill(0)),
    weekdayDates: createWeekRow(),
    cluster: { zones: [], unplacedHosts: [] },
    overlappingSessions: 0,
    skipped: { future: 0, inverted: 0 }
  }
}

/**
 * Close a raw session against the fetch cutoff.
 */
export function normalizeSession(session: RawSession, fetchCutoff: Date): NormalizeResult {
  if (session.beginAt.getTime() > fetchCutoff.getTime()) {
    return { ok: false, reason: 'future' }
  }

  const endAt = session.endAt ?? fetchCutoff
  if (endAt.getTime() < session.beginAt.getTime()) {
    return { ok: false, reason: 'inverted' }
  }

  return {
    ok: true,
    interval: Object.freeze({
      userId: session.userId,
      host: session.host,
      beginAt: session.beginAt,
      endAt
    })
  }
}

/**
 * Hosts ordered by occurrence count descending, ties by identifier ascending.
 */
export function rankHosts(occurrences: Map<string, number>): string[] {
  return Array.from(occurrences.entries())
    .sort(([hostA, countA], [hostB, countB]) => {
      if (countA !== countB) return countB - countA
      return hostA < hostB ? -1 : hostA > hostB ? 1 : 0
    })
    .map(([host]) => host)
}

/**
 * Share of a window, in percent with two decimals, that the intervals cover.
 * Overlapping intervals are summed, not merged.
 */
export function utilisationPercent(intervals: readonly NormalizedInterval[], window: TimeWindow): number {
  const windowMs = window.end.getTime() - window.start.getTime()
  if (windowMs <= 0) return 0

  let usedMs = 0
  for (const interval of intervals) {
    const start = Math.max(interval.beginAt.getTime(), window.start.getTime())
    const end = Math.min(interval.endAt.getTime(), window.end.getTime())
    if (end > start) usedMs += end - start
  }
  return Math.round((usedMs / windowMs) * 10_000) / 100
}

/**
 * Count the sessions on one host that start before an earlier one on that host has ended.
 */
export function countOverlaps(
  intervals: readonly NormalizedInterval[],
  onOverlap?: (interval: NormalizedInterval) => void
): number {
  const sorted = [...intervals].sort(
    (a, b) => a.beginAt.getTime() - b.beginAt.getTime() || a.endAt.getTime() - b.endAt.getTime()
  )

  let overlaps = 0
  let latestEnd = Number.NEGATIVE_INFINITY
  for (const interval of sorted) {
    if (interval.beginAt.getTime() < latestEnd) {
      overlaps++
      onOverlap?.(interval)
    }
    latestEnd = Math.max(latestEnd, interval.endAt.getTime())
  }
  return overlaps
}

function retainHosts<T>(map: Map<string, T>, hosts: Set<string>): void {
  for (const host of map.keys()) {
    if (!hosts.has(host)) map.delete(host)
  }
}

function increment(map: Map<string, number>, key: string, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + amount)
}

function addWeight(state: AggregateState, hostRow: number[], slice: HourSlice, weight: number): void {
  state.hourly[slice.hour] += weight
  state.daily[slice.dayOfWeek] += weight
  state.dayHourMatrix[slice.dayOfWeek][slice.hour] += weight
  hostRow[slice.hour] += weight
}

function defaultWindow(intervals: readonly NormalizedInterval[], fetchCutoff: Date): TimeWindow | null {
  if (intervals.length === 0) return null
  const start = intervals.reduce(
    (earliest, interval) => Math.min(earliest, interval.beginAt.getTime()),
    Number.POSITIVE_INFINITY
  )
  return { start: new Date(start), end: fetchCutoff }
}

/**
 * Aggregate raw sessions into hourly, weekday, heatmap and per-host structures.
 *
 * Each session is clamped to `fetchCutoff` when still open, split at every
 * local hour boundary, and counted once per (day, hour) bucket it touches.
 * A session spanning several buckets therefore contributes several
 * occurrences, so the series sums can exceed `totalSessions`.
 */
export function aggregateSessions(
  sessions: readonly RawSession[],
  fetchCutoff: Date,
  options: AggregateOptions = {}
): AggregateState {
  const weighting = options.weighting ?? 'occurrence'
  const topHosts = options.topHosts ?? TOP_HOSTS
  const log = options.logger ?? defaultLogger
  const state = createEmptyAggregateState(weighting)

  const intervals: NormalizedInterval[] = []
  const intervalsByHost = new Map<string, NormalizedInterval[]>()
  const hostDurationMs = new Map<string, number>()
  const weekdayDurationMs = createWeekRow()
  const datesByWeekday = Array.from({ length: DAYS_PER_WEEK }, () => new Set<string>())
  let totalDurationMs = 0

  for (const session of sessions) {
    const normalized = normalizeSession(session, fetchCutoff)
    if (!normalized.ok) {
      state.skipped[normalized.reason]++
      log.warn(
        { reason: normalized.reason, host: session.host, beginAt: session.beginAt.toISOString() },
        'skipping unusable session'
      )
      continue
    }

    const interval = normalized.interval
    intervals.push(interval)
    const hostIntervals = intervalsByHost.get(interval.host)
    if (hostIntervals) {
      hostIntervals.push(interval)
    } else {
      intervalsByHost.set(interval.host, [interval])
    }

    state.totalSessions++
    state.uniqueUsers.add(interval.userId)
    state.uniqueHosts.add(interval.host)
    increment(state.hostSessionCount, interval.host, 1)

    let hostRow = state.hostHourMatrix.get(interval.host)
    if (!hostRow) {
      hostRow = createHourRow()
      state.hostHourMatrix.set(interval.host, hostRow)
    }

    // A session longer than a week comes back to buckets it already touched
    const touched = new Set<number>()
    const weekdays = new Set<number>()

    for (const slice of decomposeInterval(interval.beginAt, interval.endAt)) {
      const bucket = slice.dayOfWeek * HOURS_PER_DAY + slice.hour
      const firstTouch = !touched.has(bucket)
      touched.add(bucket)
      weekdays.add(slice.dayOfWeek)

      if (firstTouch) increment(state.hostOccurrences, interval.host, 1)

      if (weighting === 'duration') {
        addWeight(state, hostRow, slice, slice.durationMs / MS_PER_MINUTE)
      } else if (firstTouch) {
        addWeight(state, hostRow, slice, 1)
      }

      increment(hostDurationMs, interval.host, slice.durationMs)
      weekdayDurationMs[slice.dayOfWeek] += slice.durationMs
      totalDurationMs += slice.durationMs
    }

    for (const weekday of weekdays) state.weekdaySessions[weekday]++

    // The repeated hour of a DST fall-back maps to the same slot twice
    const occupied = new Set<string>()
    for (const touch of overlappedSlots(interval.beginAt, interval.endAt)) {
      const key = `${touch.date}#${touch.slot}`
      if (occupied.has(key)) continue
      occupied.add(key)
      state.slotOccupancy[touch.dayOfWeek][touch.slot]++
      datesByWeekday[touch.dayOfWeek].add(touch.date)
    }
  }

  // Trends: one count per session, keyed on where it began
  for (const interval of intervals) {
    const week = `${getISOWeekYear(interval.beginAt)}-W${String(getISOWeek(interval.beginAt)).padStart(2, '0')}`
    increment(state.weekly, week, 1)
    increment(state.monthly, format(interval.beginAt, 'yyyy-MM'), 1)
  }

  state.totalDurationSeconds = totalDurationMs / 1000
  for (const [host, durationMs] of hostDurationMs) {
    state.hostDurationSeconds.set(host, durationMs / 1000)
  }
  state.weekdayDurationSeconds = weekdayDurationMs.map((ms) => ms / 1000)
  state.weekdayDates = datesByWeekday.map((dates) => dates.size)

  state.window = options.window ?? defaultWindow(intervals, fetchCutoff)
  const window = state.window
  for (const [host, hostIntervals] of intervalsByHost) {
    state.hostUtilisation.set(host, window ? utilisationPercent(hostIntervals, window) : 0)
    state.overlappingSessions += countOverlaps(hostIntervals, (interval) => {
      log.warn({ host, beginAt: interval.beginAt.toISOString() }, 'overlapping sessions on one host')
    })
  }

  state.cluster = buildClusterLayout(
    Array.from(intervalsByHost.keys(), (host) => ({
      host,
      sessionCount: state.hostSessionCount.get(host) ?? 0,
      totalDurationSeconds: state.hostDurationSeconds.get(host) ?? 0,
      utilisationPercent: state.hostUtilisation.get(host) ?? 0
    }))
  )

  const kept = new Set(rankHosts(state.hostOccurrences).slice(0, topHosts))
  retainHosts(state.hostHourMatrix, kept)
  retainHosts(state.hostOccurrences, kept)
  retainHosts(state.hostDurationSeconds, kept)
  retainHosts(state.hostSessionCount, kept)
  retainHosts(state.hostUtilisation, kept)

  log.debug(
    { sessions: state.totalSessions, skipped: state.skipped, hosts: state.uniqueHosts.size },
    'aggregated sessions'
  )

  return state
}
