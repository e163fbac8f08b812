import { differenceInWeeks } from 'date-fns'
import { DAYS_PER_WEEK, HOURS_PER_DAY, SLOTS_PER_DAY, SLOT_MINUTES, WEEKDAY_NAMES } from '../constants.js'
import type { LocationFetcher } from '../intra/fetcher.js'
import type { Logger } from '../logger.js'
import type {
  AggregateState,
  Heatmap,
  HostUsageStats,
  HourlyUsageStats,
  PeriodUsageStats,
  UsageStatistics,
  UsageWeighting,
  WeekdayTotalsStats,
  WeekdayUsageStats
} from '../types.js'
import { aggregateSessions, rankHosts } from './aggregator.js'

export interface StatisticsRange {
  campusId: number
  since: Date
  until: Date
}

export interface CampusStatisticsRequest extends StatisticsRange {
  weighting?: UsageWeighting
  signal?: AbortSignal
  logger?: Logger
}

const pad2 = (value: number) => String(value).padStart(2, '0')

export const HOUR_LABELS = Array.from({ length: HOURS_PER_DAY }, (_, hour) => `${pad2(hour)}:00`)

export const SLOT_LABELS = Array.from({ length: SLOTS_PER_DAY }, (_, slot) => {
  const minutes = slot * SLOT_MINUTES
  return `${pad2(Math.floor(minutes / 60))}:${pad2(minutes % 60)}`
})

const round2 = (value: number) => Math.round(value * 100) / 100

/**
 * Whole weeks the utilisation window spans, never less than one.
 */
export function weeksCovered(state: AggregateState): number {
  if (!state.window) return 1
  return Math.max(1, differenceInWeeks(state.window.end, state.window.start))
}

function buildWeekdayTotals(state: AggregateState): { weeks: number; days: WeekdayTotalsStats[] } {
  const weeks = weeksCovered(state)
  return {
    weeks,
    days: state.weekdaySessions.map((totalSessions, weekday) => {
      const totalUsageSeconds = state.weekdayDurationSeconds[weekday]
      return {
        weekday,
        weekdayName: WEEKDAY_NAMES[weekday],
        totalSessions,
        totalUsageSeconds,
        averageSessions: round2(totalSessions / weeks),
        averageUsageSeconds: round2(totalUsageSeconds / weeks)
      }
    })
  }
}

// Average concurrent sessions: slot totals over the number of dates of that weekday seen
function buildOccupancyHeatmap(state: AggregateState): Heatmap {
  return {
    rows: WEEKDAY_NAMES.slice(0, DAYS_PER_WEEK),
    columns: SLOT_LABELS,
    values: state.slotOccupancy.map((row, weekday) => {
      const dates = state.weekdayDates[weekday]
      return row.map((total) => (dates > 0 ? round2(total / dates) : 0))
    })
  }
}

function sortPeriods(map: Map<string, number>): PeriodUsageStats[] {
  return Array.from(map.entries())
    .map(([period, sessionCount]) => ({ period, sessionCount }))
    .sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0))
}

function buildHostHeatmap(state: AggregateState, hosts: string[]): Heatmap {
  return {
    rows: hosts,
    columns: HOUR_LABELS,
    values: hosts.map((host) => [...(state.hostHourMatrix.get(host) ?? new Array<number>(HOURS_PER_DAY).fill(0))])
  }
}

/**
 * Turn an aggregate state into presentation-ready statistics.
 * A state without sessions yields the explicit empty result, with
 * zero-filled series so renderers can still draw their axes.
 */
export function buildUsageStatistics(state: AggregateState, range: StatisticsRange): UsageStatistics {
  const hosts = rankHosts(state.hostOccurrences)

  const byHour: HourlyUsageStats[] = state.hourly.map((value, hour) => ({
    hour,
    label: HOUR_LABELS[hour],
    value
  }))

  const byWeekday: WeekdayUsageStats[] = state.daily.map((value, weekday) => ({
    weekday,
    weekdayName: WEEKDAY_NAMES[weekday],
    value
  }))

  const byHost: HostUsageStats[] = hosts.map((host) => {
    const sessionCount = state.hostSessionCount.get(host) ?? 0
    const totalDurationSeconds = state.hostDurationSeconds.get(host) ?? 0
    return {
      host,
      occurrences: state.hostOccurrences.get(host) ?? 0,
      sessionCount,
      totalDurationSeconds,
      averageSessionDurationSeconds: sessionCount > 0 ? totalDurationSeconds / sessionCount : 0,
      utilisationPercent: state.hostUtilisation.get(host) ?? 0
    }
  })

  const base = {
    campusId: range.campusId,
    weighting: state.weighting,
    overview: {
      totalSessions: state.totalSessions,
      uniqueUsers: state.uniqueUsers.size,
      uniqueHosts: state.uniqueHosts.size,
      totalDurationSeconds: state.totalDurationSeconds,
      averageSessionDurationSeconds:
        state.totalSessions > 0 ? state.totalDurationSeconds / state.totalSessions : null,
      skippedRecords: state.skipped.future + state.skipped.inverted,
      overlappingSessions: state.overlappingSessions,
      dateRange: {
        start: range.since.toISOString(),
        end: range.until.toISOString()
      }
    },
    trends: {
      byHour,
      byWeekday,
      byWeek: sortPeriods(state.weekly),
      byMonth: sortPeriods(state.monthly)
    },
    heatmaps: {
      dayHour: {
        rows: WEEKDAY_NAMES.slice(0, DAYS_PER_WEEK),
        columns: HOUR_LABELS,
        values: state.dayHourMatrix.map((row) => [...row])
      },
      hostHour: buildHostHeatmap(state, hosts),
      occupancy: buildOccupancyHeatmap(state)
    },
    weekdayTotals: buildWeekdayTotals(state),
    byHost,
    cluster: state.cluster
  }

  if (state.totalSessions === 0) {
    return { ...base, status: 'empty', reason: 'insufficient-data' }
  }
  return { ...base, status: 'ok' }
}

/**
 * Fetch, aggregate and summarize one campus over a date range.
 */
export async function getCampusStatistics(
  fetcher: LocationFetcher,
  request: CampusStatisticsRequest
): Promise<UsageStatistics> {
  const { campusId, since, until, weighting, signal, logger } = request
  const { sessions, fetchCutoff } = await fetcher.fetch(campusId, since, until, { signal, logger })
  const state = aggregateSessions(sessions, fetchCutoff, {
    weighting,
    window: { start: since, end: until },
    logger
  })
  return buildUsageStatistics(state, { campusId, since, until })
}
