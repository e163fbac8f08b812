import { format } from 'date-fns'
import type { UsageStatistics } from '../types.js'

const RULE = '='.repeat(60)

function formatCount(value: number): string {
  return value.toLocaleString('en-US')
}

function busiest<T extends { value: number }>(entries: T[]): T | null {
  return entries.reduce<T | null>((best, entry) => (best === null || entry.value > best.value ? entry : best), null)
}

/**
 * Plain-text summary of a statistics result
 */
export function formatSummaryReport(statistics: UsageStatistics): string {
  const { overview, trends } = statistics
  const start = format(new Date(overview.dateRange.start), 'yyyy-MM-dd HH:mm')
  const end = format(new Date(overview.dateRange.end), 'yyyy-MM-dd HH:mm')

  const lines = [
    RULE,
    'CLUSTER USAGE STATISTICS SUMMARY',
    RULE,
    '',
    `Campus: ${statistics.campusId}`,
    `Date Range: ${start} to ${end}`,
    ''
  ]

  if (statistics.status === 'empty' || overview.averageSessionDurationSeconds === null) {
    lines.push('No data', RULE)
    return lines.join('\n')
  }

  const averageMinutes = overview.averageSessionDurationSeconds / 60
  const totalHours = overview.totalDurationSeconds / 3600
  const hour = busiest(trends.byHour)
  const weekday = busiest(trends.byWeekday)

  lines.push(
    `Total Sessions: ${formatCount(overview.totalSessions)}`,
    `Unique Users: ${formatCount(overview.uniqueUsers)}`,
    `Unique Hosts: ${formatCount(overview.uniqueHosts)}`,
    '',
    `Average Session Duration: ${averageMinutes.toFixed(2)} minutes (${(averageMinutes / 60).toFixed(2)} hours)`,
    `Total Usage Time: ${totalHours.toFixed(2)} hours (${(totalHours / 24).toFixed(2)} days)`
  )

  if (hour && weekday) {
    lines.push(
      `Busiest Hour: ${hour.label} (${formatCount(hour.value)})`,
      `Busiest Day: ${weekday.weekdayName} (${formatCount(weekday.value)})`
    )
  }

  if (overview.skippedRecords > 0) {
    lines.push(`Skipped Records: ${formatCount(overview.skippedRecords)}`)
  }

  if (overview.overlappingSessions > 0) {
    lines.push(`Overlapping Sessions: ${formatCount(overview.overlappingSessions)}`)
  }

  lines.push(RULE)
  return lines.join('\n')
}
