// Location log data model
export interface RawSession {
  userId: string
  host: string
  beginAt: Date
  endAt: Date | null // null while the session is still open
}

export interface NormalizedInterval {
  readonly userId: string
  readonly host: string
  readonly beginAt: Date
  readonly endAt: Date
}

export interface HourBucketKey {
  dayOfWeek: number // 0 = Monday, 6 = Sunday
  hour: number // 0-23
}

export type UsageWeighting = 'occurrence' | 'duration'

export interface TimeWindow {
  start: Date
  end: Date
}

export interface AggregateState {
  weighting: UsageWeighting
  hourly: number[]
  daily: number[]
  dayHourMatrix: number[][]
  hostHourMatrix: Map<string, number[]>
  hostOccurrences: Map<string, number>
  hostDurationSeconds: Map<string, number>
  hostSessionCount: Map<string, number>
  totalSessions: number
  uniqueUsers: Set<string>
  uniqueHosts: Set<string>
  totalDurationSeconds: number
  weekly: Map<string, number>
  monthly: Map<string, number>
  // Utilisation window; null when there was nothing to measure
  window: TimeWindow | null
  hostUtilisation: Map<string, number>
  weekdaySessions: number[]
  weekdayDurationSeconds: number[]
  // [dayOfWeek][10-minute slot] session counts, summed over every date seen
  slotOccupancy: number[][]
  weekdayDates: number[]
  cluster: ClusterLayout
  overlappingSessions: number
  skipped: {
    future: number
    inverted: number
  }
}

export interface FetchResult {
  sessions: RawSession[]
  fetchCutoff: Date
  pages: number
  dropped: number
}

// Usage statistics types
export interface HourlyUsageStats {
  hour: number
  label: string
  value: number
}

export interface WeekdayUsageStats {
  weekday: number
  weekdayName: string
  value: number
}

export interface PeriodUsageStats {
  period: string
  sessionCount: number
}

export interface HostUsageStats {
  host: string
  occurrences: number
  sessionCount: number
  totalDurationSeconds: number
  averageSessionDurationSeconds: number
  utilisationPercent: number
}

// Host names such as z1r12p1: zone z1, row 12, position 1
export interface HostLocation {
  zone: string
  row: number
  position: number
}

export interface ClusterComputer {
  host: string
  position: number
  sessionCount: number
  totalDurationSeconds: number
  utilisationPercent: number
}

export interface ClusterRow {
  row: number
  computers: ClusterComputer[]
}

export interface ClusterZone {
  zone: string
  rows: ClusterRow[]
}

export interface ClusterLayout {
  zones: ClusterZone[]
  unplacedHosts: string[]
}

export interface WeekdayTotalsStats {
  weekday: number
  weekdayName: string
  totalSessions: number
  totalUsageSeconds: number
  averageSessions: number
  averageUsageSeconds: number
}

export interface Heatmap {
  rows: string[]
  columns: string[]
  values: number[][]
}

export interface UsageOverview {
  totalSessions: number
  uniqueUsers: number
  uniqueHosts: number
  totalDurationSeconds: number
  averageSessionDurationSeconds: number | null
  skippedRecords: number
  overlappingSessions: number
  dateRange: {
    start: string
    end: string
  }
}

interface UsageStatisticsBase {
  campusId: number
  weighting: UsageWeighting
  overview: UsageOverview
  trends: {
    byHour: HourlyUsageStats[]
    byWeekday: WeekdayUsageStats[]
    byWeek: PeriodUsageStats[]
    byMonth: PeriodUsageStats[]
  }
  heatmaps: {
    dayHour: Heatmap
    hostHour: Heatmap
    // average concurrent sessions per 10-minute slot of each weekday
    occupancy: Heatmap
  }
  weekdayTotals: {
    weeks: number
    days: WeekdayTotalsStats[]
  }
  byHost: HostUsageStats[]
  cluster: ClusterLayout
}

export type UsageStatistics =
  | (UsageStatisticsBase & { status: 'ok' })
  | (UsageStatisticsBase & { status: 'empty'; reason: 'insufficient-data' })
