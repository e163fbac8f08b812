import { useQuery } from '@tanstack/react-query'
import { useState } from 'react'
import { format } from 'date-fns'
import { Bar } from 'react-chartjs-2'
import {
  Chart as ChartJS,
  CategoryScale,
  LinearScale,
  BarElement,
  Title,
  Tooltip,
  Legend
} from 'chart.js'
import type { UsageStatistics, UsageWeighting } from '../server/types.js'
import { ClusterMap } from './dashboard/ClusterMap.js'
import { Heatmap } from './dashboard/Heatmap.js'
import { ProgressBar } from './dashboard/ProgressBar.js'
import { StatCard } from './dashboard/StatCard.js'
import { formatDuration, formatNumber } from './dashboard/utils.js'

// Register Chart.js components
ChartJS.register(
  CategoryScale,
  LinearScale,
  BarElement,
  Title,
  Tooltip,
  Legend
)

type DateRange = '7' | '30' | '60' | '365'

const DATE_RANGES: { value: DateRange; label: string }[] = [
  { value: '7', label: 'Last 7 Days' },
  { value: '30', label: 'Last 30 Days' },
  { value: '60', label: 'Last 60 Days' },
  { value: '365', label: 'Last Year' }
]

const chartOptions = {
  responsive: true,
  maintainAspectRatio: false,
  scales: {
    x: {
      grid: { color: 'rgba(255, 255, 255, 0.1)' },
      ticks: { color: 'rgba(255, 255, 255, 0.6)', maxRotation: 0, autoSkip: true }
    },
    y: {
      grid: { color: 'rgba(255, 255, 255, 0.1)' },
      ticks: { color: 'rgba(255, 255, 255, 0.6)' }
    }
  },
  plugins: {
    legend: { display: false }
  }
}

function UsageBarChart({ title, labels, values }: { title: string; labels: string[]; values: number[] }) {
  return (
    <div className="bg-gray-800/50 rounded-lg p-6 border border-gray-700">
      <h2 className="text-2xl font-bold mb-6">{title}</h2>
      <div className="bg-gray-900/50 rounded p-4 h-72">
        <Bar
          data={{
            labels,
            datasets: [
              {
                label: title,
                data: values,
                backgroundColor: 'rgb(59, 130, 246)',
                borderWidth: 0
              }
            ]
          }}
          options={chartOptions}
        />
      </div>
    </div>
  )
}

export interface DashboardProps {
  campusId?: number
}

function Dashboard({ campusId }: DashboardProps) {
  const [dateRange, setDateRange] = useState<DateRange>('7')
  const [weighting, setWeighting] = useState<UsageWeighting>('occurrence')

  const { data, isLoading, error } = useQuery<UsageStatistics>({
    queryKey: ['usage-statistics', campusId, dateRange, weighting],
    queryFn: async () => {
      const params = new URLSearchParams({ days: dateRange, weighting })
      if (campusId) params.set('campus', String(campusId))
      const response = await fetch(`/api/statistics?${params.toString()}`)
      if (!response.ok) {
        const body: { error?: string } = await response.json().catch(() => ({}))
        throw new Error(body.error || 'Failed to fetch usage statistics')
      }
      return response.json()
    },
    // Fetching a long range walks hundreds of API pages
    staleTime: 5 * 60 * 1000,
    retry: false
  })

  const SkeletonCard = () => (
    <div className="p-6 rounded-lg border bg-gray-800/50 border-gray-700 animate-pulse">
      <div className="h-4 bg-gray-700 rounded w-1/2 mb-3"></div>
      <div className="h-8 bg-gray-700 rounded w-3/4 mb-2"></div>
      <div className="h-3 bg-gray-700 rounded w-1/3"></div>
    </div>
  )

  const renderContent = () => {
    if (error) {
      return (
        <div className="flex items-center justify-center h-96">
          <div className="text-red-400">Error loading statistics: {error.message}</div>
        </div>
      )
    }

    if (!data || data.status === 'empty') {
      return (
        <div className="flex items-center justify-center h-96">
          <div className="text-gray-400">No data available for this period</div>
        </div>
      )
    }

    const { overview, trends, heatmaps, byHost, weekdayTotals } = data
    const unit = data.weighting === 'duration' ? 'minutes' : 'occurrences'
    const maxHostOccurrences = byHost.length > 0 ? byHost[0].occurrences : 0
    const topHostUtilisation =
      byHost.length > 0 ? byHost.reduce((sum, host) => sum + host.utilisationPercent, 0) / byHost.length : 0

    return (
      <>
        <p className="text-gray-400 mb-6">
          Campus {data.campusId} · {format(new Date(overview.dateRange.start), 'MMM d, yyyy')} -{' '}
          {format(new Date(overview.dateRange.end), 'MMM d, yyyy')}
        </p>

        {/* Overview Stats */}
        <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-5 gap-4 mb-8">
          <StatCard
            title="Sessions"
            value={formatNumber(overview.totalSessions)}
            subtitle={
              [
                overview.skippedRecords > 0 ? `${overview.skippedRecords} skipped` : null,
                overview.overlappingSessions > 0 ? `${overview.overlappingSessions} overlapping` : null
              ]
                .filter((part) => part !== null)
                .join(', ') || undefined
            }
            color="blue"
          />
          <StatCard title="Unique Users" value={formatNumber(overview.uniqueUsers)} color="green" />
          <StatCard title="Unique Hosts" value={formatNumber(overview.uniqueHosts)} color="purple" />
          <StatCard
            title="Average Session"
            value={overview.averageSessionDurationSeconds === null ? '-' : formatDuration(overview.averageSessionDurationSeconds)}
            subtitle={`${formatDuration(overview.totalDurationSeconds)} in total`}
            color="orange"
          />
          <StatCard
            title="Top Host Utilisation"
            value={topHostUtilisation.toFixed(1)}
            unit="%"
            hint="Mean share of the period the top hosts had someone logged in"
            color="cyan"
          />
        </div>

        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6 mb-8">
          <UsageBarChart
            title={`By Hour (${unit})`}
            labels={trends.byHour.map((hour) => hour.label)}
            values={trends.byHour.map((hour) => hour.value)}
          />
          <UsageBarChart
            title={`By Weekday (${unit})`}
            labels={trends.byWeekday.map((day) => day.weekdayName.slice(0, 3))}
            values={trends.byWeekday.map((day) => day.value)}
          />
        </div>

        <Heatmap title="Day vs Hour" data={heatmaps.dayHour} />
        <Heatmap title="Top Hosts vs Hour" data={heatmaps.hostHour} emptyMessage="No host activity" />
        <Heatmap title="Average Occupancy (10-minute slots)" data={heatmaps.occupancy} labelEvery={6} />

        {/* Weekday Totals */}
        <div className="bg-gray-800/50 rounded-lg p-6 mb-8 border border-gray-700">
          <h2 className="text-2xl font-bold mb-6">
            Weekday Totals{' '}
            <span className="text-sm font-normal text-gray-500">
              averaged over {weekdayTotals.weeks} {weekdayTotals.weeks === 1 ? 'week' : 'weeks'}
            </span>
          </h2>
          <table className="w-full text-sm">
            <thead>
              <tr className="text-gray-400 text-left">
                <th className="py-1 font-normal">Day</th>
                <th className="py-1 font-normal text-right">Sessions</th>
                <th className="py-1 font-normal text-right">Per Week</th>
                <th className="py-1 font-normal text-right">Usage</th>
                <th className="py-1 font-normal text-right">Per Week</th>
              </tr>
            </thead>
            <tbody>
              {weekdayTotals.days.map((day) => (
                <tr key={day.weekday} className="border-t border-gray-700/50">
                  <td className="py-1">{day.weekdayName}</td>
                  <td className="py-1 text-right">{formatNumber(day.totalSessions)}</td>
                  <td className="py-1 text-right">{day.averageSessions.toFixed(2)}</td>
                  <td className="py-1 text-right">{formatDuration(day.totalUsageSeconds)}</td>
                  <td className="py-1 text-right">{formatDuration(day.averageUsageSeconds)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>

        {/* Top Hosts */}
        <div className="bg-gray-800/50 rounded-lg p-6 mb-8 border border-gray-700">
          <h2 className="text-2xl font-bold mb-6">Top Hosts</h2>
          {byHost.map((host) => (
            <ProgressBar
              key={host.host}
              label={host.host}
              value={host.occurrences}
              max={maxHostOccurrences}
              detail={`${host.sessionCount} sessions, avg ${formatDuration(host.averageSessionDurationSeconds)}, ${host.utilisationPercent.toFixed(2)}% used`}
              color="purple"
            />
          ))}
        </div>

        <ClusterMap layout={data.cluster} />

        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6 mb-8">
          <UsageBarChart
            title="Sessions by Week"
            labels={trends.byWeek.map((week) => week.period)}
            values={trends.byWeek.map((week) => week.sessionCount)}
          />
          <UsageBarChart
            title="Sessions by Month"
            labels={trends.byMonth.map((month) => month.period)}
            values={trends.byMonth.map((month) => month.sessionCount)}
          />
        </div>
      </>
    )
  }

  return (
    <div className="h-full overflow-y-auto bg-gray-900 text-gray-100">
      <div className="max-w-7xl mx-auto p-8">
        <div className="flex flex-wrap items-center justify-between gap-4 mb-2">
          <h1 className="text-4xl font-bold">Cluster Usage</h1>
          <div className="flex gap-2">
            {DATE_RANGES.map((range) => (
              <button
                key={range.value}
                onClick={() => setDateRange(range.value)}
                className={`px-4 py-2 rounded-lg text-sm font-medium transition-colors ${
                  dateRange === range.value
                    ? 'bg-blue-600 text-white'
                    : 'bg-gray-800 text-gray-400 hover:bg-gray-700 hover:text-gray-300'
                }`}
              >
                {range.label}
              </button>
            ))}
            <button
              onClick={() => setWeighting(weighting === 'occurrence' ? 'duration' : 'occurrence')}
              className="px-4 py-2 rounded-lg text-sm font-medium bg-gray-800 text-gray-400 hover:bg-gray-700 hover:text-gray-300"
            >
              {weighting === 'occurrence' ? 'Count occurrences' : 'Weight by minutes'}
            </button>
          </div>
        </div>

        {isLoading ? (
          <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-4 mt-8 mb-8">
            <SkeletonCard />
            <SkeletonCard />
            <SkeletonCard />
            <SkeletonCard />
          </div>
        ) : (
          renderContent()
        )}
      </div>
    </div>
  )
}

export default Dashboard
