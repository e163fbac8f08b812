import { formatNumber } from './utils.js'

export interface ProgressBarProps {
  label: string
  value: number
  max: number
  detail?: string
  color?: 'blue' | 'green' | 'purple' | 'orange'
}

const colorClasses = {
  blue: 'bg-blue-500',
  green: 'bg-green-500',
  purple: 'bg-purple-500',
  orange: 'bg-orange-500'
}

export function ProgressBar({ label, value, max, detail, color = 'blue' }: ProgressBarProps) {
  const percentage = max > 0 ? (value / max) * 100 : 0

  return (
    <div className="mb-4">
      <div className="flex justify-between text-sm mb-1">
        <span className="text-gray-300 font-mono">{label}</span>
        <span className="text-gray-400">
          {formatNumber(value)}
          {detail && <span className="text-gray-500"> · {detail}</span>}
        </span>
      </div>
      <div className="w-full bg-gray-800 rounded-full h-2">
        <div
          className={`h-2 rounded-full transition-all duration-300 ${colorClasses[color]}`}
          style={{ width: `${Math.min(percentage, 100)}%` }}
        />
      </div>
    </div>
  )
}
