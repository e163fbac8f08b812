export interface StatCardProps {
  title: string
  value: string
  unit?: string
  subtitle?: string
  // Explains how the figure is computed, shown on hover
  hint?: string
  color?: 'blue' | 'green' | 'purple' | 'orange' | 'cyan'
}

const colorClasses = {
  blue: 'bg-blue-500/10 border-blue-500/20',
  green: 'bg-green-500/10 border-green-500/20',
  purple: 'bg-purple-500/10 border-purple-500/20',
  orange: 'bg-orange-500/10 border-orange-500/20',
  cyan: 'bg-cyan-500/10 border-cyan-500/20'
}

export function StatCard({ title, value, unit, subtitle, hint, color = 'blue' }: StatCardProps) {
  return (
    <div className={`p-6 rounded-lg border ${colorClasses[color]}`} title={hint}>
      <div className="text-sm text-gray-400 mb-1">
        {title}
        {hint && <span className="ml-1 text-gray-600 cursor-help">ⓘ</span>}
      </div>
      <div className="text-3xl font-bold mb-1">
        {value}
        {unit && <span className="ml-1 text-base font-normal text-gray-400">{unit}</span>}
      </div>
      {subtitle && <div className="text-xs text-gray-500">{subtitle}</div>}
    </div>
  )
}
