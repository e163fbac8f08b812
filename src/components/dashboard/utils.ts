export function formatNumber(num: number): string {
  if (num >= 1_000_000) {
    return `${(num / 1_000_000).toFixed(2)}M`
  }
  if (num >= 1_000) {
    return `${(num / 1_000).toFixed(2)}K`
  }
  return Number.isInteger(num) ? num.toLocaleString() : num.toFixed(1)
}

export function formatDuration(seconds: number): string {
  const totalMinutes = Math.round(seconds / 60)
  if (totalMinutes < 1) {
    return `${Math.round(seconds)}s`
  }
  const hours = Math.floor(totalMinutes / 60)
  const minutes = totalMinutes % 60
  if (hours === 0) {
    return `${minutes}m`
  }
  return `${hours}h ${String(minutes).padStart(2, '0')}m`
}

/**
 * Cell background for a heatmap value, scaled against the matrix maximum
 */
export function heatColor(value: number, max: number): string {
  if (max <= 0 || value <= 0) {
    return 'rgba(31, 41, 55, 0.5)'
  }
  const alpha = 0.15 + 0.85 * Math.min(value / max, 1)
  return `rgba(59, 130, 246, ${alpha.toFixed(2)})`
}

export function matrixMax(values: number[][]): number {
  return values.reduce((max, row) => Math.max(max, ...row), 0)
}
