import type { ClusterLayout } from '../../server/types.js'
import { formatDuration, heatColor } from './utils.js'

export interface ClusterMapProps {
  layout: ClusterLayout
}

/**
 * Workstations drawn where they sit, zone by zone and row by row,
 * shaded by utilisation over the selected period.
 */
export function ClusterMap({ layout }: ClusterMapProps) {
  const max = layout.zones.reduce(
    (zoneMax, zone) =>
      zone.rows.reduce(
        (rowMax, row) => row.computers.reduce((value, computer) => Math.max(value, computer.utilisationPercent), rowMax),
        zoneMax
      ),
    0
  )

  return (
    <div className="bg-gray-800/50 rounded-lg p-6 mb-8 border border-gray-700">
      <h2 className="text-2xl font-bold mb-6">Cluster Map</h2>
      {layout.zones.length === 0 ? (
        <div className="h-32 flex items-center justify-center text-gray-500">No workstation names to place</div>
      ) : (
        <div className="grid grid-cols-1 xl:grid-cols-2 gap-6">
          {layout.zones.map((zone) => (
            <div key={zone.zone}>
              <h3 className="text-lg font-semibold mb-3 uppercase">{zone.zone}</h3>
              {zone.rows.map((row) => (
                <div key={row.row} className="flex items-center gap-1 mb-1">
                  <span className="w-10 text-xs text-gray-500 font-mono">r{row.row}</span>
                  {row.computers.map((computer) => (
                    <div
                      key={computer.host}
                      className="w-8 h-6 rounded-sm text-[10px] flex items-center justify-center text-gray-200"
                      style={{ backgroundColor: heatColor(computer.utilisationPercent, max) }}
                      title={`${computer.host}: ${computer.utilisationPercent.toFixed(2)}% used, ${computer.sessionCount} sessions, ${formatDuration(computer.totalDurationSeconds)}`}
                    >
                      p{computer.position}
                    </div>
                  ))}
                </div>
              ))}
            </div>
          ))}
        </div>
      )}
      {layout.unplacedHosts.length > 0 && (
        <p className="text-xs text-gray-500 mt-4">Not placed: {layout.unplacedHosts.join(', ')}</p>
      )}
    </div>
  )
}
