import type { Heatmap as HeatmapData } from '../../server/types.js'
import { formatNumber, heatColor, matrixMax } from './utils.js'

export interface HeatmapProps {
  title: string
  data: HeatmapData
  emptyMessage?: string
  // Label only every nth column, for wide grids
  labelEvery?: number
}

export function Heatmap({ title, data, emptyMessage = 'No data available', labelEvery = 1 }: HeatmapProps) {
  const max = matrixMax(data.values)

  return (
    <div className="bg-gray-800/50 rounded-lg p-6 mb-8 border border-gray-700">
      <h2 className="text-2xl font-bold mb-6">{title}</h2>
      {data.rows.length === 0 ? (
        <div className="h-32 flex items-center justify-center text-gray-500">{emptyMessage}</div>
      ) : (
        <div className="overflow-x-auto">
          <table className="text-xs border-separate" style={{ borderSpacing: '2px' }}>
            <thead>
              <tr>
                <th />
                {data.columns.map((column, index) => (
                  <th key={column} className={`font-normal text-gray-500 ${labelEvery > 1 ? 'text-left' : 'px-1'}`}>
                    {index % labelEvery === 0 ? column.slice(0, 2) : ''}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {data.rows.map((row, rowIndex) => (
                <tr key={row}>
                  <th className="pr-3 text-right font-mono font-normal text-gray-400 whitespace-nowrap">{row}</th>
                  {data.values[rowIndex].map((value, columnIndex) => (
                    <td
                      key={data.columns[columnIndex]}
                      className={labelEvery > 1 ? 'w-1.5 h-6' : 'w-7 h-6 rounded-sm'}
                      style={{ backgroundColor: heatColor(value, max) }}
                      title={`${row} ${data.columns[columnIndex]}: ${formatNumber(value)}`}
                    />
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  )
}
