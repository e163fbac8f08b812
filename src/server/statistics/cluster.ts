import type { ClusterComputer, ClusterLayout, ClusterZone, HostLocation } from '../types.js'

const HOST_PATTERN = /^(.+?)r(\d+)p(\d+)$/

export interface HostTotals {
  host: string
  sessionCount: number
  totalDurationSeconds: number
  utilisationPercent: number
}

/**
 * Parse a workstation name like `z1r12p1` into its zone, row and position.
 */
export function parseHostLocation(host: string): HostLocation | null {
  const match = HOST_PATTERN.exec(host)
  if (!match) return null
  return {
    zone: match[1],
    row: Number(match[2]),
    position: Number(match[3])
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Group hosts by zone, row and position, each level sorted ascending.
 * Hosts whose names do not follow the layout are listed separately.
 */
export function buildClusterLayout(hosts: Iterable<HostTotals>): ClusterLayout {
  const zones = new Map<string, Map<number, ClusterComputer[]>>()
  const unplacedHosts: string[] = []

  for (const totals of hosts) {
    const location = parseHostLocation(totals.host)
    if (!location) {
      unplacedHosts.push(totals.host)
      continue
    }

    let rows = zones.get(location.zone)
    if (!rows) {
      rows = new Map()
      zones.set(location.zone, rows)
    }
    let computers = rows.get(location.row)
    if (!computers) {
      computers = []
      rows.set(location.row, computers)
    }
    computers.push({ ...totals, position: location.position })
  }

  const layout: ClusterZone[] = Array.from(zones.entries())
    .sort(([a], [b]) => compareText(a, b))
    .map(([zone, rows]) => ({
      zone,
      rows: Array.from(rows.entries())
        .sort(([a], [b]) => a - b)
        .map(([row, computers]) => ({
          row,
          computers: computers.sort((a, b) => a.position - b.position || compareText(a.host, b.host))
        }))
    }))

  return { zones: layout, unplacedHosts: unplacedHosts.sort(compareText) }
}
