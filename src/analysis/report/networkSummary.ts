/**
 * Plain-text summary of an analysed station network.
 */

import type { TrackGraph } from '@/analysis/graph/TrackGraph'
import { StatisticsSystem } from '@/analysis/systems/StatisticsSystem'

const RULE = '='.repeat(70)

export function formatNetworkSummary(trackGraph: TrackGraph, name: string): string {
  const stats = new StatisticsSystem(trackGraph).getStatistics()
  const lines: string[] = [
    RULE,
    `RAILWAY NETWORK SUMMARY: ${name}`,
    RULE,
    '',
    'NETWORK STATISTICS:',
    `  - Total Nodes: ${String(stats.totalNodes)}`,
    `  - Total Edges: ${String(stats.totalEdges)}`,
    `  - Track Nodes: ${String(stats.tracks)}`,
    `  - Switches: ${String(stats.switches)}`,
    `  - Signals: ${String(stats.signals)}`,
    `  - CDL Zones: ${String(stats.conflictZones)}`,
    `  - Platforms: ${String(stats.platforms)}`,
    `  - Total Track Length: ${stats.totalTrackLengthM.toFixed(2)} meters`,
    '',
    'CDL ZONES (Conflict/Merge Points):',
  ]

  const zoneIds = trackGraph.getNodeIdsByRole('conflict_zone').sort()
  for (const zoneId of zoneIds) {
    lines.push(`  - ${zoneId}`)
    lines.push(`    Incoming tracks: ${trackGraph.getPredecessors(zoneId).join(', ')}`)
  }

  lines.push('', 'SIGNALS:')
  const signalIds = trackGraph.getNodeIdsByRole('signal').sort()
  for (const signalId of signalIds) {
    lines.push(`  - ${signalId}`)
    const protection = trackGraph.getNode(signalId)?.signal
    if (!protection) continue
    lines.push(`    Protects CDL Zone: ${protection.protectedZoneId}`)
    lines.push(`    Approach from: ${protection.approachNodeId}`)
    lines.push(`    Distance to CDL: ${String(protection.distanceToCdlM)}m`)
  }

  lines.push('', RULE, '')
  return lines.join('\n')
}
