/**
 * CoverageSystem - Checks that every approach of every conflict zone has a protecting signal.
 */

import type { TrackGraph } from '@/analysis/graph/TrackGraph'

export interface ZoneCoverage {
  zoneId: string
  approachNodeIds: string[]
  protectingSignalIds: string[]
  /** Approaches no signal references */
  missingApproachIds: string[]
  /** protecting / approaches, 0 when the zone has no approaches */
  coverageRatio: number
  complete: boolean
}

export class CoverageSystem {
  private trackGraph: TrackGraph

  constructor(trackGraph: TrackGraph) {
    this.trackGraph = trackGraph
  }

  getCoverage(): ZoneCoverage[] {
    const signalsByZone = new Map<string, Array<{ id: string; approachNodeId: string }>>()
    for (const node of this.trackGraph.getNodes()) {
      if (node.role !== 'signal' || !node.signal) continue
      const entry = { id: node.id, approachNodeId: node.signal.approachNodeId }
      const list = signalsByZone.get(node.signal.protectedZoneId)
      if (list) list.push(entry)
      else signalsByZone.set(node.signal.protectedZoneId, [entry])
    }

    const out: ZoneCoverage[] = []
    for (const zoneId of this.trackGraph.getNodeIdsByRole('conflict_zone')) {
      const approachNodeIds = this.trackGraph.getPredecessors(zoneId)
      const signals = signalsByZone.get(zoneId) ?? []
      const covered = new Set(signals.map((s) => s.approachNodeId))
      const missingApproachIds = approachNodeIds.filter((id) => !covered.has(id))

      out.push({
        zoneId,
        approachNodeIds,
        protectingSignalIds: signals.map((s) => s.id),
        missingApproachIds,
        coverageRatio: approachNodeIds.length > 0 ? signals.length / approachNodeIds.length : 0,
        complete: approachNodeIds.length > 0 && missingApproachIds.length === 0,
      })
    }

    return out
  }
}
