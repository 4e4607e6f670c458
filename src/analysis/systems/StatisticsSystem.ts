import type { TrackGraph } from '@/analysis/graph/TrackGraph'
import type { NodeRole } from '@/types/network'

export interface NetworkStatistics {
  totalNodes: number
  totalEdges: number
  nodesByRole: Record<NodeRole, number>
  tracks: number
  switches: number
  platforms: number
  signals: number
  conflictZones: number
  /** Sum of all edge lengths in meters */
  totalTrackLengthM: number
}

export class StatisticsSystem {
  private trackGraph: TrackGraph

  constructor(trackGraph: TrackGraph) {
    this.trackGraph = trackGraph
  }

  getStatistics(): NetworkStatistics {
    const nodesByRole: Record<NodeRole, number> = {
      track: 0,
      switch: 0,
      signal: 0,
      conflict_zone: 0,
      platform: 0,
      entry: 0,
      exit: 0,
    }
    const nodes = this.trackGraph.getNodes()
    for (const node of nodes) nodesByRole[node.role] += 1

    let totalEdges = 0
    let totalTrackLengthM = 0
    for (const edge of this.trackGraph.getEdges()) {
      totalEdges++
      totalTrackLengthM += edge.lengthM
    }

    return {
      totalNodes: nodes.length,
      totalEdges,
      nodesByRole,
      tracks: nodesByRole.track,
      switches: nodesByRole.switch,
      platforms: nodesByRole.platform,
      signals: nodesByRole.signal,
      conflictZones: nodesByRole.conflict_zone,
      totalTrackLengthM,
    }
  }
}
