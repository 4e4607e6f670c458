/**
 * ConflictZoneSystem - Marks nodes where two or more tracks converge.
 */

import type { TrackGraph } from '@/analysis/graph/TrackGraph'

export class ConflictZoneSystem {
  private trackGraph: TrackGraph

  constructor(trackGraph: TrackGraph) {
    this.trackGraph = trackGraph
  }

  /**
   * Single pass over all nodes. Nodes with in-degree >= 2 are promoted to conflict zones;
   * an existing zone keeps the predecessor snapshot from its first classification.
   */
  identifyConflictZones(): Set<string> {
    const zones = new Set<string>()

    for (const node of this.trackGraph.getNodes()) {
      if (this.trackGraph.getInDegree(node.id) < 2) continue
      this.trackGraph.markConflictZone(node.id)
      zones.add(node.id)
    }

    return zones
  }
}
