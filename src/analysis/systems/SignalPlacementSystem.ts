/**
 * SignalPlacementSystem - Places one protective signal per approach of every conflict zone.
 *
 * Placement always starts with a fresh classification pass. Signal ids are derived from
 * the approach and the zone, so a repeated run over the same graph creates nothing new.
 * Approaches without a placement within the search bound are skipped; use
 * CoverageSystem to find them.
 */

import type { TrackGraph } from '@/analysis/graph/TrackGraph'
import { assertSignalDistance } from '@/config/analysis'
import type { ConflictZoneSystem } from './ConflictZoneSystem'
import type { PathSearchSystem } from './PathSearchSystem'

export interface SignalPlacementOptions {
  logger?: Pick<Console, 'log'>
}

export function signalIdFor(approachNodeId: string, zoneId: string): string {
  return `SIG_${approachNodeId}_${zoneId}`
}

export class SignalPlacementSystem {
  private trackGraph: TrackGraph
  private conflictZoneSystem: ConflictZoneSystem
  private pathSearchSystem: PathSearchSystem
  private logger: Pick<Console, 'log'>

  constructor(
    trackGraph: TrackGraph,
    conflictZoneSystem: ConflictZoneSystem,
    pathSearchSystem: PathSearchSystem,
    options: SignalPlacementOptions = {}
  ) {
    this.trackGraph = trackGraph
    this.conflictZoneSystem = conflictZoneSystem
    this.pathSearchSystem = pathSearchSystem
    this.logger = options.logger ?? console
  }

  /**
   * Returns the ids of the signals created by this call, in creation order.
   *
   * Throws InvalidSignalDistanceError for a zero, negative or non-finite distance before
   * anything is classified. A zero distance is not treated as a placement at offset 0.
   */
  placeSignals(signalDistanceM: number): string[] {
    assertSignalDistance(signalDistanceM)

    const zones = this.conflictZoneSystem.identifyConflictZones()
    const created: string[] = []

    for (const zoneId of zones) {
      for (const approachNodeId of this.trackGraph.getPredecessors(zoneId)) {
        const placement = this.pathSearchSystem.findBackwardPlacement(
          zoneId,
          approachNodeId,
          signalDistanceM
        )
        if (!placement) continue

        const signalId = signalIdFor(approachNodeId, zoneId)
        if (this.trackGraph.hasNode(signalId)) continue

        const placementNode = this.trackGraph.getNode(placement.placementNodeId)
        if (!placementNode) continue

        this.trackGraph.addNode({
          id: signalId,
          role: 'signal',
          position: [placementNode.position[0], placementNode.position[1]],
          signal: {
            protectedZoneId: zoneId,
            approachNodeId,
            placementNodeId: placement.placementNodeId,
            distanceToCdlM: signalDistanceM,
            offsetFromPlacementM: placement.offsetFromPlacementM,
          },
        })
        created.push(signalId)

        this.logger.log(
          `SignalPlacementSystem: placed ${signalId} at ${placement.placementNodeId} protecting ${zoneId}`
        )
      }
    }

    return created
  }
}
