/**
 * PathSearchSystem - Bounded simple-path enumeration and backward signal placement.
 *
 * Placement walks the shortest enumerated approach path back from the conflict zone and
 * stops on the first edge that covers the requested sighting distance.
 */

import { MAX_SEARCH_EDGES } from '@/config/analysis'
import type { TrackGraph } from '@/analysis/graph/TrackGraph'

export interface BackwardPlacement {
  /** Upstream end of the edge the signal belongs on (or the path origin) */
  placementNodeId: string
  /** Requested distance minus the length already walked back, 0 at the path origin */
  offsetFromPlacementM: number
  /** Chosen approach path, origin first, zone last */
  path: string[]
  /** Total length of the chosen path in meters */
  pathLengthM: number
}

export class PathSearchSystem {
  private trackGraph: TrackGraph

  constructor(trackGraph: TrackGraph) {
    this.trackGraph = trackGraph
  }

  /**
   * Sum of the edge lengths along `path`. A pair without an edge contributes 0.
   */
  pathLength(path: string[]): number {
    let total = 0
    for (let i = 0; i < path.length - 1; i++) {
      const fromId = path[i]
      const toId = path[i + 1]
      if (fromId === undefined || toId === undefined) continue
      total += this.trackGraph.getEdge(fromId, toId)?.lengthM ?? 0
    }
    return total
  }

  /**
   * All simple paths from `fromNodeId` to `toNodeId` with at most `maxEdges` edges, in
   * depth-first order over successors by insertion.
   */
  enumerateSimplePaths(fromNodeId: string, toNodeId: string, maxEdges = MAX_SEARCH_EDGES): string[][] {
    const paths: string[][] = []
    if (fromNodeId === toNodeId) return paths
    if (!this.trackGraph.hasNode(fromNodeId) || !this.trackGraph.hasNode(toNodeId)) return paths
    if (maxEdges < 1) return paths

    const stack: string[] = [fromNodeId]
    const onStack = new Set<string>([fromNodeId])

    const visit = (nodeId: string): void => {
      for (const next of this.trackGraph.getSuccessors(nodeId)) {
        if (onStack.has(next)) continue
        if (next === toNodeId) {
          paths.push([...stack, next])
          continue
        }
        // a detour through `next` reaches the target in at least stack.length + 1 edges
        if (stack.length + 1 > maxEdges) continue

        stack.push(next)
        onStack.add(next)
        visit(next)
        stack.pop()
        onStack.delete(next)
      }
    }

    visit(fromNodeId)
    return paths
  }

  findBackwardPlacement(
    zoneId: string,
    approachNodeId: string,
    signalDistanceM: number
  ): BackwardPlacement | null {
    const paths = this.enumerateSimplePaths(approachNodeId, zoneId)
    const [first, ...rest] = paths
    if (!first) return null

    // The first path stands unless a later one is strictly shorter (NaN never is).
    let path = first
    let pathLengthM = this.pathLength(first)
    for (const candidate of rest) {
      const length = this.pathLength(candidate)
      if (length < pathLengthM) {
        path = candidate
        pathLengthM = length
      }
    }

    let accumulated = 0
    for (let i = path.length - 1; i > 0; i--) {
      const current = path[i]
      const previous = path[i - 1]
      if (current === undefined || previous === undefined) continue

      const segmentLength = this.trackGraph.getEdge(previous, current)?.lengthM ?? 0
      if (accumulated + segmentLength >= signalDistanceM) {
        return {
          placementNodeId: previous,
          offsetFromPlacementM: signalDistanceM - accumulated,
          path,
          pathLengthM,
        }
      }
      accumulated += segmentLength
    }

    // Approach shorter than the sighting distance: as far back as the track allows.
    return { placementNodeId: approachNodeId, offsetFromPlacementM: 0, path, pathLengthM }
  }
}
