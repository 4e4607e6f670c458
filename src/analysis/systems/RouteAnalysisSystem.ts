/**
 * RouteAnalysisSystem - Lists routes from every entry point to every exit point.
 *
 * The bounded enumeration is the same one signal placement relies on. The unbounded A*
 * route is computed alongside so that pairs only connected beyond the bound are visible.
 */

import type { RouteResult, TrackGraph } from '@/analysis/graph/TrackGraph'
import { MAX_SEARCH_EDGES } from '@/config/analysis'
import type { PathSearchSystem } from './PathSearchSystem'

export interface RouteSummary {
  nodeIds: string[]
  lengthM: number
}

export interface EntryExitRoutes {
  entryId: string
  exitId: string
  /** Simple routes within the search bound, in enumeration order */
  routes: RouteSummary[]
  /** Unbounded shortest route, null when the exit is unreachable */
  shortest: RouteResult | null
  /** A route exists but none fits within the search bound */
  exceedsSearchBound: boolean
}

export class RouteAnalysisSystem {
  private trackGraph: TrackGraph
  private pathSearchSystem: PathSearchSystem

  constructor(trackGraph: TrackGraph, pathSearchSystem: PathSearchSystem) {
    this.trackGraph = trackGraph
    this.pathSearchSystem = pathSearchSystem
  }

  listRoutes(maxEdges = MAX_SEARCH_EDGES): EntryExitRoutes[] {
    const entries = this.trackGraph.getNodeIdsByRole('entry')
    const exits = this.trackGraph.getNodeIdsByRole('exit')
    const out: EntryExitRoutes[] = []

    for (const entryId of entries) {
      for (const exitId of exits) {
        const routes = this.pathSearchSystem
          .enumerateSimplePaths(entryId, exitId, maxEdges)
          .map((nodeIds) => ({ nodeIds, lengthM: this.pathSearchSystem.pathLength(nodeIds) }))
        const shortest = this.trackGraph.findShortestRoute(entryId, exitId)

        out.push({
          entryId,
          exitId,
          routes,
          shortest,
          exceedsSearchBound: routes.length === 0 && shortest !== null,
        })
      }
    }

    return out
  }
}
