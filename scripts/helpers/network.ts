/**
 * Small builders shared by the analysis test scripts.
 */

import { TrackGraph } from '../../src/analysis/graph/TrackGraph'
import { ConflictZoneSystem } from '../../src/analysis/systems/ConflictZoneSystem'
import { PathSearchSystem } from '../../src/analysis/systems/PathSearchSystem'
import { SignalPlacementSystem } from '../../src/analysis/systems/SignalPlacementSystem'
import type { NetworkEdge, NetworkNode, Point } from '../../src/types/network'

export const silentLogger = {
  log: (): void => undefined,
  warn: (): void => undefined,
}

export function makeNode(id: string, role: NetworkNode['role'], position: Point = [0, 0]): NetworkNode {
  return { id, role, position }
}

export function makeEdge(fromNodeId: string, toNodeId: string, lengthM: number): NetworkEdge {
  return { fromNodeId, toNodeId, lengthM }
}

export function buildGraph(nodes: NetworkNode[], edges: Array<[string, string, number]>): TrackGraph {
  const graph = new TrackGraph({ logger: silentLogger })
  for (const n of nodes) graph.addNode(n)
  for (const [from, to, length] of edges) graph.addEdge(makeEdge(from, to, length))
  return graph
}

export function makeSystems(graph: TrackGraph): {
  conflictZones: ConflictZoneSystem
  pathSearch: PathSearchSystem
  placement: SignalPlacementSystem
} {
  const conflictZones = new ConflictZoneSystem(graph)
  const pathSearch = new PathSearchSystem(graph)
  const placement = new SignalPlacementSystem(graph, conflictZones, pathSearch, {
    logger: silentLogger,
  })
  return { conflictZones, pathSearch, placement }
}

/** A, B -> M -> EXIT */
export function simpleMerge(): TrackGraph {
  return buildGraph(
    [
      makeNode('A', 'track', [0, 100]),
      makeNode('B', 'track', [0, 0]),
      makeNode('M', 'track', [500, 50]),
      makeNode('EXIT', 'exit', [1000, 50]),
    ],
    [
      ['A', 'M', 550],
      ['B', 'M', 550],
      ['M', 'EXIT', 500],
    ]
  )
}

/** ENTRY1, ENTRY2 -> M1 -> M2 <- ENTRY3, M2 -> EXIT */
export function chainedMerges(): TrackGraph {
  return buildGraph(
    [
      makeNode('ENTRY1', 'entry', [0, 200]),
      makeNode('ENTRY2', 'entry', [0, 100]),
      makeNode('ENTRY3', 'entry', [0, 0]),
      makeNode('M1', 'track', [600, 150]),
      makeNode('M2', 'track', [1200, 100]),
      makeNode('EXIT', 'exit', [1600, 100]),
    ],
    [
      ['ENTRY1', 'M1', 650],
      ['ENTRY2', 'M1', 550],
      ['M1', 'M2', 650],
      ['ENTRY3', 'M2', 1250],
      ['M2', 'EXIT', 400],
    ]
  )
}

/** START -> MID -> CDL <- OTHER */
export function shortApproach(): TrackGraph {
  return buildGraph(
    [
      makeNode('START', 'entry', [0, 0]),
      makeNode('MID', 'track', [300, 0]),
      makeNode('CDL', 'track', [800, 0]),
      makeNode('OTHER', 'track', [0, 100]),
    ],
    [
      ['START', 'MID', 300],
      ['MID', 'CDL', 500],
      ['OTHER', 'CDL', 850],
    ]
  )
}

/** N0 -> N1 -> ... -> N{edgeCount} with 100m edges */
export function chain(
  edgeCount: number,
  firstRole: NetworkNode['role'] = 'track',
  lastRole: NetworkNode['role'] = 'track'
): TrackGraph {
  const nodes: NetworkNode[] = []
  const edges: Array<[string, string, number]> = []
  for (let i = 0; i <= edgeCount; i++) {
    const role = i === 0 ? firstRole : i === edgeCount ? lastRole : 'track'
    nodes.push(makeNode(`N${String(i)}`, role, [i * 100, 0]))
    if (i > 0) edges.push([`N${String(i - 1)}`, `N${String(i)}`, 100])
  }
  return buildGraph(nodes, edges)
}
