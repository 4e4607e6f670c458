/**
 * Conflict zone classification tests.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { ConflictZoneSystem } from '../src/analysis/systems/ConflictZoneSystem'
import {
  buildGraph,
  chain,
  chainedMerges,
  makeEdge,
  makeNode,
  simpleMerge,
} from './helpers/network'

describe('ConflictZoneSystem', () => {
  it('finds the merge point of a simple merge', () => {
    const graph = simpleMerge()
    const zones = new ConflictZoneSystem(graph).identifyConflictZones()

    assert.deepEqual([...zones], ['M'])
    assert.equal(graph.getNode('M')?.role, 'conflict_zone')
    assert.deepEqual(graph.getNode('M')?.conflict?.incomingNodeIds, ['A', 'B'])
    assert.equal(graph.getNode('EXIT')?.role, 'exit')
  })

  it('finds nothing on a linear track', () => {
    const graph = chain(3, 'entry', 'exit')
    const zones = new ConflictZoneSystem(graph).identifyConflictZones()

    assert.equal(zones.size, 0)
    assert.deepEqual(graph.getNodeIdsByRole('conflict_zone'), [])
  })

  it('finds chained merges in node order', () => {
    const zones = new ConflictZoneSystem(chainedMerges()).identifyConflictZones()
    assert.deepEqual([...zones], ['M1', 'M2'])
  })

  it('returns an empty set for an empty graph', () => {
    const zones = new ConflictZoneSystem(buildGraph([], [])).identifyConflictZones()
    assert.equal(zones.size, 0)
  })

  it('rewrites a converging switch to a conflict zone', () => {
    const graph = buildGraph(
      [
        makeNode('T1', 'track'),
        makeNode('T2', 'track'),
        makeNode('SW', 'switch'),
        makeNode('EXIT', 'exit'),
      ],
      [
        ['T1', 'SW', 650],
        ['T2', 'SW', 650],
        ['SW', 'EXIT', 400],
      ]
    )

    const zones = new ConflictZoneSystem(graph).identifyConflictZones()
    assert.deepEqual([...zones], ['SW'])
    assert.equal(graph.getNode('SW')?.role, 'conflict_zone')
  })

  it('marks a node iff its in-degree is at least two', () => {
    const graph = buildGraph(
      [
        makeNode('A', 'entry'),
        makeNode('B', 'entry'),
        makeNode('C', 'track'),
        makeNode('D', 'track'),
        makeNode('E', 'exit'),
        makeNode('F', 'platform'),
      ],
      [
        ['A', 'C', 100],
        ['B', 'C', 100],
        ['C', 'D', 100],
        ['A', 'E', 100],
        ['B', 'E', 100],
        ['D', 'E', 100],
        ['D', 'F', 100],
      ]
    )

    const zones = new ConflictZoneSystem(graph).identifyConflictZones()
    for (const node of graph.getNodes()) {
      assert.equal(zones.has(node.id), graph.getInDegree(node.id) >= 2, node.id)
    }
    assert.deepEqual([...zones], ['C', 'E'])
  })

  it('is idempotent and keeps the first predecessor snapshot', () => {
    const graph = simpleMerge()
    const system = new ConflictZoneSystem(graph)

    const first = system.identifyConflictZones()
    const second = system.identifyConflictZones()
    assert.deepEqual([...second], [...first])

    graph.addNode(makeNode('C', 'track'))
    graph.addEdge(makeEdge('C', 'M', 200))
    const third = system.identifyConflictZones()

    assert.deepEqual([...third], ['M'])
    assert.deepEqual(graph.getPredecessors('M'), ['A', 'B', 'C'])
    assert.deepEqual(graph.getNode('M')?.conflict?.incomingNodeIds, ['A', 'B'])
  })
})
