/**
 * Graph store tests: referential integrity, overwrite semantics, adjacency queries.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { ReferentialIntegrityError } from '../src/analysis/errors'
import { TrackGraph } from '../src/analysis/graph/TrackGraph'
import { buildGraph, makeEdge, makeNode, silentLogger } from './helpers/network'

describe('TrackGraph', () => {
  it('rejects an edge whose endpoint is missing and creates nothing', () => {
    const graph = new TrackGraph({ logger: silentLogger })
    graph.addNode(makeNode('A', 'track'))

    assert.throws(
      () => graph.addEdge(makeEdge('A', 'B', 100)),
      (error: unknown) => {
        assert.ok(error instanceof ReferentialIntegrityError)
        assert.equal(error.fromNodeId, 'A')
        assert.equal(error.toNodeId, 'B')
        assert.deepEqual(error.missingNodeIds, ['B'])
        return true
      }
    )
    assert.equal(graph.getEdge('A', 'B'), null)
    assert.equal(graph.getEdges().length, 0)
    assert.equal(graph.hasNode('B'), false)
  })

  it('reports each missing endpoint once', () => {
    const graph = new TrackGraph({ logger: silentLogger })

    assert.throws(
      () => graph.addEdge(makeEdge('X', 'Y', 10)),
      (error: unknown) =>
        error instanceof ReferentialIntegrityError &&
        error.missingNodeIds.join(',') === 'X,Y'
    )
    assert.throws(
      () => graph.addEdge(makeEdge('X', 'X', 10)),
      (error: unknown) =>
        error instanceof ReferentialIntegrityError && error.missingNodeIds.join(',') === 'X'
    )
  })

  it('returns predecessors in edge insertion order', () => {
    const graph = buildGraph(
      [makeNode('C', 'track'), makeNode('A', 'track'), makeNode('B', 'track'), makeNode('M', 'track')],
      [
        ['B', 'M', 100],
        ['C', 'M', 100],
        ['A', 'M', 100],
      ]
    )

    assert.deepEqual(graph.getPredecessors('M'), ['B', 'C', 'A'])
    assert.equal(graph.getInDegree('M'), 3)
    assert.deepEqual(graph.getSuccessors('A'), ['M'])
    assert.deepEqual(graph.getPredecessors('A'), [])
  })

  it('returns nothing for unknown ids', () => {
    const graph = new TrackGraph({ logger: silentLogger })
    assert.deepEqual(graph.getPredecessors('nope'), [])
    assert.equal(graph.getInDegree('nope'), 0)
    assert.equal(graph.getNode('nope'), null)
  })

  it('overwrites an edge for the same ordered pair without changing predecessor order', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('M', 'track')],
      [
        ['A', 'M', 100],
        ['B', 'M', 100],
        ['A', 'M', 300],
      ]
    )

    assert.equal(graph.getEdge('A', 'M')?.lengthM, 300)
    assert.equal(graph.getEdges().length, 2)
    assert.deepEqual(graph.getPredecessors('M'), ['A', 'B'])
  })

  it('keeps opposite directions as separate edges', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track')],
      [
        ['A', 'B', 100],
        ['B', 'A', 120],
      ]
    )

    assert.equal(graph.getEdge('A', 'B')?.lengthM, 100)
    assert.equal(graph.getEdge('B', 'A')?.lengthM, 120)
    assert.equal(graph.getInDegree('A'), 1)
    assert.equal(graph.getInDegree('B'), 1)
  })

  it('overwrites a node and drops its previous optional fields', () => {
    const graph = buildGraph([makeNode('A', 'track'), makeNode('M', 'track')], [['A', 'M', 100]])
    graph.addNode({ id: 'A', role: 'track', position: [0, 0], description: 'old' })
    graph.addNode({ id: 'A', role: 'switch', position: [5, 5] })

    const node = graph.getNode('A')
    assert.equal(node?.role, 'switch')
    assert.equal(node?.description, undefined)
    assert.deepEqual(node?.position, [5, 5])
    assert.deepEqual(graph.getPredecessors('M'), ['A'])
  })

  it('accepts negative lengths as given', () => {
    const graph = buildGraph([makeNode('A', 'track'), makeNode('B', 'track')], [['A', 'B', -40]])
    assert.equal(graph.getEdge('A', 'B')?.lengthM, -40)
  })

  it('promotes a node to conflict zone only once', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('M', 'switch')],
      [
        ['A', 'M', 100],
        ['B', 'M', 100],
      ]
    )

    assert.equal(graph.markConflictZone('M'), true)
    assert.equal(graph.markConflictZone('M'), false)
    assert.equal(graph.markConflictZone('missing'), false)
    assert.equal(graph.getNode('M')?.role, 'conflict_zone')
    assert.deepEqual(graph.getNode('M')?.conflict?.incomingNodeIds, ['A', 'B'])
  })

  it('finds the shortest directed route by length', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('C', 'track')],
      [
        ['A', 'B', 100],
        ['B', 'C', 100],
        ['A', 'C', 500],
      ]
    )

    const route = graph.findShortestRoute('A', 'C')
    assert.deepEqual(route?.nodeIds, ['A', 'B', 'C'])
    assert.equal(route?.totalLength, 200)
    assert.equal(graph.findShortestRoute('C', 'A'), null)
    assert.equal(graph.findShortestRoute('A', 'A'), null)
    assert.equal(graph.findShortestRoute('A', 'missing'), null)
  })

  it('loads a network document and logs a summary line', () => {
    const lines: string[] = []
    const graph = new TrackGraph({ logger: { log: (line: string) => lines.push(line) } })
    graph.buildFromNetwork({
      version: 1,
      name: 'Two Nodes',
      nodes: [makeNode('A', 'entry'), makeNode('B', 'exit')],
      edges: [makeEdge('A', 'B', 250)],
    })

    assert.equal(graph.getNodes().length, 2)
    assert.deepEqual(lines, ['TrackGraph: 2 nodes, 1 edges loaded for Two Nodes'])
  })
})
