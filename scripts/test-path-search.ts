/**
 * Path enumeration, path length and backward placement tests.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { PathSearchSystem } from '../src/analysis/systems/PathSearchSystem'
import { MAX_SEARCH_EDGES } from '../src/config/analysis'
import { buildGraph, chain, makeNode, shortApproach, simpleMerge } from './helpers/network'

describe('PathSearchSystem.pathLength', () => {
  it('sums consecutive edge lengths', () => {
    const search = new PathSearchSystem(simpleMerge())
    assert.equal(search.pathLength(['A', 'M', 'EXIT']), 1050)
  })

  it('counts a pair without an edge as zero', () => {
    const search = new PathSearchSystem(simpleMerge())
    assert.equal(search.pathLength(['A', 'EXIT']), 0)
    assert.equal(search.pathLength(['B', 'M', 'A']), 550)
  })

  it('is zero for empty and single-node paths', () => {
    const search = new PathSearchSystem(simpleMerge())
    assert.equal(search.pathLength([]), 0)
    assert.equal(search.pathLength(['A']), 0)
  })
})

describe('PathSearchSystem.enumerateSimplePaths', () => {
  it('visits successors in insertion order', () => {
    const graph = buildGraph(
      [makeNode('X', 'track'), makeNode('Y', 'track'), makeNode('Z', 'track')],
      [
        ['X', 'Z', 400],
        ['X', 'Y', 100],
        ['Y', 'Z', 100],
      ]
    )

    assert.deepEqual(new PathSearchSystem(graph).enumerateSimplePaths('X', 'Z'), [
      ['X', 'Z'],
      ['X', 'Y', 'Z'],
    ])
  })

  it('never repeats a node', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('C', 'track')],
      [
        ['A', 'B', 100],
        ['B', 'A', 100],
        ['B', 'C', 100],
      ]
    )

    assert.deepEqual(new PathSearchSystem(graph).enumerateSimplePaths('A', 'C'), [['A', 'B', 'C']])
  })

  it('stops at the search bound', () => {
    assert.equal(MAX_SEARCH_EDGES, 10)

    const atBound = new PathSearchSystem(chain(10))
    assert.equal(atBound.enumerateSimplePaths('N0', 'N10').length, 1)

    const beyondBound = new PathSearchSystem(chain(11))
    assert.deepEqual(beyondBound.enumerateSimplePaths('N0', 'N11'), [])
    assert.equal(beyondBound.enumerateSimplePaths('N0', 'N11', 11).length, 1)
  })

  it('yields nothing from a node to itself or for unknown nodes', () => {
    const search = new PathSearchSystem(simpleMerge())
    assert.deepEqual(search.enumerateSimplePaths('M', 'M'), [])
    assert.deepEqual(search.enumerateSimplePaths('A', 'missing'), [])
    assert.deepEqual(search.enumerateSimplePaths('EXIT', 'A'), [])
  })
})

describe('PathSearchSystem.findBackwardPlacement', () => {
  it('places on the first edge that covers the distance', () => {
    const search = new PathSearchSystem(simpleMerge())
    const placement = search.findBackwardPlacement('M', 'A', 500)

    assert.equal(placement?.placementNodeId, 'A')
    assert.equal(placement?.offsetFromPlacementM, 500)
    assert.deepEqual(placement?.path, ['A', 'M'])
    assert.equal(placement?.pathLengthM, 550)
  })

  it('walks back over several edges before placing', () => {
    const search = new PathSearchSystem(shortApproach())

    const onLastEdge = search.findBackwardPlacement('CDL', 'START', 500)
    assert.equal(onLastEdge?.placementNodeId, 'MID')
    assert.equal(onLastEdge?.offsetFromPlacementM, 500)

    const onFirstEdge = search.findBackwardPlacement('CDL', 'START', 700)
    assert.equal(onFirstEdge?.placementNodeId, 'START')
    assert.equal(onFirstEdge?.offsetFromPlacementM, 200)
    assert.equal(onFirstEdge?.pathLengthM, 800)
  })

  it('falls back to the path origin with offset 0 when the approach is too short', () => {
    const search = new PathSearchSystem(shortApproach())
    const placement = search.findBackwardPlacement('CDL', 'START', 900)

    assert.equal(placement?.placementNodeId, 'START')
    assert.equal(placement?.offsetFromPlacementM, 0)
  })

  it('uses the shortest enumerated path', () => {
    const graph = buildGraph(
      [makeNode('X', 'track'), makeNode('Y', 'track'), makeNode('Z', 'track')],
      [
        ['X', 'Z', 400],
        ['X', 'Y', 100],
        ['Y', 'Z', 100],
      ]
    )
    const placement = new PathSearchSystem(graph).findBackwardPlacement('Z', 'X', 150)

    assert.deepEqual(placement?.path, ['X', 'Y', 'Z'])
    assert.equal(placement?.placementNodeId, 'X')
    assert.equal(placement?.offsetFromPlacementM, 50)
  })

  it('keeps the first enumerated path on equal length', () => {
    const graph = buildGraph(
      [makeNode('X', 'track'), makeNode('Y', 'track'), makeNode('Z', 'track')],
      [
        ['X', 'Z', 200],
        ['X', 'Y', 100],
        ['Y', 'Z', 100],
      ]
    )
    const placement = new PathSearchSystem(graph).findBackwardPlacement('Z', 'X', 150)

    assert.deepEqual(placement?.path, ['X', 'Z'])
    assert.equal(placement?.offsetFromPlacementM, 150)
  })

  it('still chooses a path whose length is not finite', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('Z', 'track')],
      [
        ['A', 'Z', Number.POSITIVE_INFINITY],
        ['B', 'Z', Number.NaN],
      ]
    )
    const search = new PathSearchSystem(graph)

    const infinite = search.findBackwardPlacement('Z', 'A', 500)
    assert.deepEqual(infinite?.path, ['A', 'Z'])
    assert.equal(infinite?.placementNodeId, 'A')
    assert.equal(infinite?.offsetFromPlacementM, 500)
    assert.equal(infinite?.pathLengthM, Number.POSITIVE_INFINITY)

    const unknown = search.findBackwardPlacement('Z', 'B', 500)
    assert.deepEqual(unknown?.path, ['B', 'Z'])
    assert.equal(unknown?.placementNodeId, 'B')
    assert.equal(unknown?.offsetFromPlacementM, 0)
    assert.equal(unknown?.pathLengthM, Number.NaN)
  })

  it('returns null when no path exists within the bound', () => {
    const search = new PathSearchSystem(chain(11))
    assert.equal(search.findBackwardPlacement('N11', 'N0', 500), null)
    assert.equal(search.findBackwardPlacement('N0', 'N1', 500), null)
  })
})
