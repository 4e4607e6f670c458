/**
 * Signal placement tests: one signal per approach, recorded distance, idempotent re-runs.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { InvalidSignalDistanceError } from '../src/analysis/errors'
import { CoverageSystem } from '../src/analysis/systems/CoverageSystem'
import { SignalPlacementSystem, signalIdFor } from '../src/analysis/systems/SignalPlacementSystem'
import {
  buildGraph,
  chain,
  chainedMerges,
  makeNode,
  makeSystems,
  shortApproach,
  simpleMerge,
} from './helpers/network'

describe('SignalPlacementSystem', () => {
  it('places one signal per approach of a simple merge', () => {
    const graph = simpleMerge()
    const { placement } = makeSystems(graph)

    const created = placement.placeSignals(500)
    assert.deepEqual(created, ['SIG_A_M', 'SIG_B_M'])

    const signal = graph.getNode('SIG_A_M')
    assert.equal(signal?.role, 'signal')
    assert.deepEqual(signal?.position, [0, 100])
    assert.deepEqual(signal?.signal, {
      protectedZoneId: 'M',
      approachNodeId: 'A',
      placementNodeId: 'A',
      distanceToCdlM: 500,
      offsetFromPlacementM: 500,
    })
    assert.equal(graph.getNode('SIG_B_M')?.signal?.distanceToCdlM, 500)
  })

  it('places nothing on a linear track', () => {
    const { placement } = makeSystems(chain(3, 'entry', 'exit'))
    assert.deepEqual(placement.placeSignals(500), [])
  })

  it('places two signals per zone for chained merges', () => {
    const graph = chainedMerges()
    const { placement } = makeSystems(graph)

    assert.deepEqual(placement.placeSignals(500), [
      'SIG_ENTRY1_M1',
      'SIG_ENTRY2_M1',
      'SIG_M1_M2',
      'SIG_ENTRY3_M2',
    ])
    assert.equal(graph.getNode('SIG_M1_M2')?.signal?.placementNodeId, 'M1')
  })

  it('records the requested distance, not the achieved offset', () => {
    const graph = shortApproach()
    const { placement } = makeSystems(graph)

    const created = placement.placeSignals(500)
    assert.deepEqual(created, ['SIG_MID_CDL', 'SIG_OTHER_CDL'])

    const viaMid = graph.getNode('SIG_MID_CDL')?.signal
    assert.equal(viaMid?.placementNodeId, 'MID')
    assert.equal(viaMid?.offsetFromPlacementM, 500)
    assert.equal(viaMid?.distanceToCdlM, 500)

    const viaOther = graph.getNode('SIG_OTHER_CDL')?.signal
    assert.equal(viaOther?.placementNodeId, 'OTHER')
    assert.equal(viaOther?.offsetFromPlacementM, 500)
    assert.equal(viaOther?.distanceToCdlM, 500)
  })

  it('places at the approach origin with offset 0 when the approach is short', () => {
    const graph = buildGraph(
      [makeNode('A', 'entry'), makeNode('B', 'entry'), makeNode('Z', 'track', [200, 0])],
      [
        ['A', 'Z', 200],
        ['B', 'Z', 200],
      ]
    )
    const { placement } = makeSystems(graph)
    placement.placeSignals(500)

    for (const id of ['SIG_A_Z', 'SIG_B_Z']) {
      const protection = graph.getNode(id)?.signal
      assert.equal(protection?.offsetFromPlacementM, 0, id)
      assert.equal(protection?.distanceToCdlM, 500, id)
    }
    assert.equal(graph.getNode('SIG_A_Z')?.signal?.placementNodeId, 'A')
  })

  it('creates nothing on a second run with the same distance', () => {
    const graph = chainedMerges()
    const { placement } = makeSystems(graph)

    assert.equal(placement.placeSignals(500).length, 4)
    assert.deepEqual(placement.placeSignals(500), [])
    assert.equal(graph.getNodeIdsByRole('signal').length, 4)
  })

  it('protects every approach of every zone', () => {
    const graph = chainedMerges()
    const { placement } = makeSystems(graph)
    placement.placeSignals(500)

    for (const zoneId of graph.getNodeIdsByRole('conflict_zone')) {
      const protecting = graph.getNodes().filter((n) => n.signal?.protectedZoneId === zoneId)
      assert.equal(protecting.length, graph.getInDegree(zoneId), zoneId)
      assert.equal(graph.getNode(zoneId)?.role, 'conflict_zone')
    }
  })

  it('skips an approach without a path and leaves it uncovered', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('Z', 'track')],
      [
        ['A', 'Z', 600],
        ['Z', 'Z', 50],
      ]
    )
    const { placement } = makeSystems(graph)

    assert.deepEqual(placement.placeSignals(500), ['SIG_A_Z'])

    const [coverage] = new CoverageSystem(graph).getCoverage()
    assert.deepEqual(coverage, {
      zoneId: 'Z',
      approachNodeIds: ['A', 'Z'],
      protectingSignalIds: ['SIG_A_Z'],
      missingApproachIds: ['Z'],
      coverageRatio: 0.5,
      complete: false,
    })
  })

  it('protects an approach whose edge length is not finite', () => {
    const graph = buildGraph(
      [makeNode('A', 'track'), makeNode('B', 'track'), makeNode('Z', 'track')],
      [
        ['A', 'Z', Number.POSITIVE_INFINITY],
        ['B', 'Z', 100],
      ]
    )
    const { placement } = makeSystems(graph)

    assert.deepEqual(placement.placeSignals(500), ['SIG_A_Z', 'SIG_B_Z'])
    assert.equal(graph.getNode('SIG_A_Z')?.signal?.offsetFromPlacementM, 500)
    assert.equal(graph.getNode('SIG_B_Z')?.signal?.offsetFromPlacementM, 0)
  })

  it('rejects a non-positive or non-finite distance before classifying', () => {
    const graph = simpleMerge()
    const { placement } = makeSystems(graph)

    assert.throws(() => placement.placeSignals(0), InvalidSignalDistanceError)
    assert.throws(() => placement.placeSignals(-10), InvalidSignalDistanceError)
    assert.throws(() => placement.placeSignals(Number.NaN), InvalidSignalDistanceError)
    assert.equal(graph.getNode('M')?.role, 'track')
  })

  it('logs each placed signal', () => {
    const lines: string[] = []
    const graph = simpleMerge()
    const { conflictZones, pathSearch } = makeSystems(graph)

    new SignalPlacementSystem(graph, conflictZones, pathSearch, {
      logger: { log: (line: string) => lines.push(line) },
    }).placeSignals(500)

    assert.deepEqual(lines, [
      'SignalPlacementSystem: placed SIG_A_M at A protecting M',
      'SignalPlacementSystem: placed SIG_B_M at B protecting M',
    ])
  })

  it('derives signal ids from approach and zone', () => {
    assert.equal(signalIdFor('ENTRY_A', 'EXIT_B'), 'SIG_ENTRY_A_EXIT_B')
  })
})
