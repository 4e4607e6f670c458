/**
 * Statistics, coverage, route analysis, text summary and analysis store tests.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { fileURLToPath } from 'node:url'
import { describe, it } from 'node:test'
import { formatNetworkSummary } from '../src/analysis/report/networkSummary'
import { CoverageSystem } from '../src/analysis/systems/CoverageSystem'
import { PathSearchSystem } from '../src/analysis/systems/PathSearchSystem'
import { RouteAnalysisSystem } from '../src/analysis/systems/RouteAnalysisSystem'
import { StatisticsSystem } from '../src/analysis/systems/StatisticsSystem'
import { loadNetworkGraph } from '../src/lib/networkLoader'
import { createAnalysisStore } from '../src/stores/analysisStore'
import {
  buildGraph,
  chain,
  chainedMerges,
  makeNode,
  makeSystems,
  silentLogger,
  simpleMerge,
} from './helpers/network'

const stationPath = fileURLToPath(
  new URL('../data/stations/central-station.json', import.meta.url)
)

describe('StatisticsSystem', () => {
  it('counts the central station before and after placement', async () => {
    const { graph } = await loadNetworkGraph(stationPath, { logger: silentLogger })
    const statistics = new StatisticsSystem(graph)

    const before = statistics.getStatistics()
    assert.deepEqual(before, {
      totalNodes: 14,
      totalEdges: 14,
      nodesByRole: {
        track: 1,
        switch: 4,
        signal: 0,
        conflict_zone: 0,
        platform: 4,
        entry: 2,
        exit: 3,
      },
      tracks: 1,
      switches: 4,
      platforms: 4,
      signals: 0,
      conflictZones: 0,
      totalTrackLengthM: 3700,
    })

    const created = makeSystems(graph).placement.placeSignals(500)
    assert.deepEqual(created, [
      'SIG_ENTRY_S_SW_S1',
      'SIG_SW_N1_SW_S1',
      'SIG_SW_S2_EXIT_SE',
      'SIG_SW_N2_EXIT_SE',
    ])

    const after = statistics.getStatistics()
    assert.equal(after.totalNodes, 18)
    assert.equal(after.totalEdges, 14)
    assert.equal(after.switches, 3)
    assert.equal(after.nodesByRole.exit, 2)
    assert.equal(after.conflictZones, 2)
    assert.equal(after.signals, 4)
    assert.equal(after.totalTrackLengthM, 3700)
  })
})

describe('CoverageSystem', () => {
  it('reports full coverage after placement on chained merges', () => {
    const graph = chainedMerges()
    makeSystems(graph).placement.placeSignals(500)

    const coverage = new CoverageSystem(graph).getCoverage()
    assert.deepEqual(
      coverage.map((c) => [c.zoneId, c.protectingSignalIds, c.coverageRatio, c.complete]),
      [
        ['M1', ['SIG_ENTRY1_M1', 'SIG_ENTRY2_M1'], 1, true],
        ['M2', ['SIG_M1_M2', 'SIG_ENTRY3_M2'], 1, true],
      ]
    )
  })

  it('reports zero coverage for classified zones without signals', () => {
    const graph = simpleMerge()
    makeSystems(graph).conflictZones.identifyConflictZones()

    const [coverage] = new CoverageSystem(graph).getCoverage()
    assert.equal(coverage?.coverageRatio, 0)
    assert.deepEqual(coverage?.missingApproachIds, ['A', 'B'])
    assert.equal(coverage?.complete, false)
  })
})

describe('RouteAnalysisSystem', () => {
  it('lists bounded routes and the shortest route per entry/exit pair', () => {
    const graph = buildGraph(
      [
        makeNode('IN', 'entry'),
        makeNode('J', 'switch'),
        makeNode('K', 'track'),
        makeNode('OUT', 'exit'),
      ],
      [
        ['IN', 'J', 100],
        ['IN', 'K', 50],
        ['K', 'J', 20],
        ['J', 'OUT', 100],
      ]
    )

    const [pair] = new RouteAnalysisSystem(graph, new PathSearchSystem(graph)).listRoutes()
    assert.equal(pair?.entryId, 'IN')
    assert.equal(pair?.exitId, 'OUT')
    assert.deepEqual(pair?.routes, [
      { nodeIds: ['IN', 'J', 'OUT'], lengthM: 200 },
      { nodeIds: ['IN', 'K', 'J', 'OUT'], lengthM: 170 },
    ])
    assert.deepEqual(pair?.shortest, { nodeIds: ['IN', 'K', 'J', 'OUT'], totalLength: 170 })
    assert.equal(pair?.exceedsSearchBound, false)
  })

  it('flags a pair only connected beyond the search bound', () => {
    const graph = chain(11, 'entry', 'exit')
    const routes = new RouteAnalysisSystem(graph, new PathSearchSystem(graph))

    const [bounded] = routes.listRoutes()
    assert.deepEqual(bounded?.routes, [])
    assert.equal(bounded?.shortest?.totalLength, 1100)
    assert.equal(bounded?.exceedsSearchBound, true)

    const [widened] = routes.listRoutes(11)
    assert.equal(widened?.routes.length, 1)
    assert.equal(widened?.exceedsSearchBound, false)
  })

  it('reports unreachable pairs without flagging them', () => {
    const graph = buildGraph([makeNode('IN', 'entry'), makeNode('OUT', 'exit')], [['OUT', 'IN', 10]])
    const [pair] = new RouteAnalysisSystem(graph, new PathSearchSystem(graph)).listRoutes()

    assert.deepEqual(pair?.routes, [])
    assert.equal(pair?.shortest, null)
    assert.equal(pair?.exceedsSearchBound, false)
  })
})

describe('formatNetworkSummary', () => {
  it('writes zones and signals in sorted order', () => {
    const graph = simpleMerge()
    makeSystems(graph).placement.placeSignals(500)

    const lines = formatNetworkSummary(graph, 'Simple Merge').split('\n')
    assert.equal(lines[1], 'RAILWAY NETWORK SUMMARY: Simple Merge')
    assert.ok(lines.includes('  - Total Nodes: 6'))
    assert.ok(lines.includes('  - Track Nodes: 2'))
    assert.ok(lines.includes('  - Total Track Length: 1600.00 meters'))

    const start = lines.indexOf('CDL ZONES (Conflict/Merge Points):')
    assert.deepEqual(lines.slice(start, start + 13), [
      'CDL ZONES (Conflict/Merge Points):',
      '  - M',
      '    Incoming tracks: A, B',
      '',
      'SIGNALS:',
      '  - SIG_A_M',
      '    Protects CDL Zone: M',
      '    Approach from: A',
      '    Distance to CDL: 500m',
      '  - SIG_B_M',
      '    Protects CDL Zone: M',
      '    Approach from: B',
      '    Distance to CDL: 500m',
    ])
  })
})

describe('analysis store', () => {
  it('caches zones, signals and statistics for a run', () => {
    const graph = simpleMerge()
    const store = createAnalysisStore(graph, {
      config: { signalDistanceM: 500 },
      logger: silentLogger,
    })

    assert.deepEqual(store.getState().conflictZoneIds, [])
    assert.equal(store.getState().statistics.totalNodes, 4)

    assert.deepEqual(store.getState().classify(), ['M'])
    assert.deepEqual(store.getState().conflictZoneIds, ['M'])

    assert.deepEqual(store.getState().placeSignals(), ['SIG_A_M', 'SIG_B_M'])
    assert.deepEqual(store.getState().placeSignals(), [])

    const state = store.getState()
    assert.deepEqual(state.signalIds, ['SIG_A_M', 'SIG_B_M'])
    assert.equal(state.lastSignalDistanceM, 500)
    assert.equal(state.statistics.signals, 2)
    assert.equal(state.statistics.conflictZones, 1)
  })

  it('uses an explicit distance over the configured one', () => {
    const graph = simpleMerge()
    const store = createAnalysisStore(graph, {
      config: { signalDistanceM: 500 },
      logger: silentLogger,
    })

    store.getState().placeSignals(300)
    assert.equal(store.getState().lastSignalDistanceM, 300)
    assert.equal(graph.getNode('SIG_A_M')?.signal?.distanceToCdlM, 300)
  })

  it('refreshes statistics after outside edits', () => {
    const graph = simpleMerge()
    const store = createAnalysisStore(graph, {
      config: { signalDistanceM: 500 },
      logger: silentLogger,
    })

    graph.addNode(makeNode('LATE', 'platform'))
    assert.equal(store.getState().statistics.platforms, 0)
    assert.equal(store.getState().refreshStatistics().platforms, 1)
    assert.equal(store.getState().statistics.platforms, 1)
  })
})
