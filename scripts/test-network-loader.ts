/**
 * Network document loading and configuration tests.
 *
 * Usage: npm test
 */

import assert from 'node:assert/strict'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { after, before, describe, it } from 'node:test'
import {
  InvalidSignalDistanceError,
  NetworkDocumentError,
  ReferentialIntegrityError,
} from '../src/analysis/errors'
import { TrackGraph } from '../src/analysis/graph/TrackGraph'
import {
  assertSignalDistance,
  DEFAULT_SIGNAL_DISTANCE_M,
  loadAnalysisConfig,
} from '../src/config/analysis'
import { loadNetworkGraph, parseNetworkData, readNetworkFile } from '../src/lib/networkLoader'
import { silentLogger } from './helpers/network'

const stationPath = fileURLToPath(
  new URL('../data/stations/central-station.json', import.meta.url)
)

describe('network loader', () => {
  let scratchDir = ''

  before(async () => {
    scratchDir = await mkdtemp(path.join(tmpdir(), 'railsafe-cdl-'))
  })

  after(async () => {
    await rm(scratchDir, { recursive: true, force: true })
  })

  it('loads the central station document', async () => {
    const { network, graph } = await loadNetworkGraph(stationPath, { logger: silentLogger })

    assert.equal(network.name, 'Central Station')
    assert.equal(graph.getNodes().length, 14)
    assert.equal(graph.getEdges().length, 14)
    assert.deepEqual(graph.getPredecessors('SW_S1'), ['ENTRY_S', 'SW_N1'])
    assert.equal(graph.getEdge('P1_A', 'P1_B')?.trackId, 'platform-1')
    assert.equal(graph.getNode('SIDING')?.description, 'Goods siding')
  })

  it('lists schema issues by path', () => {
    assert.throws(
      () =>
        parseNetworkData({
          version: 1,
          name: 'Broken',
          nodes: [{ id: 'A', role: 'bogus', position: [0, 0] }],
          edges: [],
        }),
      (error: unknown) => {
        assert.ok(error instanceof NetworkDocumentError)
        assert.equal(error.issues.length, 1)
        assert.ok(error.issues[0]?.startsWith('nodes.0.role: '))
        return true
      }
    )
  })

  it('rejects an unsupported version', () => {
    assert.throws(
      () => parseNetworkData({ version: 2, name: 'Future', nodes: [], edges: [] }),
      (error: unknown) =>
        error instanceof NetworkDocumentError && error.issues[0]?.startsWith('version: ') === true
    )
  })

  it('surfaces a dangling edge as a referential integrity error', () => {
    const network = parseNetworkData({
      version: 1,
      name: 'Dangling',
      nodes: [{ id: 'A', role: 'entry', position: [0, 0] }],
      edges: [{ fromNodeId: 'A', toNodeId: 'GHOST', lengthM: 100 }],
    })

    const graph = new TrackGraph({ logger: silentLogger })
    assert.throws(() => graph.buildFromNetwork(network), ReferentialIntegrityError)
  })

  it('reports a file that is not JSON', async () => {
    const filePath = path.join(scratchDir, 'not-json.json')
    await writeFile(filePath, '{ nodes: ', 'utf-8')

    await assert.rejects(readNetworkFile(filePath), (error: unknown) => {
      assert.ok(error instanceof NetworkDocumentError)
      assert.equal(error.issues.length, 1)
      assert.ok(error.issues[0]?.startsWith('(root): '))
      return true
    })
  })
})

describe('analysis config', () => {
  it('defaults the signal distance', () => {
    assert.deepEqual(loadAnalysisConfig({}, silentLogger), { signalDistanceM: 500 })
    assert.equal(DEFAULT_SIGNAL_DISTANCE_M, 500)
  })

  it('reads SIGNAL_DISTANCE_M', () => {
    assert.deepEqual(loadAnalysisConfig({ SIGNAL_DISTANCE_M: '750' }, silentLogger), {
      signalDistanceM: 750,
    })
  })

  it('warns and falls back on an invalid value', () => {
    const warnings: string[] = []
    const logger = { warn: (line: string) => warnings.push(line) }

    assert.deepEqual(loadAnalysisConfig({ SIGNAL_DISTANCE_M: 'far' }, logger), {
      signalDistanceM: 500,
    })
    assert.deepEqual(loadAnalysisConfig({ SIGNAL_DISTANCE_M: '-5' }, logger), {
      signalDistanceM: 500,
    })
    assert.deepEqual(warnings, [
      'analysis config: ignoring SIGNAL_DISTANCE_M=far, using 500m',
      'analysis config: ignoring SIGNAL_DISTANCE_M=-5, using 500m',
    ])
  })

  it('treats a blank value as unset', () => {
    const warnings: string[] = []
    const config = loadAnalysisConfig(
      { SIGNAL_DISTANCE_M: '  ' },
      { warn: (line: string) => warnings.push(line) }
    )
    assert.equal(config.signalDistanceM, 500)
    assert.deepEqual(warnings, [])
  })

  it('validates a per-run distance', () => {
    assert.equal(assertSignalDistance(250), 250)
    assert.throws(() => assertSignalDistance(0), InvalidSignalDistanceError)
    assert.throws(
      () => assertSignalDistance(Number.POSITIVE_INFINITY),
      (error: unknown) =>
        error instanceof InvalidSignalDistanceError && error.value === Number.POSITIVE_INFINITY
    )
  })
})
