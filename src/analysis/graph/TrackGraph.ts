/**
 * TrackGraph - Directed representation of a station's track layout.
 * Uses ngraph for the adjacency index and shortest-route search.
 */

import type { Graph } from 'ngraph.graph'
import createGraph from 'ngraph.graph'
import type { PathFinder as NGraphPathFinder } from 'ngraph.path'
import pathFinder from 'ngraph.path'
import { ReferentialIntegrityError } from '@/analysis/errors'
import type { NetworkData, NetworkEdge, NetworkNode, NodeRole } from '@/types/network'

/** Shortest route between two nodes */
export interface RouteResult {
  /** Ordered node ids from origin to destination */
  nodeIds: string[]
  /** Total length in meters */
  totalLength: number
}

export interface TrackGraphOptions {
  logger?: Pick<Console, 'log'>
}

export class TrackGraph {
  private graph: Graph<NetworkNode, NetworkEdge>
  private finder: NGraphPathFinder<NetworkNode> | null = null
  private logger: Pick<Console, 'log'>

  constructor(options: TrackGraphOptions = {}) {
    this.logger = options.logger ?? console
    // One edge per ordered pair: re-adding a pair replaces its data in place.
    this.graph = createGraph({ multigraph: false })
  }

  /**
   * Replace the graph contents with a network document (nodes first, then edges).
   */
  buildFromNetwork(network: NetworkData): void {
    this.graph.clear()
    this.finder = null

    for (const node of network.nodes) this.addNode(node)
    for (const edge of network.edges) this.addEdge(edge)

    this.logger.log(
      `TrackGraph: ${String(this.graph.getNodeCount())} nodes, ${String(network.edges.length)} edges loaded for ${network.name}`
    )
  }

  addNode(node: NetworkNode): void {
    this.graph.addNode(node.id, { ...node, position: [node.position[0], node.position[1]] })
    this.finder = null
  }

  addEdge(edge: NetworkEdge): void {
    const missing = [edge.fromNodeId, edge.toNodeId].filter((id) => !this.graph.getNode(id))
    if (missing.length > 0) {
      throw new ReferentialIntegrityError(edge.fromNodeId, edge.toNodeId, [...new Set(missing)])
    }

    this.graph.addLink(edge.fromNodeId, edge.toNodeId, { ...edge })
    this.finder = null
  }

  hasNode(nodeId: string): boolean {
    return Boolean(this.graph.getNode(nodeId))
  }

  getNode(nodeId: string): Readonly<NetworkNode> | null {
    return this.graph.getNode(nodeId)?.data ?? null
  }

  getEdge(fromNodeId: string, toNodeId: string): Readonly<NetworkEdge> | null {
    return this.graph.getLink(fromNodeId, toNodeId)?.data ?? null
  }

  /** All nodes in insertion order */
  getNodes(): Array<Readonly<NetworkNode>> {
    const out: Array<Readonly<NetworkNode>> = []
    this.graph.forEachNode((node) => {
      if (!node.data) return
      out.push(node.data)
    })
    return out
  }

  /** All edges in insertion order */
  getEdges(): Array<Readonly<NetworkEdge>> {
    const out: Array<Readonly<NetworkEdge>> = []
    this.graph.forEachLink((link) => {
      if (!link.data) return
      out.push(link.data)
    })
    return out
  }

  getNodeIdsByRole(role: NodeRole): string[] {
    return this.getNodes()
      .filter((n) => n.role === role)
      .map((n) => n.id)
  }

  /**
   * Ids with an edge terminating at `nodeId`, ordered by edge insertion.
   */
  getPredecessors(nodeId: string): string[] {
    return this.getLinkedIds(nodeId, 'incoming')
  }

  getSuccessors(nodeId: string): string[] {
    return this.getLinkedIds(nodeId, 'outgoing')
  }

  getInDegree(nodeId: string): number {
    return this.getPredecessors(nodeId).length
  }

  /**
   * The only role transition a node undergoes: promote it to a conflict zone and record
   * its current predecessors. Returns false when the node is unknown or already a zone.
   *
   * Reserved for ConflictZoneSystem; other callers classify through it.
   * @internal
   */
  markConflictZone(nodeId: string): boolean {
    const node = this.graph.getNode(nodeId)
    if (!node?.data) return false
    if (node.data.role === 'conflict_zone') return false

    node.data.role = 'conflict_zone'
    node.data.conflict = { incomingNodeIds: this.getPredecessors(nodeId) }
    return true
  }

  /**
   * Unbounded shortest route by edge length, following edge direction.
   */
  findShortestRoute(fromNodeId: string, toNodeId: string): RouteResult | null {
    if (!this.graph.getNode(fromNodeId) || !this.graph.getNode(toNodeId)) return null
    if (fromNodeId === toNodeId) return null

    if (!this.finder) {
      this.finder = pathFinder.aStar(this.graph, {
        oriented: true,
        distance: (_fromNode, _toNode, link) => {
          if (!link.data) return Number.POSITIVE_INFINITY
          return link.data.lengthM
        },
      })
    }

    const path = this.finder.find(fromNodeId, toNodeId)
    if (path.length < 2) return null

    // ngraph.path returns nodes in reverse order (target to source)
    const nodeIds = path
      .slice()
      .reverse()
      .map((n) => String(n.id))

    let totalLength = 0
    for (let i = 0; i < nodeIds.length - 1; i++) {
      const fromId = nodeIds[i]
      const toId = nodeIds[i + 1]
      if (fromId === undefined || toId === undefined) continue
      totalLength += this.getEdge(fromId, toId)?.lengthM ?? 0
    }

    return { nodeIds, totalLength }
  }

  private getLinkedIds(nodeId: string, direction: 'incoming' | 'outgoing'): string[] {
    const links = this.graph.getLinks(nodeId)
    if (!links) return []

    const out: string[] = []
    for (const link of links) {
      const fromId = String(link.fromId)
      const toId = String(link.toId)
      if (direction === 'incoming' && toId === nodeId) out.push(fromId)
      if (direction === 'outgoing' && fromId === nodeId) out.push(toId)
    }
    return out
  }
}
