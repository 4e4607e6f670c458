/**
 * Network Types - Directed station track graph used for CDL zone and signal analysis.
 *
 * Positions are metres in a local station frame and are only passed through for rendering.
 */

/** Local station coordinate [x, y] in metres */
export type Point = [number, number]

export const NODE_ROLES = [
  'track',
  'switch',
  'signal',
  'conflict_zone',
  'platform',
  'entry',
  'exit',
] as const

export type NodeRole = (typeof NODE_ROLES)[number]

/** Snapshot taken when a node is classified as a conflict zone */
export interface ConflictZoneInfo {
  /** Predecessor ids at the moment of classification (not refreshed later) */
  incomingNodeIds: string[]
}

/** Placement record carried by generated signal nodes */
export interface SignalProtection {
  /** Conflict zone this signal protects */
  protectedZoneId: string
  /** Direct predecessor of the zone this signal guards */
  approachNodeId: string
  /** Node at the upstream end of the edge the signal sits on */
  placementNodeId: string
  /** Requested sighting distance of the placement run */
  distanceToCdlM: number
  /** Distance still to cover on the chosen edge when the walk-back stopped */
  offsetFromPlacementM: number
}

export interface NetworkNode {
  id: string
  role: NodeRole
  position: Point
  description?: string
  conflict?: ConflictZoneInfo
  signal?: SignalProtection
}

export interface NetworkEdge {
  fromNodeId: string
  toNodeId: string
  lengthM: number
  trackId?: string
  description?: string
}

export interface NetworkData {
  version: 1
  name: string
  nodes: NetworkNode[]
  edges: NetworkEdge[]
}
