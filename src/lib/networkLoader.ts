/**
 * Network document loader - validates station network JSON and builds a TrackGraph from it.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { NetworkDocumentError } from '@/analysis/errors'
import { TrackGraph, type TrackGraphOptions } from '@/analysis/graph/TrackGraph'
import { NODE_ROLES, type NetworkData } from '@/types/network'

const pointSchema = z.tuple([z.number().finite(), z.number().finite()])

const nodeSchema = z.object({
  id: z.string().min(1),
  role: z.enum(NODE_ROLES),
  position: pointSchema,
  description: z.string().optional(),
  conflict: z.object({ incomingNodeIds: z.array(z.string()) }).optional(),
  signal: z
    .object({
      protectedZoneId: z.string(),
      approachNodeId: z.string(),
      placementNodeId: z.string(),
      distanceToCdlM: z.number(),
      offsetFromPlacementM: z.number(),
    })
    .optional(),
})

// Lengths are not range-checked: negative values are accepted as-is.
const edgeSchema = z.object({
  fromNodeId: z.string().min(1),
  toNodeId: z.string().min(1),
  lengthM: z.number().finite(),
  trackId: z.string().optional(),
  description: z.string().optional(),
})

export const networkDataSchema = z.object({
  version: z.literal(1),
  name: z.string().min(1),
  nodes: z.array(nodeSchema),
  edges: z.array(edgeSchema),
})

/**
 * Validate an already-parsed document.
 */
export function parseNetworkData(input: unknown, source = 'input'): NetworkData {
  const result = networkDataSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${where}: ${issue.message}`
    })
    throw new NetworkDocumentError(source, issues)
  }
  return result.data
}

export async function readNetworkFile(filePath: string): Promise<NetworkData> {
  const content = await readFile(filePath, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new NetworkDocumentError(filePath, [`(root): ${message}`])
  }
  return parseNetworkData(raw, filePath)
}

/**
 * Read, validate and load a network document. Edge reference errors surface as
 * ReferentialIntegrityError from the graph.
 */
export async function loadNetworkGraph(
  filePath: string,
  options: TrackGraphOptions = {}
): Promise<{ network: NetworkData; graph: TrackGraph }> {
  const network = await readNetworkFile(filePath)
  const graph = new TrackGraph(options)
  graph.buildFromNetwork(network)
  return { network, graph }
}
