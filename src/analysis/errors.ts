/**
 * Structural errors raised while building or analysing a station network.
 *
 * Placement exhaustion is not an error: the path search returns `null` and the
 * planner skips that approach.
 */

export class ReferentialIntegrityError extends Error {
  public readonly fromNodeId: string
  public readonly toNodeId: string
  public readonly missingNodeIds: string[]

  constructor(fromNodeId: string, toNodeId: string, missingNodeIds: string[]) {
    super(
      `Both nodes must exist before adding edge ${fromNodeId} -> ${toNodeId} (missing: ${missingNodeIds.join(', ')})`
    )
    this.name = 'ReferentialIntegrityError'
    this.fromNodeId = fromNodeId
    this.toNodeId = toNodeId
    this.missingNodeIds = missingNodeIds
  }
}

export class InvalidSignalDistanceError extends Error {
  public readonly value: number

  constructor(value: number) {
    super(`Signal distance must be a positive finite number of metres, got ${String(value)}`)
    this.name = 'InvalidSignalDistanceError'
    this.value = value
  }
}

export class NetworkDocumentError extends Error {
  public readonly issues: string[]

  constructor(source: string, issues: string[]) {
    const body = issues.map((issue, i) => `  ${String(i + 1)}. ${issue}`).join('\n')
    super(`Invalid network document (${source}):\n${body}`)
    this.name = 'NetworkDocumentError'
    this.issues = issues
  }
}
