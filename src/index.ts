export { ReferentialIntegrityError, InvalidSignalDistanceError, NetworkDocumentError } from './analysis/errors'
export { TrackGraph, type RouteResult, type TrackGraphOptions } from './analysis/graph/TrackGraph'
export { ConflictZoneSystem } from './analysis/systems/ConflictZoneSystem'
export { PathSearchSystem, type BackwardPlacement } from './analysis/systems/PathSearchSystem'
export {
  SignalPlacementSystem,
  signalIdFor,
  type SignalPlacementOptions,
} from './analysis/systems/SignalPlacementSystem'
export { StatisticsSystem, type NetworkStatistics } from './analysis/systems/StatisticsSystem'
export { CoverageSystem, type ZoneCoverage } from './analysis/systems/CoverageSystem'
export {
  RouteAnalysisSystem,
  type EntryExitRoutes,
  type RouteSummary,
} from './analysis/systems/RouteAnalysisSystem'
export { formatNetworkSummary } from './analysis/report/networkSummary'
export {
  DEFAULT_SIGNAL_DISTANCE_M,
  MAX_SEARCH_EDGES,
  assertSignalDistance,
  loadAnalysisConfig,
  type AnalysisConfig,
} from './config/analysis'
export { loadNetworkGraph, networkDataSchema, parseNetworkData, readNetworkFile } from './lib/networkLoader'
export { createAnalysisStore, type AnalysisStore, type AnalysisStoreOptions } from './stores/analysisStore'
export type * from './types/network'
