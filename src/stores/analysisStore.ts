import { createStore, type StoreApi } from 'zustand/vanilla'
import type { TrackGraph } from '@/analysis/graph/TrackGraph'
import { ConflictZoneSystem } from '@/analysis/systems/ConflictZoneSystem'
import { PathSearchSystem } from '@/analysis/systems/PathSearchSystem'
import { SignalPlacementSystem } from '@/analysis/systems/SignalPlacementSystem'
import { type NetworkStatistics, StatisticsSystem } from '@/analysis/systems/StatisticsSystem'
import { type AnalysisConfig, loadAnalysisConfig } from '@/config/analysis'

export interface AnalysisStore {
  // Derived sets cached for the current run
  conflictZoneIds: string[]
  signalIds: string[]
  statistics: NetworkStatistics
  lastSignalDistanceM: number | null

  // Actions
  classify: () => string[]
  placeSignals: (signalDistanceM?: number) => string[]
  refreshStatistics: () => NetworkStatistics
}

export interface AnalysisStoreOptions {
  config?: AnalysisConfig
  logger?: Pick<Console, 'log'>
}

/**
 * One store per analysis run; discard it together with the graph.
 */
export function createAnalysisStore(
  trackGraph: TrackGraph,
  options: AnalysisStoreOptions = {}
): StoreApi<AnalysisStore> {
  const config = options.config ?? loadAnalysisConfig()
  const conflictZoneSystem = new ConflictZoneSystem(trackGraph)
  const pathSearchSystem = new PathSearchSystem(trackGraph)
  const signalPlacementSystem = new SignalPlacementSystem(
    trackGraph,
    conflictZoneSystem,
    pathSearchSystem,
    { logger: options.logger }
  )
  const statisticsSystem = new StatisticsSystem(trackGraph)

  return createStore<AnalysisStore>((set) => ({
    conflictZoneIds: [],
    signalIds: [],
    statistics: statisticsSystem.getStatistics(),
    lastSignalDistanceM: null,

    classify: () => {
      const conflictZoneIds = Array.from(conflictZoneSystem.identifyConflictZones())
      set({ conflictZoneIds, statistics: statisticsSystem.getStatistics() })
      return conflictZoneIds
    },

    placeSignals: (signalDistanceM = config.signalDistanceM) => {
      const created = signalPlacementSystem.placeSignals(signalDistanceM)
      set((state) => ({
        conflictZoneIds: Array.from(conflictZoneSystem.identifyConflictZones()),
        signalIds: [...state.signalIds, ...created],
        statistics: statisticsSystem.getStatistics(),
        lastSignalDistanceM: signalDistanceM,
      }))
      return created
    },

    refreshStatistics: () => {
      const statistics = statisticsSystem.getStatistics()
      set({ statistics })
      return statistics
    },
  }))
}
