/**
 * Analysis configuration.
 *
 * The sighting distance is the only tunable that affects placement. The search bound is
 * a hard constant: approaches whose only routes exceed it get no signal, and the route
 * analysis reports them instead.
 */

import { z } from 'zod'
import { InvalidSignalDistanceError } from '@/analysis/errors'

/** Default sighting distance in metres */
export const DEFAULT_SIGNAL_DISTANCE_M = 500

/** Maximum number of edges in an enumerated approach path */
export const MAX_SEARCH_EDGES = 10

export interface AnalysisConfig {
  signalDistanceM: number
}

const envSchema = z.object({
  SIGNAL_DISTANCE_M: z.coerce.number().positive().finite().optional(),
})

export function assertSignalDistance(value: number): number {
  if (!Number.isFinite(value) || value <= 0) throw new InvalidSignalDistanceError(value)
  return value
}

/**
 * Read overrides from the environment. An unparsable SIGNAL_DISTANCE_M is reported and the
 * default is used.
 */
export function loadAnalysisConfig(
  env: Record<string, string | undefined> = process.env,
  logger: Pick<Console, 'warn'> = console
): AnalysisConfig {
  const raw = env['SIGNAL_DISTANCE_M']
  const parsed = envSchema.safeParse({
    SIGNAL_DISTANCE_M: raw !== undefined && raw.trim().length > 0 ? raw : undefined,
  })

  if (!parsed.success) {
    logger.warn(
      `analysis config: ignoring SIGNAL_DISTANCE_M=${String(raw)}, using ${String(DEFAULT_SIGNAL_DISTANCE_M)}m`
    )
    return { signalDistanceM: DEFAULT_SIGNAL_DISTANCE_M }
  }

  return { signalDistanceM: parsed.data.SIGNAL_DISTANCE_M ?? DEFAULT_SIGNAL_DISTANCE_M }
}
