import { normalizeProjections } from './signal-normalizer'
import type { DataQualitySummary, RawPlayerSignals } from './types'

function hasCompleteSignals(p: RawPlayerSignals): boolean {
  return (
    normalizeProjections(p.projections).providerCount > 0 &&
    p.matchupDifficulty !== null &&
    p.trendingDelta !== null &&
    p.recentPerformance.length > 0
  )
}

export function summarizeDataQuality(players: readonly RawPlayerSignals[]): DataQualitySummary {
  const total = players.length
  const withProjection = players.filter((p) => normalizeProjections(p.projections).providerCount > 0).length
  const complete = players.filter(hasCompleteSignals).length
  return {
    totalPlayers: total,
    withProjection,
    withCompleteSignals: complete,
    projectionCoverage: total ? withProjection / total : 0,
    completeFraction: total ? complete / total : 0,
  }
}
