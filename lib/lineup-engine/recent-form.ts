import type { PlayerFlag, RecentPerformance } from './types'
import { clamp, NEUTRAL_SCORE } from './signal-normalizer'

export const RECENT_WINDOW = 3
export const BREAKOUT_RATIO = 1.5
export const DECLINE_RATIO = 0.7
export const CEILING_GAME_RATIO = 2
const EWMA_ALPHA = 0.3

/** Most recent periods, oldest first. */
export function recentPoints(recent: readonly RecentPerformance[], window = RECENT_WINDOW): number[] {
  return [...recent]
    .filter((r) => Number.isFinite(r.points) && Number.isFinite(r.period))
    .sort((a, b) => a.period - b.period)
    .slice(-window)
    .map((r) => r.points)
}

function mean(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0) / values.length
}

function stdDev(values: number[]): number {
  const m = mean(values)
  return Math.sqrt(values.reduce((acc, v) => acc + (v - m) ** 2, 0) / values.length)
}

export function momentumScore(points: number[]): number {
  if (points.length < 2) return NEUTRAL_SCORE
  const avg = mean(points)
  if (avg <= 0) return NEUTRAL_SCORE

  let ewma = points[0]
  for (const p of points.slice(1)) {
    ewma = EWMA_ALPHA * p + (1 - EWMA_ALPHA) * ewma
  }
  const ratio = ewma / avg
  if (ratio >= 1) return Math.min(100, NEUTRAL_SCORE + (ratio - 1) * 50)
  return clamp(ratio * 50, 0, 100)
}

export function consistencyScore(points: number[]): number {
  if (points.length < 3) return NEUTRAL_SCORE
  const avg = mean(points)
  if (avg <= 0) return NEUTRAL_SCORE
  const cv = stdDev(points) / avg
  return clamp((1 - cv) * 100, 0, 100)
}

export type Range = { floor: number; ceiling: number }

export function floorCeiling(projection: number, matchupScore: number, points: number[]): Range {
  if (points.length >= 3) {
    const avg = mean(points)
    const sd = stdDev(points)
    let floor = Math.max(0, avg - 0.8 * sd)
    let ceiling = avg + 1.2 * sd
    if (matchupScore >= 70) {
      floor *= 1.1
      ceiling *= 1.2
    } else if (matchupScore <= 30) {
      floor *= 0.85
      ceiling *= 0.95
    }
    return { floor, ceiling }
  }

  if (matchupScore >= 70) return { floor: projection * 0.75, ceiling: projection * 1.35 }
  if (matchupScore >= 50) return { floor: projection * 0.8, ceiling: projection * 1.25 }
  if (matchupScore >= 30) return { floor: projection * 0.7, ceiling: projection * 1.15 }
  return { floor: projection * 0.6, ceiling: projection * 1.1 }
}

export type FormAssessment = {
  flags: PlayerFlag[]
  adjustedProjection: number
  recentAverage: number | null
}

/**
 * Compares recent output with the projection. Only a breakout moves the
 * projection, blended toward recent output by how much history there is.
 * A projection of zero or less has no ratio to compare against and is kept.
 */
export function assessRecentForm(projection: number | null, points: number[]): FormAssessment {
  if (projection === null || projection <= 0 || !points.length) {
    return { flags: [], adjustedProjection: projection ?? 0, recentAverage: points.length ? mean(points) : null }
  }

  const avg = mean(points)
  const flags: PlayerFlag[] = []
  let adjustedProjection = projection

  if (avg > projection * BREAKOUT_RATIO) {
    flags.push('breakout candidate')
    const recentWeight = points.length >= 3 ? 0.7 : 0.6
    adjustedProjection = avg * recentWeight + projection * (1 - recentWeight)
  } else if (avg < projection * DECLINE_RATIO) {
    flags.push('declining role')
  }

  if (points.some((p) => p > projection * CEILING_GAME_RATIO)) {
    flags.push('high ceiling')
  }

  if (
    !flags.length &&
    points.length >= 2 &&
    avg > 0 &&
    Math.max(...points) / avg < 1.5 &&
    avg >= projection * 0.9 &&
    avg <= projection * 1.1
  ) {
    flags.push('consistent')
  }

  return { flags, adjustedProjection, recentAverage: avg }
}
