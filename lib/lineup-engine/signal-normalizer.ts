import type { Position, Signal } from './types'

// Weekly points that map to 100 on the comparable scale.
export const NORMALIZATION_MAXIMUMS: Record<Position, number> = {
  QB: 30,
  RB: 25,
  WR: 22,
  TE: 18,
  K: 12,
  DEF: 12,
}

export const NEUTRAL_SCORE = 50

const TRENDING_SCALE = 5000

export function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v))
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

export function round2(v: number): number {
  return Math.round(v * 100) / 100
}

export type NormalizedProjections = {
  perProvider: Record<string, number>
  providerCount: number
  average: Signal
}

/**
 * Collapses sparse provider projections into one average. Providers that did
 * not report are left out of the average; if none reported, the average is
 * unknown rather than zero.
 */
export function normalizeProjections(raw: Readonly<Record<string, number>>): NormalizedProjections {
  const perProvider: Record<string, number> = {}
  const providers = Object.keys(raw).sort()
  let total = 0
  let count = 0

  for (const provider of providers) {
    const value = raw[provider]
    if (!isFiniteNumber(value)) continue
    perProvider[provider] = value
    total += value
    count++
  }

  return {
    perProvider,
    providerCount: count,
    average: count > 0 ? { kind: 'known', value: total / count } : { kind: 'unknown' },
  }
}

export function signalOr(signal: Signal, fallback: number): number {
  return signal.kind === 'known' ? signal.value : fallback
}

export function scaleProjection(points: number, position: Position): number {
  return clamp((points / NORMALIZATION_MAXIMUMS[position]) * 100, 0, 100)
}

export function trendingScore(delta: number | null): number {
  if (delta === null || !Number.isFinite(delta)) return NEUTRAL_SCORE
  return clamp(NEUTRAL_SCORE + 50 * Math.tanh(delta / TRENDING_SCALE), 0, 100)
}
